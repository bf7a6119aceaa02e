import * as http from 'http';
import request from 'supertest';
import { metrics, startMetricsServer } from '../metrics/Metrics';
import { logger } from '../utils/logger';

function listenOnFreePort(): Promise<{ server: http.Server; port: number }> {
  return new Promise((resolve, reject) => {
    const server = http.createServer();
    server.once('error', reject);
    server.listen(0, () => {
      const address = server.address();
      if (typeof address === 'object' && address !== null) resolve({ server, port: address.port });
      else reject(new Error('no port'));
    });
  });
}

const close = (server: http.Server) => new Promise<void>((resolve) => server.close(() => resolve()));

describe('startMetricsServer', () => {
  beforeEach(() => metrics.reset());
  afterEach(() => jest.restoreAllMocks());

  it('serves counters in Prometheus text', async () => {
    const server = await startMetricsServer(0);
    expect(server).not.toBeNull();
    if (!server) return;

    metrics.incChat();
    metrics.incRpc(3);
    const res = await request(server).get('/metrics');
    await close(server);

    expect(res.status).toBe(200);
    expect(res.text).toContain('enclave_chat_messages 1\n');
    expect(res.text).toContain('enclave_rpc_calls 3\n');
  });

  it('answers 404 outside /metrics', async () => {
    const server = await startMetricsServer(0);
    if (!server) throw new Error('metrics server did not start');

    const res = await request(server).get('/other');
    await close(server);

    expect(res.status).toBe(404);
  });

  it('resolves null and logs when the port is already taken', async () => {
    const { server: occupant, port } = await listenOnFreePort();
    const logged = jest.spyOn(logger, 'error');

    const server = await startMetricsServer(port);
    await close(occupant);

    expect(server).toBeNull();
    expect(logged).toHaveBeenCalledWith(expect.stringContaining(`[Metrics] Cannot listen on :${port}`));
  });
});
