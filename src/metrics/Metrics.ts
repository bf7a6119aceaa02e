import * as http from 'http';
import { logger } from '../utils/logger';

class Metrics {
  httpRequests: Record<string, number> = {};
  chatMessages = 0;
  upstreamErrors = 0;
  rpcCalls = 0;
  rpcErrors = 0;
  keysLoaded = 0;
  errors: Record<string, number> = {};

  incRequest(route: string) {
    this.httpRequests[route] = (this.httpRequests[route] || 0) + 1;
  }
  incChat() {
    this.chatMessages++;
  }
  incUpstreamError() {
    this.upstreamErrors++;
  }
  incRpc(calls = 1) {
    this.rpcCalls += calls;
  }
  incRpcError() {
    this.rpcErrors++;
  }
  incKeyLoad() {
    this.keysLoaded++;
  }
  incError(code: string) {
    this.errors[code] = (this.errors[code] || 0) + 1;
  }
  reset() {
    this.httpRequests = {};
    this.chatMessages = 0;
    this.upstreamErrors = 0;
    this.rpcCalls = 0;
    this.rpcErrors = 0;
    this.keysLoaded = 0;
    this.errors = {};
  }
  toPrometheus(): string {
    const lines: string[] = [];
    lines.push(`enclave_chat_messages ${this.chatMessages}`);
    lines.push(`enclave_upstream_errors ${this.upstreamErrors}`);
    lines.push(`enclave_rpc_calls ${this.rpcCalls}`);
    lines.push(`enclave_rpc_errors ${this.rpcErrors}`);
    lines.push(`enclave_keys_loaded ${this.keysLoaded}`);
    for (const [route, c] of Object.entries(this.httpRequests)) {
      lines.push(`enclave_http_requests{route="${route}"} ${c}`);
    }
    for (const [code, c] of Object.entries(this.errors)) {
      lines.push(`enclave_errors{code="${code}"} ${c}`);
    }
    return lines.join('\n') + '\n';
  }
}

export const metrics = new Metrics();

/**
 * Serves `/metrics` on its own port. A port that cannot be bound leaves the
 * service running without the endpoint: resolves null and logs why.
 */
export function startMetricsServer(port: number): Promise<http.Server | null> {
  const server = http.createServer((req, res) => {
    if (req.method === 'GET' && req.url === '/metrics') {
      res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
      res.end(metrics.toPrometheus());
      return;
    }
    res.writeHead(404);
    res.end();
  });

  return new Promise((resolve) => {
    const onError = (err: Error) => {
      logger.error(`[Metrics] Cannot listen on :${port} (${err.message}); metrics endpoint disabled`);
      server.close();
      resolve(null);
    };
    server.once('error', onError);
    server.listen(port, () => {
      server.off('error', onError);
      server.on('error', (err) => logger.error(`[Metrics] Server error: ${err.message}`));
      resolve(server);
    });
  });
}
