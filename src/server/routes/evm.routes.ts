import { Router } from 'express';
import { ChainClient } from '../../chain/ChainClient';
import { InvalidInputError } from '../../utils/errors';
import { asyncRoute, readParam } from '../middleware';

export function createEvmRouter(chain: ChainClient): Router {
  const router = Router();

  const connect = asyncRoute(async (req, res) => {
    const network = readParam(req, 'network', 'network_name');
    const rpcUrl = readParam(req, 'rpc_url');
    const status = await chain.connect(network, rpcUrl);
    res.json({ success: status.connected, status });
  });
  router.get('/api/evm/connect', connect);
  router.post('/api/evm/connect', connect);

  router.get(
    '/api/evm/status',
    asyncRoute(async (_req, res) => {
      res.json(await chain.status());
    })
  );

  router.get(
    '/api/evm/balance',
    asyncRoute(async (req, res) => {
      const address = readParam(req, 'address');
      if (!address) throw new InvalidInputError('Address is required');
      const tokenAddress = readParam(req, 'token_address');
      if (tokenAddress) {
        res.json(await chain.tokenBalance(tokenAddress, address));
      } else {
        res.json(await chain.balance(address));
      }
    })
  );

  return router;
}
