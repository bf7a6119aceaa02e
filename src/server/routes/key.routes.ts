import { RequestHandler, Router } from 'express';
import { KeyManager } from '../../wallet/KeyManager';
import { asyncRoute, readFlag, readParam } from '../middleware';

export function createKeyRouter(keys: KeyManager): Router {
  const router = Router();
  const both = (path: string, handler: RequestHandler) => {
    router.get(path, handler);
    router.post(path, handler);
  };

  both(
    '/api/key/list',
    asyncRoute(async (_req, res) => {
      res.json({ keys: await keys.list() });
    })
  );

  both(
    '/api/key/load',
    asyncRoute(async (req, res) => {
      const name = readParam(req, 'name', 'key_name');
      const reload = readFlag(req, 'reload');
      res.json(reload ? await keys.reload(name) : await keys.load(name));
    })
  );

  both('/api/key/address', (_req, res, next) => {
    try {
      res.json(keys.address());
    } catch (err) {
      next(err);
    }
  });

  return router;
}
