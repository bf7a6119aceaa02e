import { Router } from 'express';
import { ChatRelay } from '../../agent/ChatRelay';
import { InvalidInputError } from '../../utils/errors';
import { asyncRoute, readParam } from '../middleware';

export function createChatRouter(relay: ChatRelay): Router {
  const router = Router();

  router.post(
    '/chat',
    asyncRoute(async (req, res) => {
      const message = readParam(req, 'message');
      if (!message) throw new InvalidInputError('Message is required');
      const { reply, history } = await relay.send(message);
      res.json({ reply, history });
    })
  );

  router.post(
    '/reset_chat',
    asyncRoute(async (_req, res) => {
      await relay.reset();
      res.json({ success: true });
    })
  );

  router.get('/chat/history', (_req, res) => {
    res.json({ history: relay.history() });
  });

  return router;
}
