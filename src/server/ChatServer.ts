/**
 * ChatServer.ts
 * HTTP front-end: serves the chat page and maps the JSON API onto the relay,
 * the chain client and the key manager. No business logic lives here.
 */

import express, { Request, Response } from 'express';
import { Server } from 'http';
import path from 'path';
import { ChatRelay } from '../agent/ChatRelay';
import { ChainClient } from '../chain/ChainClient';
import { KeyManager } from '../wallet/KeyManager';
import { logger } from '../utils/logger';
import { countRequests, errorHandler, notFound } from './middleware';
import { createChatRouter } from './routes/chat.routes';
import { createEvmRouter } from './routes/evm.routes';
import { createKeyRouter } from './routes/key.routes';

export interface ServerDeps {
  relay: ChatRelay;
  chain: ChainClient;
  keys: KeyManager;
}

const PUBLIC_DIR = path.resolve(__dirname, '..', '..', 'public');

export class ChatServer {
  private app: express.Application;
  private server: Server | null = null;
  private port: number;
  private readonly startedAt = Date.now();

  constructor(deps: ServerDeps, port: number = 8080) {
    this.port = port;
    this.app = express();
    this.setupExpress(deps);
  }

  get application(): express.Application {
    return this.app;
  }

  private setupExpress({ relay, chain, keys }: ServerDeps): void {
    this.app.disable('x-powered-by');
    this.app.use(express.json({ limit: '64kb' }));
    this.app.use(countRequests);

    this.app.get('/', (_req: Request, res: Response) => {
      res.sendFile(path.join(PUBLIC_DIR, 'index.html'));
    });
    this.app.use(express.static(PUBLIC_DIR));

    this.app.get('/health', (_req: Request, res: Response) => {
      res.json({ status: 'ok', uptimeSeconds: Math.floor((Date.now() - this.startedAt) / 1000) });
    });

    this.app.use(createChatRouter(relay));
    this.app.use(createEvmRouter(chain));
    this.app.use(createKeyRouter(keys));

    this.app.use(notFound);
    this.app.use(errorHandler);
  }

  /** Resolves with the bound port once listening (pass 0 for an ephemeral one). */
  public start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        const address = server.address();
        const port = typeof address === 'object' && address !== null ? address.port : this.port;
        logger.info(`Chat server running on http://localhost:${port}`);
        resolve(port);
      });
      server.on('error', reject);
      this.server = server;
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server) return resolve();
      this.server.close((err) => {
        if (err) return reject(err);
        logger.info('Chat server stopped');
        this.server = null;
        resolve();
      });
    });
  }
}
