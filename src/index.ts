/**
 * index.ts — Main entry point
 * Boots the chat relay, the EVM client and the key manager behind one HTTP server.
 *
 * Run: npm run dev
 */

import * as dotenv from 'dotenv';
dotenv.config();

import chalk from 'chalk';
import { loadConfig } from './utils/config';
import { ConfigError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import { startMetricsServer } from './metrics/Metrics';
import { ChainClient } from './chain/ChainClient';
import { ChatRelay } from './agent/ChatRelay';
import { createChatModel } from './agent/ModelFactory';
import { createKeyBackend } from './wallet/KeyBackendFactory';
import { SecretLoader } from './wallet/SecretLoader';
import { KeyManager } from './wallet/KeyManager';
import { ChatServer } from './server/ChatServer';

function banner() {
  console.log(chalk.cyan('\n╔══════════════════════════════════════════╗'));
  console.log(chalk.cyan('║   🔐  Enclave Chat — EVM + KMS relay     ║'));
  console.log(chalk.cyan('╚══════════════════════════════════════════╝\n'));
}

async function main() {
  const config = await loadConfig();
  banner();

  const metricsServer = config.metricsEnabled ? await startMetricsServer(config.metricsPort) : null;
  if (metricsServer) logger.info(`Metrics server listening on :${config.metricsPort}/metrics`);

  const { store, cipher } = createKeyBackend(config);
  const loader = new SecretLoader(store, cipher, {
    bucket: config.inputBucket,
    kmsKeyName: config.kmsKeyName,
  });
  const keys = new KeyManager(loader, {
    defaultObjectName: config.keyObjectName,
    prefix: config.keyObjectPrefix,
  });
  logger.info(`Key backend: ${config.keyBackend} (bucket ${config.inputBucket}, key ${config.kmsKeyName})`);

  const model = createChatModel(config);
  const relay = new ChatRelay({ model, historyLimit: config.chatHistoryLimit });
  relay.on('exchange', ({ message, reply }: { message: string; reply: string }) => {
    logger.debug(`[Chat] exchange: ${message.length} chars in, ${reply.length} chars out`);
  });
  logger.info(`Chat model: ${model.name}`);

  const chain = new ChainClient({ defaultRpcUrl: config.evmRpcUrl, timeoutMs: config.rpcTimeoutMs });
  try {
    await chain.connect(config.evmNetwork, config.evmRpcUrl);
  } catch (err) {
    logger.warn(`EVM network unavailable at startup: ${errorMessage(err)}`);
  }

  if (config.loadKeyOnStart) {
    try {
      const loaded = await keys.load();
      logger.info(`Startup key ${loaded.name} → ${loaded.address}`);
    } catch (err) {
      logger.error(`Startup key load failed: ${errorMessage(err)}`);
    }
  }

  const server = new ChatServer({ relay, chain, keys }, config.port);
  await server.start();

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`);
    metricsServer?.close();
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    logger.error(`Configuration error: ${err.message}`);
  } else {
    logger.error(`Fatal: ${errorMessage(err)}`);
  }
  process.exit(1);
});
