import 'dotenv/config';
import { createServer } from 'node:http';
import { ConfigurationError, errorMessage, logger } from '@token-relay/core';
import {
  createBlockchainEventPublisher,
  createRedisConnection,
  getBlockchainEventsQueue,
  getRedisConfig,
  initializeAllProcessors,
  type BlockchainEventPublisher,
  type QueueManager,
} from '@token-relay/queue';
import { createApp } from './app.js';
import { getBackendEnv } from './env.js';
import { createChainServices } from './services/chain.js';

const queueDisabled: BlockchainEventPublisher = async () => {
  throw new ConfigurationError('Event queue is not configured (set REDIS_URL or REDIS_HOST)', 'QUEUE_UNAVAILABLE');
};

async function startServer(): Promise<void> {
  const env = getBackendEnv();
  const redis = getRedisConfig();
  const chain = await createChainServices(env);

  let publishEvents = queueDisabled;
  let queueManager: QueueManager | undefined;
  if (redis) {
    publishEvents = createBlockchainEventPublisher(getBlockchainEventsQueue(createRedisConnection(redis)));
    queueManager = initializeAllProcessors({ redis });
  } else {
    logger.warn('Redis is not configured; webhook events will not be queued');
  }

  const app = createApp({
    chain,
    publishEvents,
    queueEnabled: redis !== undefined,
    webhookSigningKey: env.WEBHOOK_SIGNING_KEY,
    corsOrigin: env.CORS_ORIGIN,
    isProduction: env.NODE_ENV === 'production',
  });

  const server = createServer(app);
  server.listen(env.PORT, () => {
    logger.info('token-relay backend listening', { port: env.PORT, health: `/api/health` });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutting down', { signal });

    server.close((serverError) => {
      if (serverError) {
        logger.error('HTTP server close failed', { error: serverError.message });
      }
      (queueManager ? queueManager.shutdown() : Promise.resolve()).then(
        () => process.exit(serverError ? 1 : 0),
        (error: unknown) => {
          logger.error('Queue shutdown failed', { error: errorMessage(error) });
          process.exit(1);
        }
      );
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.fatal('Failed to start server', { error: errorMessage(error) });
  process.exit(1);
});
