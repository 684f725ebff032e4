import type { Job } from 'bullmq';
import { createLogger, errorMessage } from '@token-relay/core';
import { createQueueManager, type QueueManager } from '../queue-manager.js';
import { createRedisConnection, type RedisConfig } from '../redis.js';
import { QUEUE_NAMES } from '../types.js';
import { blockchainEventsProcessor } from './blockchain-events.processor.js';
import type { BlockchainEventJobData, BlockchainEventJobResult } from '../queues/blockchain-events.queue.js';

const logger = createLogger('queue-processors');

export interface ProcessorOptions {
  redis?: RedisConfig;
  blockchainEventsConcurrency?: number;
}

/**
 * Start consuming every queue. Call once on application startup.
 */
export function initializeAllProcessors(options: ProcessorOptions = {}): QueueManager {
  const manager = createQueueManager(createRedisConnection(options.redis));

  manager.registerWorker<BlockchainEventJobData, BlockchainEventJobResult>(
    QUEUE_NAMES.BLOCKCHAIN_EVENTS,
    (job: Job<BlockchainEventJobData, BlockchainEventJobResult>) => blockchainEventsProcessor.process(job),
    { concurrency: options.blockchainEventsConcurrency ?? 5 }
  );

  manager.onEvent((event) => {
    if (event.type === 'job:failed') {
      logger.error('Job failed', { queue: event.queueName, jobId: event.jobId, error: event.error });
    } else if (event.type === 'job:completed') {
      logger.info('Job completed', { queue: event.queueName, jobId: event.jobId });
    }
  });

  logger.info('Queue processors initialized');
  return manager;
}

/**
 * Standalone worker process for dedicated worker hosts.
 */
export async function startWorkerProcess(options: ProcessorOptions = {}): Promise<void> {
  logger.info('Starting worker process');
  const manager = initializeAllProcessors(options);

  const shutdown = (signal: string) => {
    logger.info('Shutting down worker', { signal });
    manager.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Worker shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  logger.info('Worker process started, waiting for jobs');
}
