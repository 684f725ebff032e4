import { Worker, type Job } from 'bullmq';
import type { Redis } from 'ioredis';
import { createLogger } from '@token-relay/core';
import { closeBlockchainEventsQueue } from './queues/blockchain-events.queue.js';
import { closeRedisConnection, getRedisConnection } from './redis.js';
import type { JobEvent, JobEventHandler, QueueName } from './types.js';

const logger = createLogger('queue-manager');

interface Closable {
  close(): Promise<void>;
}

export class QueueManager {
  private readonly workers = new Map<string, Closable>();
  private readonly eventHandlers = new Map<string, Set<JobEventHandler>>();

  constructor(private readonly connection: Redis = getRedisConnection()) {}

  /**
   * Register the single worker for a queue
   */
  registerWorker<T, R>(
    name: QueueName,
    processor: (job: Job<T, R>) => Promise<R>,
    options?: { concurrency?: number }
  ): Worker<T, R> {
    if (this.workers.has(name)) {
      throw new Error(`A worker is already registered for queue ${name}`);
    }

    const worker = new Worker<T, R>(name, processor, {
      connection: this.connection,
      concurrency: options?.concurrency ?? 5,
    });

    worker.on('completed', (job, result) => {
      this.emitEvent({
        type: 'job:completed',
        queueName: name,
        jobId: job.id ?? '',
        result,
        timestamp: Date.now(),
      });
    });

    worker.on('failed', (job, error) => {
      this.emitEvent({
        type: 'job:failed',
        queueName: name,
        jobId: job?.id ?? '',
        error: error.message,
        timestamp: Date.now(),
      });
    });

    worker.on('stalled', (jobId) => {
      this.emitEvent({
        type: 'job:stalled',
        queueName: name,
        jobId,
        timestamp: Date.now(),
      });
    });

    worker.on('error', (error) => {
      logger.error('Worker error', { queue: name, error: error.message });
    });

    this.workers.set(name, worker);
    logger.info('Worker registered', { queue: name });
    return worker;
  }

  /**
   * Subscribe to job events of one queue, or of all queues when `queueName`
   * is omitted. Returns the unsubscribe function.
   */
  onEvent(handler: JobEventHandler, queueName?: QueueName): () => void {
    const key = queueName ?? '*';
    let handlers = this.eventHandlers.get(key);
    if (!handlers) {
      handlers = new Set();
      this.eventHandlers.set(key, handlers);
    }
    handlers.add(handler);

    return () => {
      this.eventHandlers.get(key)?.delete(handler);
    };
  }

  private emitEvent(event: JobEvent): void {
    this.eventHandlers.get(event.queueName)?.forEach((handler) => handler(event));
    this.eventHandlers.get('*')?.forEach((handler) => handler(event));
  }

  /**
   * Close workers first so no job is picked up after the queue closes
   */
  async shutdown(): Promise<void> {
    logger.info('Shutting down queue manager');

    for (const [name, worker] of this.workers) {
      logger.debug('Closing worker', { queue: name });
      await worker.close();
    }
    this.workers.clear();

    await closeBlockchainEventsQueue();
    await closeRedisConnection();

    logger.info('Queue manager shutdown complete');
  }
}

let queueManager: QueueManager | null = null;

export function createQueueManager(connection?: Redis): QueueManager {
  if (!queueManager) {
    queueManager = new QueueManager(connection);
  }
  return queueManager;
}

export function getQueueManager(): QueueManager {
  return createQueueManager();
}
