// Queue management
export { QueueManager, createQueueManager, getQueueManager } from './queue-manager.js';

// Queues
export {
  PROCESS_EVENTS_JOB,
  closeBlockchainEventsQueue,
  createBlockchainEventPublisher,
  getBlockchainEventsQueue,
} from './queues/blockchain-events.queue.js';
export type {
  BlockchainEventJobData,
  BlockchainEventJobResult,
  BlockchainEventPublisher,
  JobSink,
} from './queues/blockchain-events.queue.js';

// Processors
export * from './processors/index.js';

// Payloads and shared types
export { BlockchainWebhookPayloadSchema } from './schemas.js';
export type { BlockchainWebhookPayload } from './schemas.js';
export * from './types.js';

// Redis connection
export { createRedisConnection, getRedisConnection, closeRedisConnection } from './redis.js';
export type { RedisConfig } from './redis.js';
export { getRedisConfig } from './env.js';
