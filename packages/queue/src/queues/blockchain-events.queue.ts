import { Queue } from 'bullmq';
import type { Redis } from 'ioredis';
import { createLogger } from '@token-relay/core';
import { getRedisConnection } from '../redis.js';
import type { BlockchainWebhookPayload } from '../schemas.js';
import { DEFAULT_JOB_OPTIONS, QUEUE_NAMES, type BaseJobData, type BaseJobResult } from '../types.js';

const logger = createLogger('blockchain-events-queue');

export const PROCESS_EVENTS_JOB = 'process-events';

// The webhook body is enqueued whole, provider metadata included
export type BlockchainEventJobData = BlockchainWebhookPayload & BaseJobData;

export interface BlockchainEventJobResult extends BaseJobResult {
  network?: string;
  logCount?: number;
}

/**
 * The one thing the webhook needs from a queue. BullMQ's `Queue` satisfies it;
 * tests pass a recording fake.
 */
export interface JobSink<T> {
  add(name: string, data: T): Promise<{ id?: string }>;
}

export type BlockchainEventPublisher = (payload: BlockchainWebhookPayload) => Promise<string>;

let blockchainEventsQueue: Queue<BlockchainEventJobData> | null = null;

// Created on first use; importing this module opens no connection
export function getBlockchainEventsQueue(connection: Redis = getRedisConnection()): Queue<BlockchainEventJobData> {
  if (!blockchainEventsQueue) {
    blockchainEventsQueue = new Queue<BlockchainEventJobData>(QUEUE_NAMES.BLOCKCHAIN_EVENTS, {
      connection,
      defaultJobOptions: DEFAULT_JOB_OPTIONS,
    });
  }
  return blockchainEventsQueue;
}

export async function closeBlockchainEventsQueue(): Promise<void> {
  if (blockchainEventsQueue) {
    await blockchainEventsQueue.close();
    blockchainEventsQueue = null;
  }
}

export function createBlockchainEventPublisher(sink: JobSink<BlockchainEventJobData>): BlockchainEventPublisher {
  return async (payload) => {
    const job = await sink.add(PROCESS_EVENTS_JOB, { ...payload, timestamp: Date.now() });
    const jobId = job.id ?? '';

    logger.debug('Blockchain events queued', {
      jobId,
      network: payload.event.network,
      logCount: payload.event.data.block.logs.length,
    });
    return jobId;
  };
}
