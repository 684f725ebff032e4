import type { Job } from 'bullmq';
import { createLogger, type Logger } from '@token-relay/core';
import type { BlockchainEventJobData, BlockchainEventJobResult } from '../queues/blockchain-events.queue.js';

export type BlockchainEventJob = Pick<Job<BlockchainEventJobData>, 'id' | 'data'>;

/**
 * Consumes webhook events. It only records what arrived; acting on
 * individual logs is left to future processors.
 */
export class BlockchainEventsProcessor {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('blockchain-events-processor');
  }

  async process(job: BlockchainEventJob): Promise<BlockchainEventJobResult> {
    const startTime = Date.now();
    const { network, data } = job.data.event;
    const logCount = data.block.logs.length;

    this.logger.info('Begin processing blockchain events', { jobId: job.id });
    this.logger.info('Blockchain events received', { jobId: job.id, network, logCount });
    this.logger.info('Blockchain events processed', { jobId: job.id });

    return {
      success: true,
      message: 'DONE',
      network,
      logCount,
      duration: Date.now() - startTime,
    };
  }
}

export const blockchainEventsProcessor = new BlockchainEventsProcessor();
