import { describe, it, expect } from 'vitest';
import { BlockchainWebhookPayloadSchema } from '../schemas.js';
import {
  PROCESS_EVENTS_JOB,
  createBlockchainEventPublisher,
  type BlockchainEventJobData,
  type JobSink,
} from './blockchain-events.queue.js';

function recordingSink() {
  const jobs: { name: string; data: BlockchainEventJobData }[] = [];
  const sink: JobSink<BlockchainEventJobData> = {
    add: async (name, data) => {
      jobs.push({ name, data });
      return { id: String(jobs.length) };
    },
  };
  return { sink, jobs };
}

const payload = BlockchainWebhookPayloadSchema.parse({
  webhookId: 'wh_test',
  event: {
    network: 'ETH_SEPOLIA',
    data: {
      block: {
        hash: '0x01',
        logs: [{ topics: ['0xddf2'], data: '0x' }],
      },
    },
  },
});

describe('createBlockchainEventPublisher', () => {
  it('enqueues the whole payload as a process-events job', async () => {
    const { sink, jobs } = recordingSink();
    const publish = createBlockchainEventPublisher(sink);

    await expect(publish(payload)).resolves.toBe('1');

    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.name).toBe(PROCESS_EVENTS_JOB);
    expect(jobs[0]?.data.event).toEqual({
      network: 'ETH_SEPOLIA',
      data: { block: { hash: '0x01', logs: [{ topics: ['0xddf2'], data: '0x' }] } },
    });
    expect(jobs[0]?.data).toHaveProperty('webhookId', 'wh_test');
    expect(typeof jobs[0]?.data.timestamp).toBe('number');
  });

  it('propagates enqueue failures', async () => {
    const publish = createBlockchainEventPublisher({
      add: async () => {
        throw new Error('Connection is closed.');
      },
    });
    await expect(publish(payload)).rejects.toThrow('Connection is closed.');
  });
});

describe('BlockchainWebhookPayloadSchema', () => {
  it('rejects a body without block logs', () => {
    expect(BlockchainWebhookPayloadSchema.safeParse({ event: { network: 'ETH_SEPOLIA', data: {} } }).success).toBe(
      false
    );
  });
});
