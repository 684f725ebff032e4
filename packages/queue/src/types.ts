import type { JobsOptions } from 'bullmq';

export const QUEUE_NAMES = {
  BLOCKCHAIN_EVENTS: 'token-relay:blockchain-events',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const DEFAULT_JOB_OPTIONS: JobsOptions = {
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export interface BaseJobData {
  correlationId?: string;
  timestamp?: number;
}

export interface BaseJobResult {
  success: boolean;
  message?: string;
  error?: string;
  duration?: number;
  data?: Record<string, unknown>;
}

export type JobEventType = 'job:completed' | 'job:failed' | 'job:stalled';

export interface JobEvent {
  type: JobEventType;
  queueName: string;
  jobId: string;
  result?: unknown;
  error?: string;
  timestamp: number;
}

export type JobEventHandler = (event: JobEvent) => void;
