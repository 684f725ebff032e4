#!/usr/bin/env node

/**
 * Standalone worker process entry point
 * Run with: npm run worker -w @token-relay/queue
 */

import 'dotenv/config';
import { errorMessage, logger } from '@token-relay/core';
import { getRedisConfig } from './env.js';
import { startWorkerProcess } from './processors/initialize.js';

startWorkerProcess({ redis: getRedisConfig() }).catch((error: unknown) => {
  logger.fatal('Failed to start worker', { error: errorMessage(error) });
  process.exit(1);
});
