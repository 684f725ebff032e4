import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from '@token-relay/core';
import type { RedisConfig } from './redis.js';

const RedisEnvSchema = z.object({
  REDIS_URL: z.string().url().optional(),
  REDIS_HOST: z.string().min(1).optional(),
  REDIS_PORT: z.coerce.number().int().positive().optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().optional(),
});

/**
 * Read the Redis settings shared by the backend and the worker.
 * Returns undefined when none are set.
 */
export function getRedisConfig(source: NodeJS.ProcessEnv = process.env): RedisConfig | undefined {
  const parsed = RedisEnvSchema.safeParse(source);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid Redis configuration: ${formatZodIssues(parsed.error)}`);
  }

  const env = parsed.data;
  if (!env.REDIS_URL && !env.REDIS_HOST) {
    return undefined;
  }
  return {
    url: env.REDIS_URL,
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    password: env.REDIS_PASSWORD || undefined,
    db: env.REDIS_DB,
  };
}
