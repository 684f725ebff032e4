/**
 * Backend environment variable validation
 */

import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from '@token-relay/core';

// `KEY=` in a .env file means unset
function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const optionalString = blankAsUndefined(z.string().optional());

/**
 * Schema for backend environment variables. PRIVATE_KEY and the provider
 * key stay server-side and are never echoed back.
 */
const backendEnvSchema = z.object({
  // Server Configuration
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  CORS_ORIGIN: z.string().default('*'),

  // Network Configuration
  CHAIN: z.string().default('ethereum'),
  NETWORK: z.string().default('sepolia'),
  ALCHEMY_API_KEY: optionalString,
  RPC_URL: blankAsUndefined(z.string().url('Invalid RPC URL').optional()),

  // Signing
  PRIVATE_KEY: blankAsUndefined(
    z
      .string()
      .regex(/^(0x)?[a-fA-F0-9]{64}$/, 'Invalid private key format (must be 32 bytes hex)')
      .optional()
  ),

  // Confirmation polling
  CONFIRMATION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  RECEIPT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),

  // Webhook Configuration
  WEBHOOK_SIGNING_KEY: optionalString,
});

export type BackendEnv = z.infer<typeof backendEnvSchema>;

/**
 * Parse and validate the backend environment. The error lists every
 * invalid variable at once.
 */
export function getBackendEnv(source: NodeJS.ProcessEnv = process.env): BackendEnv {
  const result = backendEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(`Invalid backend environment variables: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
