import { z } from 'zod';
import { AddressSchema, ConfigurationError, formatZodIssues } from '@token-relay/core';

function blankAsUndefined<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema);
}

const cliEnvSchema = z.object({
  CHAIN: blankAsUndefined(z.string().optional()),
  NETWORK: blankAsUndefined(z.string().optional()),
  ALCHEMY_API_KEY: blankAsUndefined(z.string().optional()),
  RPC_URL: blankAsUndefined(z.string().url('Invalid RPC URL').optional()),
  PRIVATE_KEY: blankAsUndefined(z.string().optional()),
  WALLET_ADDRESS: blankAsUndefined(AddressSchema.optional()),
  CONFIRMATION_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(120),
  RECEIPT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
});

export type CliEnv = z.infer<typeof cliEnvSchema>;

export function getCliEnv(source: NodeJS.ProcessEnv = process.env): CliEnv {
  const result = cliEnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(`Invalid environment variables: ${formatZodIssues(result.error)}`);
  }
  return result.data;
}
