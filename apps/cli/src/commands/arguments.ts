import type { Address, Hash } from 'viem';
import { AddressSchema, ConfigurationError, TransactionHashSchema } from '@token-relay/core';

export function validateAddressArg(value: string, name: string): Address {
  const result = AddressSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid ${name} address: ${value}`, 'INVALID_ADDRESS');
  }
  return result.data;
}

export function validateHashArg(value: string): Hash {
  const result = TransactionHashSchema.safeParse(value);
  if (!result.success) {
    throw new ConfigurationError(`Invalid transaction hash: ${value}`, 'INVALID_HASH');
  }
  return result.data;
}

/** commander option parser for positive integers */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigurationError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
