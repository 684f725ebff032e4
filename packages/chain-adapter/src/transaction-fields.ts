import { z } from 'zod';
import {
  AddressSchema,
  ConfigurationError,
  HexSchema,
  InvalidTransactionFieldError,
  NonceSchema,
  QuantitySchema,
  formatZodIssues,
} from '@token-relay/core';
import type { TransactionOverrides } from './types.js';

export const TRANSACTION_FIELDS = [
  'from',
  'to',
  'gas',
  'gasPrice',
  'nonce',
  'data',
  'value',
  'maxFeePerGas',
  'maxPriorityFeePerGas',
] as const;

export type TransactionField = (typeof TRANSACTION_FIELDS)[number];

const ALLOWED_FIELDS: ReadonlySet<string> = new Set(TRANSACTION_FIELDS);

const TransactionOverridesSchema = z
  .object({
    from: AddressSchema.optional(),
    to: AddressSchema.optional(),
    gas: QuantitySchema.optional(),
    gasPrice: QuantitySchema.optional(),
    nonce: NonceSchema.optional(),
    data: HexSchema.optional(),
    value: QuantitySchema.optional(),
    maxFeePerGas: QuantitySchema.optional(),
    maxPriorityFeePerGas: QuantitySchema.optional(),
  })
  .strict();

/**
 * Throws when `fields` carries any key outside the allow-list. The error
 * lists every offending key and every key that was passed.
 */
export function assertKnownTransactionFields(fields: object): void {
  const received = Object.keys(fields);
  const invalid = Object.fromEntries(
    Object.entries(fields).filter(([key]) => !ALLOWED_FIELDS.has(key))
  );

  if (Object.keys(invalid).length > 0) {
    throw new InvalidTransactionFieldError(invalid, received, TRANSACTION_FIELDS);
  }
}

/**
 * Turn untrusted input (a JSON body, CLI flags) into typed overrides.
 * Unknown keys are rejected before any value is looked at.
 */
export function parseTransactionOverrides(input: unknown): TransactionOverrides {
  if (input === undefined || input === null) {
    return {};
  }
  if (typeof input !== 'object' || Array.isArray(input)) {
    throw new ConfigurationError('Transaction overrides must be an object', 'INVALID_TRANSACTION_FIELD');
  }

  assertKnownTransactionFields(input);

  const result = TransactionOverridesSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid transaction overrides: ${formatZodIssues(result.error)}`,
      'INVALID_TRANSACTION_FIELD'
    );
  }

  return result.data;
}
