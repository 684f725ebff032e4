import { z } from 'zod';
import { isAddress, isHex, type Address, type Hash, type Hex } from 'viem';

export const AddressSchema = z.custom<Address>(
  (value) => typeof value === 'string' && isAddress(value),
  { message: 'Invalid address format' }
);

export const HexSchema = z.custom<Hex>((value) => typeof value === 'string' && isHex(value), {
  message: 'Must be a 0x-prefixed hex string',
});

export const TransactionHashSchema = z.custom<Hash>(
  (value) => typeof value === 'string' && /^0x[a-fA-F0-9]{64}$/.test(value),
  { message: 'Invalid transaction hash format' }
);

/**
 * Wei-denominated quantities arrive as bigint from code and as decimal
 * strings or safe integers from JSON.
 */
export const QuantitySchema = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative().safe(),
    z.string().regex(/^\d+$/, { message: 'Quantity must be a non-negative integer string' }),
  ])
  .transform((value) => BigInt(value));

export const NonceSchema = z.union([
  z.number().int().nonnegative().safe(),
  z
    .string()
    .regex(/^\d+$/, { message: 'Nonce must be a non-negative integer string' })
    .transform((value) => Number(value)),
]);

export const AmountSchema = z.string().regex(/^\d+(\.\d+)?$/, {
  message: 'Amount must be a positive decimal string',
});

export function validateAddress(address: string): boolean {
  return AddressSchema.safeParse(address).success;
}

export function formatZodIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
