import { describe, it, expect } from 'vitest';
import { AmountSchema, NonceSchema, QuantitySchema, validateAddress } from './index.js';

describe('validators', () => {
  it('accepts lowercase and checksummed addresses', () => {
    expect(validateAddress('0x00000000000000000000000000000000000000aa')).toBe(true);
    expect(validateAddress('0xd8dA6BF26964aF9D7eEd9e03E53415D37aA96045')).toBe(true);
    expect(validateAddress('0xd8da6bf26964af9d7eed9e03e53415d37aa9604')).toBe(false);
  });

  it('coerces quantities to bigint', () => {
    expect(QuantitySchema.parse('21000')).toBe(21000n);
    expect(QuantitySchema.parse(7)).toBe(7n);
    expect(QuantitySchema.parse(5n)).toBe(5n);
    expect(QuantitySchema.safeParse('-1').success).toBe(false);
  });

  it('coerces nonces to numbers', () => {
    expect(NonceSchema.parse('12')).toBe(12);
    expect(NonceSchema.safeParse(1.5).success).toBe(false);
  });

  it('accepts decimal amounts only', () => {
    expect(AmountSchema.safeParse('50').success).toBe(true);
    expect(AmountSchema.safeParse('0.25').success).toBe(true);
    expect(AmountSchema.safeParse('1e3').success).toBe(false);
    expect(AmountSchema.safeParse('.5').success).toBe(false);
  });
});
