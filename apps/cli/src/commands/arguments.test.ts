import { describe, it, expect } from 'vitest';
import { parsePositiveInt, validateAddressArg, validateHashArg } from './arguments.js';

describe('command arguments', () => {
  it('accepts valid addresses and hashes', () => {
    expect(validateAddressArg('0x00000000000000000000000000000000000000aa', 'token')).toBe(
      '0x00000000000000000000000000000000000000aa'
    );
    expect(validateHashArg(`0x${'ab'.repeat(32)}`)).toBe(`0x${'ab'.repeat(32)}`);
  });

  it('names the argument that failed', () => {
    expect(() => validateAddressArg('0xabc', 'recipient')).toThrow('Invalid recipient address: 0xabc');
    expect(() => validateHashArg('0x1234')).toThrow('Invalid transaction hash: 0x1234');
  });

  it('parses positive integers only', () => {
    expect(parsePositiveInt('30')).toBe(30);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer, got "0"');
    expect(() => parsePositiveInt('1.5')).toThrow('Expected a positive integer');
    expect(() => parsePositiveInt('soon')).toThrow('Expected a positive integer');
  });
});
