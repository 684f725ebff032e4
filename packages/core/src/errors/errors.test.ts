import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  ConfirmationTimeoutError,
  InvalidTransactionFieldError,
  NetworkRejectionError,
  TokenRelayError,
  UnsupportedNetworkError,
  errorMessage,
  isTokenRelayError,
} from './index.js';

describe('error taxonomy', () => {
  it('classifies unsupported networks as configuration errors', () => {
    const error = new UnsupportedNetworkError('ropsten', ['mainnet', 'sepolia']);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toBeInstanceOf(TokenRelayError);
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('UNSUPPORTED_NETWORK');
    expect(error.message).toBe('Unsupported network type "ropsten". Supported networks are: mainnet, sepolia.');
  });

  it('reports every received key alongside the offending ones', () => {
    const error = new InvalidTransactionFieldError({ foo: 1 }, ['data', 'foo'], ['data', 'value']);

    expect(error.invalidFields).toEqual({ foo: 1 });
    expect(error.receivedFields).toEqual(['data', 'foo']);
    expect(error.message).toBe(
      'One or more transaction fields are invalid: foo. Received: data, foo. Allowed: data, value.'
    );
  });

  it('does not present a confirmation timeout as a failed transaction', () => {
    const error = new ConfirmationTimeoutError('0xabc', 15);

    expect(error.code).toBe('CONFIRMATION_TIMEOUT');
    expect(error.message).toBe('Transaction 0xabc was not confirmed within 15 seconds; it may still be pending.');
  });

  it('serializes the cause message without the stack', () => {
    const error = new NetworkRejectionError('rejected', '0xabc', { cause: new Error('nonce too low') });

    expect(error.toJSON()).toEqual({
      name: 'NetworkRejectionError',
      code: 'NETWORK_REJECTION',
      message: 'rejected',
      context: { transactionHash: '0xabc' },
      cause: 'nonce too low',
    });
  });

  it('recognizes its own errors', () => {
    expect(isTokenRelayError(new ConfigurationError('bad'))).toBe(true);
    expect(isTokenRelayError(new Error('plain'))).toBe(false);
    expect(errorMessage('text')).toBe('text');
  });
});
