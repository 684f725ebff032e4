import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@token-relay/core';
import { getBackendEnv } from './env.js';

describe('getBackendEnv', () => {
  it('applies defaults', () => {
    expect(getBackendEnv({})).toEqual({
      NODE_ENV: 'development',
      PORT: 8000,
      CORS_ORIGIN: '*',
      CHAIN: 'ethereum',
      NETWORK: 'sepolia',
      CONFIRMATION_TIMEOUT_SECONDS: 120,
      RECEIPT_POLL_INTERVAL_MS: 2000,
    });
  });

  it('treats blank values as unset', () => {
    const env = getBackendEnv({ PRIVATE_KEY: '', RPC_URL: '', WEBHOOK_SIGNING_KEY: '' });
    expect(env.PRIVATE_KEY).toBeUndefined();
    expect(env.RPC_URL).toBeUndefined();
    expect(env.WEBHOOK_SIGNING_KEY).toBeUndefined();
  });

  it('coerces numeric settings', () => {
    const env = getBackendEnv({ PORT: '3000', CONFIRMATION_TIMEOUT_SECONDS: '30' });
    expect(env.PORT).toBe(3000);
    expect(env.CONFIRMATION_TIMEOUT_SECONDS).toBe(30);
  });

  it('lists every invalid variable', () => {
    expect(() => getBackendEnv({ PORT: 'abc', PRIVATE_KEY: '0x1234' })).toThrow(ConfigurationError);
    expect(() => getBackendEnv({ PORT: 'abc', PRIVATE_KEY: '0x1234' })).toThrow(/PORT: .*; PRIVATE_KEY: /);
  });
});
