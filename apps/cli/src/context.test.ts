import { describe, it, expect } from 'vitest';
import { InMemoryChain } from '@token-relay/chain-adapter/test-utils';
import { ConfigurationError } from '@token-relay/core';
import { openReadSession, openSession, resolveTarget } from './context.js';
import { getCliEnv } from './env.js';

const TOKEN = '0x0000000000000000000000000000000000000c0c';
const HOLDER = '0x00000000000000000000000000000000000000aa';

describe('sessions', () => {
  const env = getCliEnv({ ALCHEMY_API_KEY: 'test-key' });

  it('takes the target from flags before the environment', async () => {
    const fromEnv = getCliEnv({ CHAIN: 'ethereum', NETWORK: 'mainnet' });
    await expect(resolveTarget({ network: 'sepolia' }, fromEnv)).resolves.toEqual({
      chain: 'ethereum',
      network: 'sepolia',
    });
  });

  it('reads balances without a private key', async () => {
    const chain = new InMemoryChain();
    chain.addToken(TOKEN, 6, { [HOLDER]: 1_500_000n });

    const session = await openReadSession({ chain: 'ethereum', network: 'sepolia' }, env, {
      adapterFactory: () => chain,
    });

    await expect(session.tokens.balanceOf(TOKEN, HOLDER)).resolves.toMatchObject({ raw: 1_500_000n, formatted: '1.5' });
  });

  it('requires a private key to sign', async () => {
    const chain = new InMemoryChain();
    await expect(
      openSession({ chain: 'ethereum', network: 'sepolia' }, env, { adapterFactory: () => chain })
    ).rejects.toBeInstanceOf(ConfigurationError);
  });
});
