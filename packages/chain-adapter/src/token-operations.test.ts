import { describe, it, expect } from 'vitest';
import { InvalidAmountError } from '@token-relay/core';
import { ChainConnector } from './connector.js';
import { Credential } from './credential.js';
import { TransactionOrchestrator } from './orchestrator.js';
import { TokenOperations, parseTokenAmount } from './token-operations.js';
import { InMemoryChain, ManualClock, TEST_PRIVATE_KEY } from './test-utils/in-memory-chain.js';

const TOKEN = '0x0000000000000000000000000000000000000c0c';
const HOLDER = '0x00000000000000000000000000000000000000aa';
const RECIPIENT = '0x00000000000000000000000000000000000000bb';

async function setup() {
  const chain = new InMemoryChain();
  const connector = await ChainConnector.connect(
    { chain: 'ethereum', network: 'sepolia', alchemyApiKey: 'test-key' },
    { adapterFactory: () => chain }
  );
  const credential = Credential.fromPrivateKey(TEST_PRIVATE_KEY);
  const orchestrator = new TransactionOrchestrator(connector, credential, { clock: new ManualClock() });
  return { chain, credential, orchestrator, tokens: new TokenOperations(connector, orchestrator) };
}

describe('parseTokenAmount', () => {
  it('scales decimal strings to base units', () => {
    expect(parseTokenAmount('1.5', 18)).toBe(1_500_000_000_000_000_000n);
    expect(parseTokenAmount('2.25', 6)).toBe(2_250_000n);
    expect(parseTokenAmount('42', 0)).toBe(42n);
  });

  it('rejects zero, negative and malformed amounts', () => {
    expect(() => parseTokenAmount('0', 6)).toThrow(InvalidAmountError);
    expect(() => parseTokenAmount('-1', 6)).toThrow(InvalidAmountError);
    expect(() => parseTokenAmount('1.', 6)).toThrow(InvalidAmountError);
    expect(() => parseTokenAmount('abc', 6)).toThrow(InvalidAmountError);
  });

  it('rejects more fractional digits than the token has', () => {
    expect(() => parseTokenAmount('0.1', 0)).toThrow('Invalid token amount "0.1": token supports at most 0 decimal places');
    expect(() => parseTokenAmount('1.1234567', 6)).toThrow(InvalidAmountError);
  });
});

describe('TokenOperations', () => {
  it.each([
    { decimals: 18, raw: 1_234_500_000_000_000_000n, formatted: '1.2345' },
    { decimals: 6, raw: 2_500_000n, formatted: '2.5' },
    { decimals: 0, raw: 7n, formatted: '7' },
  ])('formats a balance with $decimals decimals', async ({ decimals, raw, formatted }) => {
    const { chain, tokens } = await setup();
    chain.addToken(TOKEN, decimals, { [HOLDER]: raw });

    await expect(tokens.balanceOf(TOKEN, HOLDER)).resolves.toEqual({
      token: TOKEN,
      holder: HOLDER,
      raw,
      decimals,
      formatted,
    });
  });

  it('reports zero for an address with no balance', async () => {
    const { chain, tokens } = await setup();
    chain.addToken(TOKEN, 18);
    const balance = await tokens.balanceOf(TOKEN, RECIPIENT);
    expect(balance.raw).toBe(0n);
    expect(balance.formatted).toBe('0');
  });

  it('transfers and conserves the total supply', async () => {
    const { chain, credential, tokens } = await setup();
    chain.addToken(TOKEN, 6, { [credential.address]: 10_000_000n });

    const hash = await tokens.transfer({ token: TOKEN, to: RECIPIENT, amount: '2.5' });

    expect(hash).toMatch(/^0x[0-9a-f]{64}$/);
    expect(chain.tokenBalance(TOKEN, credential.address)).toBe(7_500_000n);
    expect(chain.tokenBalance(TOKEN, RECIPIENT)).toBe(2_500_000n);
    expect(chain.estimateGasRequests).toHaveLength(1);
    expect(chain.estimateGasRequests[0]?.to).toBe(TOKEN);
    expect(chain.estimateGasRequests[0]?.data?.slice(0, 10)).toBe('0xa9059cbb');
  });

  it('moves exactly the amount once confirmed and reads the same balances again', async () => {
    const { chain, credential, orchestrator, tokens } = await setup();
    chain.addToken(TOKEN, 18, { [credential.address]: 10_000_000_000_000_000_000n });
    const senderBefore = await tokens.balanceOf(TOKEN, credential.address);
    const recipientBefore = await tokens.balanceOf(TOKEN, RECIPIENT);
    const amount = parseTokenAmount('3.25', 18);

    const hash = await tokens.transfer({ token: TOKEN, to: RECIPIENT, amount: '3.25' });
    const receipt = await orchestrator.awaitConfirmation(hash);
    expect(receipt.status).toBe('success');

    const sender = await tokens.balanceOf(TOKEN, credential.address);
    const recipient = await tokens.balanceOf(TOKEN, RECIPIENT);
    expect(senderBefore.raw - sender.raw).toBe(amount);
    expect(recipient.raw - recipientBefore.raw).toBe(amount);
    expect(sender.formatted).toBe('6.75');
    expect(recipient.formatted).toBe('3.25');

    await expect(tokens.balanceOf(TOKEN, credential.address)).resolves.toEqual(sender);
    await expect(tokens.balanceOf(TOKEN, RECIPIENT)).resolves.toEqual(recipient);
  });

  it('returns before confirmation, leaving the outcome to awaitConfirmation', async () => {
    const { chain, credential, orchestrator, tokens } = await setup();
    chain.addToken(TOKEN, 6, { [credential.address]: 1_000_000n });

    const hash = await tokens.transfer({ token: TOKEN, to: RECIPIENT, amount: '5' });
    const receipt = await orchestrator.awaitConfirmation(hash);

    expect(receipt.status).toBe('reverted');
    expect(chain.tokenBalance(TOKEN, credential.address)).toBe(1_000_000n);
  });

  it('validates the amount before building a transaction', async () => {
    const { chain, credential, tokens } = await setup();
    chain.addToken(TOKEN, 6, { [credential.address]: 1_000_000n });

    await expect(tokens.transfer({ token: TOKEN, to: RECIPIENT, amount: '0.0000001' })).rejects.toBeInstanceOf(
      InvalidAmountError
    );
    expect(chain.rawTransactions).toEqual([]);
  });
});
