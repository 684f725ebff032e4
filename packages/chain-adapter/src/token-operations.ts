import { encodeFunctionData, erc20Abi, formatUnits, parseUnits, type Address, type Hash } from 'viem';
import { z } from 'zod';
import { AmountSchema, ConnectivityError, InvalidAmountError, createLogger, type Logger } from '@token-relay/core';
import type { ChainConnector } from './connector.js';
import type { TransactionOrchestrator } from './orchestrator.js';
import type { TokenBalance, TransactionOverrides } from './types.js';

const RawBalanceSchema = z.bigint();
const DecimalsSchema = z.union([z.number().int(), z.bigint()]).transform((value) => Number(value));

export interface TokenTransferParams {
  token: Address;
  to: Address;
  /** Human-readable decimal amount, e.g. "12.5" */
  amount: string;
  from?: Address;
  overrides?: Omit<TransactionOverrides, 'to' | 'data'>;
}

/**
 * Scale a decimal string to the token's base unit.
 */
export function parseTokenAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();
  if (!AmountSchema.safeParse(trimmed).success) {
    throw new InvalidAmountError(amount, 'must be a positive decimal number');
  }

  const fraction = trimmed.split('.')[1] ?? '';
  if (fraction.length > decimals) {
    throw new InvalidAmountError(amount, `token supports at most ${decimals} decimal places`);
  }

  const value = parseUnits(trimmed, decimals);
  if (value <= 0n) {
    throw new InvalidAmountError(amount, 'must be greater than zero');
  }
  return value;
}

/**
 * ERC-20 reads. Needs no signing key. Nothing is cached: decimals are read
 * again on every call.
 */
export class TokenReader {
  constructor(protected readonly connector: ChainConnector) {}

  async decimals(token: Address): Promise<number> {
    const result = await this.connector.readContract({ address: token, abi: erc20Abi, functionName: 'decimals' });
    const parsed = DecimalsSchema.safeParse(result);
    if (!parsed.success) {
      throw new ConnectivityError(`Token ${token} returned an invalid decimals value`);
    }
    return parsed.data;
  }

  async balanceOf(token: Address, holder: Address): Promise<TokenBalance> {
    const result = await this.connector.readContract({
      address: token,
      abi: erc20Abi,
      functionName: 'balanceOf',
      args: [holder],
    });
    const raw = RawBalanceSchema.safeParse(result);
    if (!raw.success) {
      throw new ConnectivityError(`Token ${token} returned an invalid balance`);
    }

    const decimals = await this.decimals(token);
    return {
      token,
      holder,
      raw: raw.data,
      decimals,
      formatted: formatUnits(raw.data, decimals),
    };
  }
}

/**
 * Reads plus transfers signed by the orchestrator's credential.
 */
export class TokenOperations extends TokenReader {
  private readonly logger: Logger;

  constructor(
    connector: ChainConnector,
    private readonly orchestrator: TransactionOrchestrator,
    logger?: Logger
  ) {
    super(connector);
    this.logger = logger ?? createLogger('token-operations');
  }

  /**
   * Broadcast an ERC-20 `transfer` and return its hash without waiting for
   * a receipt.
   */
  async transfer(params: TokenTransferParams): Promise<Hash> {
    const decimals = await this.decimals(params.token);
    const value = parseTokenAmount(params.amount, decimals);
    const data = encodeFunctionData({ abi: erc20Abi, functionName: 'transfer', args: [params.to, value] });

    const hash = await this.orchestrator.send(params.from ?? this.orchestrator.address, {
      ...params.overrides,
      to: params.token,
      data,
    });

    this.logger.info('Token transfer broadcast', {
      token: params.token,
      to: params.to,
      amount: params.amount,
      hash,
    });
    return hash;
  }
}
