import {
  decodeFunctionData,
  erc20Abi,
  getContractAddress,
  keccak256,
  parseTransaction,
  recoverTransactionAddress,
  toHex,
  type Address,
  type Hash,
  type Hex,
  type TransactionSerialized,
} from 'viem';
import type { ChainAdapter } from '../adapter.js';
import type { Clock } from '../clock.js';
import type { ContractReadCall, GasEstimateRequest, TransactionReceipt } from '../types.js';

export interface InMemoryChainOptions {
  chainId?: number;
  gasPrice?: bigint;
  gasEstimate?: bigint;
  /** Mine every accepted transaction immediately. Defaults to true. */
  autoMine?: boolean;
}

interface TokenLedger {
  decimals: number;
  balances: Map<string, bigint>;
}

/**
 * In-process chain behind the ChainAdapter port. Verifies signatures and
 * nonces of raw transactions and keeps ERC-20 ledgers for registered tokens.
 */
export class InMemoryChain implements ChainAdapter {
  readonly chainId: number;
  gasPrice: bigint;
  gasEstimate: bigint;
  autoMine: boolean;
  reachable = true;

  readonly estimateGasRequests: GasEstimateRequest[] = [];
  readonly rawTransactions: TransactionSerialized[] = [];
  receiptLookups = 0;

  private blockNumber = 100n;
  private rejection: string | undefined;
  private readonly nonces = new Map<string, number>();
  private readonly nativeBalances = new Map<string, bigint>();
  private readonly tokens = new Map<string, TokenLedger>();
  private readonly pending = new Map<Hash, TransactionReceipt>();
  private readonly receipts = new Map<Hash, TransactionReceipt>();

  constructor(options: InMemoryChainOptions = {}) {
    this.chainId = options.chainId ?? 11155111;
    this.gasPrice = options.gasPrice ?? 1_000_000_000n;
    this.gasEstimate = options.gasEstimate ?? 21_000n;
    this.autoMine = options.autoMine ?? true;
  }

  setNonce(address: Address, nonce: number): void {
    this.nonces.set(address.toLowerCase(), nonce);
  }

  setNativeBalance(address: Address, balance: bigint): void {
    this.nativeBalances.set(address.toLowerCase(), balance);
  }

  addToken(token: Address, decimals: number, balances: Record<string, bigint> = {}): void {
    this.tokens.set(token.toLowerCase(), {
      decimals,
      balances: new Map(Object.entries(balances).map(([holder, amount]) => [holder.toLowerCase(), amount])),
    });
  }

  tokenBalance(token: Address, holder: Address): bigint {
    return this.tokens.get(token.toLowerCase())?.balances.get(holder.toLowerCase()) ?? 0n;
  }

  rejectNextBroadcast(message: string): void {
    this.rejection = message;
  }

  /** Moves every pending transaction into a new block. */
  mine(): void {
    this.blockNumber += 1n;
    for (const [hash, receipt] of this.pending) {
      this.receipts.set(hash, { ...receipt, blockNumber: this.blockNumber, blockHash: keccak256(toHex(this.blockNumber)) });
    }
    this.pending.clear();
  }

  async getChainId(): Promise<number> {
    this.assertReachable();
    return this.chainId;
  }

  async getTransactionCount(address: Address): Promise<number> {
    this.assertReachable();
    return this.nonces.get(address.toLowerCase()) ?? 0;
  }

  async getBalance(address: Address): Promise<bigint> {
    this.assertReachable();
    return this.nativeBalances.get(address.toLowerCase()) ?? 0n;
  }

  async getGasPrice(): Promise<bigint> {
    this.assertReachable();
    return this.gasPrice;
  }

  async estimateGas(request: GasEstimateRequest): Promise<bigint> {
    this.assertReachable();
    this.estimateGasRequests.push(request);
    return this.gasEstimate;
  }

  async readContract(call: ContractReadCall): Promise<unknown> {
    this.assertReachable();
    const ledger = this.tokens.get(call.address.toLowerCase());
    if (!ledger) {
      throw new Error('execution reverted');
    }

    if (call.functionName === 'decimals') {
      return ledger.decimals;
    }
    if (call.functionName === 'balanceOf') {
      const [holder] = call.args ?? [];
      return typeof holder === 'string' ? (ledger.balances.get(holder.toLowerCase()) ?? 0n) : 0n;
    }
    throw new Error(`function "${call.functionName}" is not supported`);
  }

  async sendRawTransaction(serializedTransaction: TransactionSerialized): Promise<Hash> {
    this.assertReachable();
    if (this.rejection !== undefined) {
      const message = this.rejection;
      this.rejection = undefined;
      throw new Error(message);
    }

    const transaction = parseTransaction(serializedTransaction);
    const from = await recoverTransactionAddress({ serializedTransaction });
    const nonce = transaction.nonce ?? 0;
    const expected = this.nonces.get(from.toLowerCase()) ?? 0;
    if (nonce < expected) {
      throw new Error('nonce too low');
    }
    if (nonce > expected) {
      throw new Error('nonce too high');
    }
    if (transaction.chainId !== undefined && transaction.chainId !== this.chainId) {
      throw new Error('invalid chain id');
    }

    const hash = keccak256(serializedTransaction);
    this.nonces.set(from.toLowerCase(), nonce + 1);
    this.rawTransactions.push(serializedTransaction);

    const to = transaction.to ?? null;
    let status: TransactionReceipt['status'] = 'success';
    if (to && transaction.data) {
      status = this.applyTokenCall(to, from, transaction.data);
    }

    const receipt: TransactionReceipt = {
      transactionHash: hash,
      blockHash: keccak256(toHex(this.blockNumber)),
      blockNumber: this.blockNumber,
      from,
      to,
      contractAddress: to ? null : getContractAddress({ from, nonce: BigInt(nonce) }),
      gasUsed: transaction.gas ?? 0n,
      effectiveGasPrice: transaction.gasPrice ?? transaction.maxFeePerGas ?? 0n,
      status,
      logs: [],
    };

    this.pending.set(hash, receipt);
    if (this.autoMine) {
      this.mine();
    }
    return hash;
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    this.assertReachable();
    this.receiptLookups += 1;
    return this.receipts.get(hash) ?? null;
  }

  private applyTokenCall(token: Address, from: Address, data: Hex): TransactionReceipt['status'] {
    const ledger = this.tokens.get(token.toLowerCase());
    if (!ledger) {
      return 'success';
    }

    const call = decodeFunctionData({ abi: erc20Abi, data });
    if (call.functionName !== 'transfer') {
      return 'reverted';
    }

    const [recipient, amount] = call.args;
    const senderBalance = ledger.balances.get(from.toLowerCase()) ?? 0n;
    if (senderBalance < amount) {
      return 'reverted';
    }
    ledger.balances.set(from.toLowerCase(), senderBalance - amount);
    ledger.balances.set(recipient.toLowerCase(), (ledger.balances.get(recipient.toLowerCase()) ?? 0n) + amount);
    return 'success';
  }

  private assertReachable(): void {
    if (!this.reachable) {
      throw new Error('fetch failed: connect ECONNREFUSED');
    }
  }
}

/**
 * Clock whose time only moves when something sleeps on it.
 */
export class ManualClock implements Clock {
  current = 0;
  readonly sleeps: number[] = [];
  onSleep: ((ms: number) => void) | undefined;

  now(): number {
    return this.current;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new Error('The operation was aborted');
    }
    this.sleeps.push(ms);
    this.current += ms;
    this.onSleep?.(ms);
  }
}

export const TEST_PRIVATE_KEY: Hex = `0x${'11'.repeat(32)}`;
