import type { Abi, Address, Hash, Hex, TransactionSerialized } from 'viem';

export type ChainName = 'ethereum';
export type NetworkType = 'mainnet' | 'sepolia';

export interface NetworkEndpoint {
  readonly chain: ChainName;
  readonly network: NetworkType;
  readonly chainId: number;
  /** Embeds the provider API key; never log it. */
  readonly rpcUrl: string;
  readonly isTestnet: boolean;
  readonly faucetUrl?: string;
}

/**
 * Caller-supplied transaction fields. Anything left out is filled from the
 * chain when the transaction is built.
 */
export interface TransactionOverrides {
  from?: Address;
  to?: Address;
  gas?: bigint;
  gasPrice?: bigint;
  nonce?: number;
  data?: Hex;
  value?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
}

/** The partial transaction gas is estimated against. */
export interface GasEstimateRequest {
  from: Address;
  nonce: number;
  to?: Address;
  data?: Hex;
}

export interface UnsignedTransaction {
  readonly chainId: number;
  readonly from: Address;
  readonly nonce: number;
  readonly gas: bigint;
  readonly gasPrice?: bigint;
  readonly maxFeePerGas?: bigint;
  readonly maxPriorityFeePerGas?: bigint;
  readonly to?: Address;
  readonly value?: bigint;
  readonly data?: Hex;
}

export interface SignedTransaction {
  readonly transaction: UnsignedTransaction;
  readonly rawTransaction: TransactionSerialized;
  readonly hash: Hash;
  readonly r: Hex;
  readonly s: Hex;
  readonly v: bigint;
}

export interface ReceiptLog {
  address: Address;
  topics: Hex[];
  data: Hex;
  logIndex: number | null;
}

export interface TransactionReceipt {
  transactionHash: Hash;
  blockHash: Hash;
  blockNumber: bigint;
  from: Address;
  to: Address | null;
  contractAddress: Address | null;
  gasUsed: bigint;
  effectiveGasPrice: bigint;
  status: 'success' | 'reverted';
  logs: ReceiptLog[];
}

export interface ContractReadCall {
  address: Address;
  abi: Abi;
  functionName: string;
  args?: readonly unknown[];
}

export interface TokenBalance {
  token: Address;
  holder: Address;
  raw: bigint;
  decimals: number;
  /** `raw / 10^decimals` as an exact decimal string */
  formatted: string;
}

export interface DeploymentResult {
  contractAddress: Address;
  transactionHash: Hash;
  receipt: TransactionReceipt;
}

export interface FaucetResult {
  success: boolean;
  status: number;
  network: NetworkType;
  address: Address;
}
