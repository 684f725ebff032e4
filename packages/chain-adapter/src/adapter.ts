import type { Address, Hash, TransactionSerialized } from 'viem';
import type { ContractReadCall, GasEstimateRequest, TransactionReceipt } from './types.js';

/**
 * Raw JSON-RPC surface of one network. Every call goes straight to the node;
 * nothing is cached or retried here.
 */
export interface ChainAdapter {
  getChainId(): Promise<number>;

  // Read helpers
  getTransactionCount(address: Address): Promise<number>;
  getBalance(address: Address): Promise<bigint>;
  getGasPrice(): Promise<bigint>;
  estimateGas(request: GasEstimateRequest): Promise<bigint>;
  readContract(call: ContractReadCall): Promise<unknown>;

  // Broadcast & confirm
  sendRawTransaction(serializedTransaction: TransactionSerialized): Promise<Hash>;
  /** Resolves to null while the transaction is not yet mined. */
  getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null>;
}

export type AdapterConstructorOptions = {
  rpcUrl: string;
  timeoutMs?: number;
};

export type ChainAdapterFactory = (options: AdapterConstructorOptions) => ChainAdapter;
