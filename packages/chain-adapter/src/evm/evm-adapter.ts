import {
  createPublicClient,
  http,
  TransactionReceiptNotFoundError,
  type Address,
  type Hash,
  type TransactionSerialized,
  type TransactionReceipt as ViemTransactionReceipt,
} from 'viem';
import type { AdapterConstructorOptions, ChainAdapter } from '../adapter.js';
import type { ContractReadCall, GasEstimateRequest, TransactionReceipt } from '../types.js';

const DEFAULT_RPC_TIMEOUT_MS = 30_000;

function createClient(options: AdapterConstructorOptions) {
  return createPublicClient({
    transport: http(options.rpcUrl, { timeout: options.timeoutMs ?? DEFAULT_RPC_TIMEOUT_MS }),
  });
}

export function toTransactionReceipt(receipt: ViemTransactionReceipt): TransactionReceipt {
  return {
    transactionHash: receipt.transactionHash,
    blockHash: receipt.blockHash,
    blockNumber: receipt.blockNumber,
    from: receipt.from,
    to: receipt.to,
    contractAddress: receipt.contractAddress ?? null,
    gasUsed: receipt.gasUsed,
    effectiveGasPrice: receipt.effectiveGasPrice,
    status: receipt.status,
    logs: receipt.logs.map((log) => ({
      address: log.address,
      topics: [...log.topics],
      data: log.data,
      logIndex: log.logIndex,
    })),
  };
}

/**
 * viem-backed adapter for any EVM JSON-RPC endpoint.
 */
export class EvmAdapter implements ChainAdapter {
  private readonly publicClient: ReturnType<typeof createClient>;

  constructor(options: AdapterConstructorOptions) {
    this.publicClient = createClient(options);
  }

  async getChainId(): Promise<number> {
    return this.publicClient.getChainId();
  }

  async getTransactionCount(address: Address): Promise<number> {
    return this.publicClient.getTransactionCount({ address });
  }

  async getBalance(address: Address): Promise<bigint> {
    return this.publicClient.getBalance({ address });
  }

  async getGasPrice(): Promise<bigint> {
    return this.publicClient.getGasPrice();
  }

  async estimateGas(request: GasEstimateRequest): Promise<bigint> {
    return this.publicClient.estimateGas({
      account: request.from,
      to: request.to,
      data: request.data,
      nonce: request.nonce,
    });
  }

  async readContract(call: ContractReadCall): Promise<unknown> {
    return this.publicClient.readContract({
      address: call.address,
      abi: call.abi,
      functionName: call.functionName,
      args: call.args ?? [],
    });
  }

  async sendRawTransaction(serializedTransaction: TransactionSerialized): Promise<Hash> {
    return this.publicClient.sendRawTransaction({ serializedTransaction });
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    try {
      const receipt = await this.publicClient.getTransactionReceipt({ hash });
      return toTransactionReceipt(receipt);
    } catch (error) {
      if (error instanceof TransactionReceiptNotFoundError) {
        return null;
      }
      throw error;
    }
  }
}

export function createEvmAdapter(options: AdapterConstructorOptions): ChainAdapter {
  return new EvmAdapter(options);
}

export default EvmAdapter;
