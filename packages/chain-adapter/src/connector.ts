import type { Address, Hash, TransactionSerialized } from 'viem';
import { ConnectivityError, createLogger, errorMessage, type Logger } from '@token-relay/core';
import type { ChainAdapter, ChainAdapterFactory } from './adapter.js';
import { createEvmAdapter } from './evm/evm-adapter.js';
import { describeEndpoint, resolveNetworkEndpoint } from './networks.js';
import type {
  ContractReadCall,
  GasEstimateRequest,
  NetworkEndpoint,
  TransactionReceipt,
} from './types.js';

export interface ConnectParams {
  chain: string;
  network: string;
  alchemyApiKey?: string;
  rpcUrl?: string;
}

export interface ConnectorOptions {
  adapterFactory?: ChainAdapterFactory;
  logger?: Logger;
  timeoutMs?: number;
}

/**
 * A live session against one network. Only `connect` builds it, so holding a
 * connector means the endpoint answered and reported the expected chain id.
 */
export class ChainConnector {
  private constructor(
    readonly endpoint: NetworkEndpoint,
    private readonly adapter: ChainAdapter,
    private readonly logger: Logger
  ) {}

  static async connect(params: ConnectParams, options: ConnectorOptions = {}): Promise<ChainConnector> {
    const endpoint = resolveNetworkEndpoint(params.chain, params.network, {
      alchemyApiKey: params.alchemyApiKey,
      rpcUrl: params.rpcUrl,
    });
    const logger = (options.logger ?? createLogger('chain-connector')).child({
      network: describeEndpoint(endpoint),
    });
    const adapter = (options.adapterFactory ?? createEvmAdapter)({
      rpcUrl: endpoint.rpcUrl,
      timeoutMs: options.timeoutMs,
    });

    let chainId: number;
    try {
      chainId = await adapter.getChainId();
    } catch (error) {
      logger.error('RPC endpoint unreachable', { error: errorMessage(error) });
      throw new ConnectivityError(`Could not connect to ${describeEndpoint(endpoint)}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (chainId !== endpoint.chainId) {
      throw new ConnectivityError(
        `Endpoint for ${describeEndpoint(endpoint)} reported chain id ${chainId}, expected ${endpoint.chainId}`,
        { context: { expected: endpoint.chainId, actual: chainId } }
      );
    }

    logger.info('Connected to RPC endpoint', { chainId });
    return new ChainConnector(endpoint, adapter, logger);
  }

  get chainId(): number {
    return this.endpoint.chainId;
  }

  async isConnected(): Promise<boolean> {
    try {
      return (await this.adapter.getChainId()) === this.endpoint.chainId;
    } catch (error) {
      this.logger.warn('Connectivity check failed', { error: errorMessage(error) });
      return false;
    }
  }

  /** Confirmed transaction count of `address`, i.e. its next nonce. */
  async currentNonce(address: Address): Promise<number> {
    return this.adapter.getTransactionCount(address);
  }

  async estimateGas(request: GasEstimateRequest): Promise<bigint> {
    return this.adapter.estimateGas(request);
  }

  async currentGasPrice(): Promise<bigint> {
    return this.adapter.getGasPrice();
  }

  async nativeBalance(address: Address): Promise<bigint> {
    return this.adapter.getBalance(address);
  }

  async readContract(call: ContractReadCall): Promise<unknown> {
    return this.adapter.readContract(call);
  }

  async sendRawTransaction(serializedTransaction: TransactionSerialized): Promise<Hash> {
    return this.adapter.sendRawTransaction(serializedTransaction);
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    return this.adapter.getTransactionReceipt(hash);
  }
}
