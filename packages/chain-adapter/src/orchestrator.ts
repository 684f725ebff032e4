import {
  encodeDeployData,
  isAddressEqual,
  keccak256,
  parseTransaction,
  type Abi,
  type Address,
  type Hash,
  type Hex,
  type TransactionSerializable,
  type TransactionSerialized,
} from 'viem';
import {
  ConfigurationError,
  ConfirmationCancelledError,
  ConfirmationTimeoutError,
  ConnectivityError,
  ContractDeploymentError,
  NetworkRejectionError,
  SigningError,
  createLogger,
  errorMessage,
  type Logger,
} from '@token-relay/core';
import { systemClock, type Clock } from './clock.js';
import type { ChainConnector } from './connector.js';
import type { Credential } from './credential.js';
import { assertKnownTransactionFields } from './transaction-fields.js';
import type {
  DeploymentResult,
  GasEstimateRequest,
  SignedTransaction,
  TransactionOverrides,
  TransactionReceipt,
  UnsignedTransaction,
} from './types.js';

const DEFAULT_POLL_INTERVAL_MS = 2000;
const DEFAULT_TIMEOUT_SECONDS = 120;

export interface OrchestratorOptions {
  clock?: Clock;
  logger?: Logger;
  pollIntervalMs?: number;
  defaultTimeoutSeconds?: number;
}

export interface AwaitConfirmationOptions {
  timeoutSeconds?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface DeployContractParams {
  abi: Abi;
  bytecode: Hex;
  args?: readonly unknown[];
  timeoutSeconds?: number;
  overrides?: TransactionOverrides;
}

function hasFeeMarketFields(fields: TransactionOverrides | UnsignedTransaction): boolean {
  return fields.maxFeePerGas !== undefined || fields.maxPriorityFeePerGas !== undefined;
}

function toSerializable(transaction: UnsignedTransaction): TransactionSerializable {
  const common = {
    chainId: transaction.chainId,
    nonce: transaction.nonce,
    gas: transaction.gas,
    to: transaction.to,
    value: transaction.value,
    data: transaction.data,
  };

  if (hasFeeMarketFields(transaction)) {
    if (transaction.gasPrice !== undefined) {
      throw new SigningError('gasPrice cannot be combined with maxFeePerGas or maxPriorityFeePerGas');
    }
    return {
      ...common,
      type: 'eip1559',
      maxFeePerGas: transaction.maxFeePerGas,
      maxPriorityFeePerGas: transaction.maxPriorityFeePerGas,
    };
  }

  return { ...common, type: 'legacy', gasPrice: transaction.gasPrice };
}

/**
 * Drives a transaction through build, sign, broadcast and confirmation for a
 * single credential. Holds no record of in-flight transactions: callers that
 * need to resume persist the hash and call `awaitConfirmation` themselves.
 */
export class TransactionOrchestrator {
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly defaultTimeoutSeconds: number;

  constructor(
    private readonly connector: ChainConnector,
    private readonly credential: Credential,
    options: OrchestratorOptions = {}
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('transaction-orchestrator');
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
  }

  get address(): Address {
    return this.credential.address;
  }

  async buildTransaction(from: Address, overrides: TransactionOverrides = {}): Promise<UnsignedTransaction> {
    assertKnownTransactionFields(overrides);

    const sender = overrides.from ?? from;
    const nonce = overrides.nonce ?? (await this.connector.currentNonce(sender));

    let gas = overrides.gas;
    if (gas === undefined) {
      // value and fee fields never reach the estimate
      const request: GasEstimateRequest = {
        from: sender,
        nonce,
        ...(overrides.to !== undefined ? { to: overrides.to } : {}),
        ...(overrides.data !== undefined ? { data: overrides.data } : {}),
      };
      gas = await this.connector.estimateGas(request);
    }

    let gasPrice = overrides.gasPrice;
    if (gasPrice === undefined && !hasFeeMarketFields(overrides)) {
      gasPrice = await this.connector.currentGasPrice();
    }

    const transaction: UnsignedTransaction = {
      ...overrides,
      chainId: this.connector.chainId,
      from: sender,
      nonce,
      gas,
      ...(gasPrice !== undefined ? { gasPrice } : {}),
    };

    this.logger.debug('Transaction built', { from: sender, to: transaction.to, nonce, gas: gas.toString() });
    return Object.freeze(transaction);
  }

  async sign(transaction: UnsignedTransaction): Promise<SignedTransaction> {
    if (!isAddressEqual(transaction.from, this.credential.address)) {
      throw new SigningError(`Transaction sender ${transaction.from} does not match the signing key`, {
        context: { from: transaction.from, signer: this.credential.address },
      });
    }

    const serializable = toSerializable(transaction);

    let rawTransaction: TransactionSerialized;
    try {
      rawTransaction = await this.credential.signTransaction(serializable);
    } catch (error) {
      throw new SigningError(`Failed to sign transaction: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = parseTransaction(rawTransaction);
    if (parsed.r === undefined || parsed.s === undefined) {
      throw new SigningError('Signed transaction carries no signature');
    }

    return Object.freeze({
      transaction,
      rawTransaction,
      hash: keccak256(rawTransaction),
      r: parsed.r,
      s: parsed.s,
      v: parsed.v ?? BigInt(parsed.yParity ?? 0),
    });
  }

  async broadcast(signed: SignedTransaction): Promise<Hash> {
    try {
      const hash = await this.connector.sendRawTransaction(signed.rawTransaction);
      this.logger.info('Transaction broadcast', { hash, nonce: signed.transaction.nonce });
      return hash;
    } catch (error) {
      this.logger.error('Transaction rejected', { hash: signed.hash, error: errorMessage(error) });
      throw new NetworkRejectionError(`Transaction rejected by the network: ${errorMessage(error)}`, signed.hash, {
        cause: error,
      });
    }
  }

  /**
   * Poll for the receipt until it appears, the deadline passes or `signal`
   * aborts. A timeout means the outcome is unknown, not that it failed.
   */
  async awaitConfirmation(hash: Hash, options: AwaitConfirmationOptions = {}): Promise<TransactionReceipt> {
    const timeoutSeconds = options.timeoutSeconds ?? this.defaultTimeoutSeconds;
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    const { signal } = options;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds < 0) {
      throw new ConfigurationError(`timeoutSeconds must be a non-negative number, got ${timeoutSeconds}`);
    }
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new ConfigurationError(`pollIntervalMs must be a positive number, got ${pollIntervalMs}`);
    }
    const deadline = this.clock.now() + timeoutSeconds * 1000;

    for (;;) {
      if (signal?.aborted) {
        throw new ConfirmationCancelledError(hash, { cause: signal.reason });
      }

      let receipt: TransactionReceipt | null;
      try {
        receipt = await this.connector.getTransactionReceipt(hash);
      } catch (error) {
        throw new ConnectivityError(`Failed to fetch receipt for ${hash}: ${errorMessage(error)}`, { cause: error });
      }

      if (receipt) {
        this.logger.info('Transaction confirmed', {
          hash,
          blockNumber: receipt.blockNumber.toString(),
          status: receipt.status,
        });
        return receipt;
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        this.logger.warn('Transaction not confirmed before deadline', { hash, timeoutSeconds });
        throw new ConfirmationTimeoutError(hash, timeoutSeconds);
      }

      try {
        await this.clock.sleep(Math.min(pollIntervalMs, remaining), signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new ConfirmationCancelledError(hash, { cause: error });
        }
        throw error;
      }
    }
  }

  async send(from: Address, overrides: TransactionOverrides = {}): Promise<Hash> {
    const transaction = await this.buildTransaction(from, overrides);
    const signed = await this.sign(transaction);
    return this.broadcast(signed);
  }

  async deployContract(params: DeployContractParams): Promise<DeploymentResult> {
    const data = encodeDeployData({ abi: params.abi, bytecode: params.bytecode, args: params.args ?? [] });
    const hash = await this.send(this.credential.address, { ...params.overrides, data });

    const receipt = await this.awaitConfirmation(hash, { timeoutSeconds: params.timeoutSeconds });

    if (receipt.status !== 'success') {
      throw new ContractDeploymentError(`Deployment transaction ${hash} reverted`, hash);
    }
    if (!receipt.contractAddress) {
      throw new ContractDeploymentError(`Deployment receipt for ${hash} has no contract address`, hash);
    }

    this.logger.info('Contract deployed', { contractAddress: receipt.contractAddress, hash });
    return { contractAddress: receipt.contractAddress, transactionHash: hash, receipt };
  }
}
