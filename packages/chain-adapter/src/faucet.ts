import axios, { type AxiosInstance } from 'axios';
import type { Address } from 'viem';
import { ConfigurationError, ConnectivityError, createLogger, errorMessage, type Logger } from '@token-relay/core';
import { describeEndpoint } from './networks.js';
import type { FaucetResult, NetworkEndpoint } from './types.js';

const DEFAULT_FAUCET_TIMEOUT_MS = 30_000;

export interface FaucetClientOptions {
  http?: AxiosInstance;
  logger?: Logger;
}

/**
 * Requests test funds from the public faucet of a testnet endpoint.
 */
export class FaucetClient {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(
    private readonly endpoint: NetworkEndpoint,
    options: FaucetClientOptions = {}
  ) {
    this.http = options.http ?? axios.create({ timeout: DEFAULT_FAUCET_TIMEOUT_MS });
    this.logger = options.logger ?? createLogger('faucet');
  }

  /** Succeeds only on HTTP 200; the response body is ignored. */
  async requestTestnetTokens(address: Address): Promise<FaucetResult> {
    const { faucetUrl, network } = this.endpoint;
    if (!faucetUrl) {
      throw new ConfigurationError(`No faucet is available for ${describeEndpoint(this.endpoint)}`, 'FAUCET_UNAVAILABLE');
    }

    try {
      const response = await this.http.post(faucetUrl, { address, network }, { validateStatus: () => true });
      const success = response.status === 200;

      if (success) {
        this.logger.info('Faucet request accepted', { address, network });
      } else {
        this.logger.warn('Faucet request refused', { address, network, status: response.status });
      }
      return { success, status: response.status, network, address };
    } catch (error) {
      throw new ConnectivityError(`Faucet request to ${faucetUrl} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}
