import { ConfigurationError, UnsupportedChainError, UnsupportedNetworkError } from '@token-relay/core';
import type { ChainName, NetworkEndpoint, NetworkType } from './types.js';

/**
 * Network configuration for the supported Ethereum networks
 */
export interface NetworkConfig {
  chainId: number;
  name: string;
  alchemyUrl: (apiKey: string) => string;
  faucetUrl?: string;
  isTestnet: boolean;
}

export const SUPPORTED_CHAINS: readonly ChainName[] = ['ethereum'];

export const NETWORK_CONFIGS: Record<NetworkType, NetworkConfig> = {
  mainnet: {
    chainId: 1,
    name: 'Ethereum Mainnet',
    alchemyUrl: (apiKey) => `https://eth-mainnet.alchemyapi.io/v2/${apiKey}`,
    isTestnet: false,
  },
  sepolia: {
    chainId: 11155111,
    name: 'Sepolia Testnet',
    alchemyUrl: (apiKey) => `https://eth-sepolia.g.alchemy.com/v2/${apiKey}`,
    faucetUrl: 'https://faucets.chain.link/sepolia',
    isTestnet: true,
  },
};

export const SUPPORTED_NETWORKS: readonly string[] = Object.keys(NETWORK_CONFIGS);

export interface EndpointOptions {
  alchemyApiKey?: string;
  /** Takes precedence over the Alchemy URL, e.g. for a local node. */
  rpcUrl?: string;
}

function isChainName(value: string): value is ChainName {
  return SUPPORTED_CHAINS.some((chain) => chain === value);
}

function isNetworkType(value: string): value is NetworkType {
  return Object.hasOwn(NETWORK_CONFIGS, value);
}

/**
 * Resolve a (chain, network) pair to its single RPC endpoint. Pure: fails
 * on unsupported pairs without touching the network.
 */
export function resolveNetworkEndpoint(chain: string, network: string, options: EndpointOptions = {}): NetworkEndpoint {
  const chainName = chain.trim().toLowerCase();
  const networkType = network.trim().toLowerCase();

  if (!isChainName(chainName)) {
    throw new UnsupportedChainError(chain, SUPPORTED_CHAINS);
  }
  if (!isNetworkType(networkType)) {
    throw new UnsupportedNetworkError(network, SUPPORTED_NETWORKS);
  }

  const config = NETWORK_CONFIGS[networkType];
  const rpcUrl = options.rpcUrl?.trim() || (options.alchemyApiKey ? config.alchemyUrl(options.alchemyApiKey) : undefined);
  if (!rpcUrl) {
    throw new ConfigurationError(`An Alchemy API key or an explicit RPC URL is required for ${chainName}/${networkType}.`);
  }

  return Object.freeze({
    chain: chainName,
    network: networkType,
    chainId: config.chainId,
    rpcUrl,
    isTestnet: config.isTestnet,
    faucetUrl: config.faucetUrl,
  });
}

export function describeEndpoint(endpoint: NetworkEndpoint): string {
  return `${endpoint.chain}/${endpoint.network}`;
}
