import {
  ChainConnector,
  Credential,
  type ConnectorOptions,
  NETWORK_CONFIGS,
  SUPPORTED_CHAINS,
  SUPPORTED_NETWORKS,
  TokenOperations,
  TokenReader,
  TransactionOrchestrator,
} from '@token-relay/chain-adapter';
import { ConfigurationError } from '@token-relay/core';
import type { CliEnv } from './env.js';
import { askChoice } from './prompts.js';

export interface TargetOptions {
  chain?: string;
  network?: string;
}

export interface Target {
  chain: string;
  network: string;
}

export interface Session {
  credential: Credential;
  connector: ChainConnector;
  orchestrator: TransactionOrchestrator;
  tokens: TokenOperations;
}

/**
 * Chain and network from the flags, then the environment, then a prompt.
 */
export async function resolveTarget(options: TargetOptions, env: CliEnv): Promise<Target> {
  const chain = options.chain ?? env.CHAIN ?? (await askChoice('Chain', SUPPORTED_CHAINS, 'ethereum'));
  const network = options.network ?? env.NETWORK ?? (await askChoice('Network', SUPPORTED_NETWORKS, 'sepolia'));
  return { chain, network };
}

export function networkLabel(network: string): string {
  const key = network.trim().toLowerCase();
  return key === 'mainnet' || key === 'sepolia' ? NETWORK_CONFIGS[key].name : network;
}

export interface ReadSession {
  connector: ChainConnector;
  tokens: TokenReader;
}

function connect(target: Target, env: CliEnv, options?: ConnectorOptions): Promise<ChainConnector> {
  return ChainConnector.connect(
    {
      chain: target.chain,
      network: target.network,
      alchemyApiKey: env.ALCHEMY_API_KEY,
      rpcUrl: env.RPC_URL,
    },
    options
  );
}

/** Read-only access; PRIVATE_KEY is not needed. */
export async function openReadSession(target: Target, env: CliEnv, options?: ConnectorOptions): Promise<ReadSession> {
  const connector = await connect(target, env, options);
  return { connector, tokens: new TokenReader(connector) };
}

export async function openSession(target: Target, env: CliEnv, options?: ConnectorOptions): Promise<Session> {
  if (!env.PRIVATE_KEY) {
    throw new ConfigurationError('PRIVATE_KEY must be set to sign transactions');
  }

  const credential = Credential.fromPrivateKey(env.PRIVATE_KEY);
  const connector = await connect(target, env, options);
  const orchestrator = new TransactionOrchestrator(connector, credential, {
    pollIntervalMs: env.RECEIPT_POLL_INTERVAL_MS,
    defaultTimeoutSeconds: env.CONFIRMATION_TIMEOUT_SECONDS,
  });

  return { credential, connector, orchestrator, tokens: new TokenOperations(connector, orchestrator) };
}
