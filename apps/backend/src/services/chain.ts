import {
  ChainConnector,
  Credential,
  TokenOperations,
  TransactionOrchestrator,
  type ConnectorOptions,
} from '@token-relay/chain-adapter';
import { createLogger } from '@token-relay/core';
import type { BackendEnv } from '../env.js';

const logger = createLogger('chain-services');

/**
 * Everything the token routes need, bound to one network and one signing key.
 */
export interface ChainServices {
  connector: ChainConnector;
  orchestrator: TransactionOrchestrator;
  tokens: TokenOperations;
}

/**
 * Connect to the configured network. Resolves to undefined when no signing
 * key is configured, in which case the token routes answer 503.
 */
export async function createChainServices(
  env: BackendEnv,
  options: ConnectorOptions = {}
): Promise<ChainServices | undefined> {
  if (!env.PRIVATE_KEY) {
    logger.warn('PRIVATE_KEY is not set; token endpoints are disabled');
    return undefined;
  }

  const credential = Credential.fromPrivateKey(env.PRIVATE_KEY);
  const connector = await ChainConnector.connect(
    { chain: env.CHAIN, network: env.NETWORK, alchemyApiKey: env.ALCHEMY_API_KEY, rpcUrl: env.RPC_URL },
    options
  );
  const orchestrator = new TransactionOrchestrator(connector, credential, {
    pollIntervalMs: env.RECEIPT_POLL_INTERVAL_MS,
    defaultTimeoutSeconds: env.CONFIRMATION_TIMEOUT_SECONDS,
  });

  logger.info('Chain services ready', { signer: credential.address });
  return { connector, orchestrator, tokens: new TokenOperations(connector, orchestrator) };
}
