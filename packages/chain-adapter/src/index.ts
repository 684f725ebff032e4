export * from './types.js';
export type { ChainAdapter, ChainAdapterFactory, AdapterConstructorOptions } from './adapter.js';
export { EvmAdapter, createEvmAdapter } from './evm/evm-adapter.js';
export {
  NETWORK_CONFIGS,
  SUPPORTED_CHAINS,
  SUPPORTED_NETWORKS,
  describeEndpoint,
  resolveNetworkEndpoint,
} from './networks.js';
export type { NetworkConfig, EndpointOptions } from './networks.js';
export { ChainConnector } from './connector.js';
export type { ConnectParams, ConnectorOptions } from './connector.js';
export { Credential } from './credential.js';
export { systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { TRANSACTION_FIELDS, assertKnownTransactionFields, parseTransactionOverrides } from './transaction-fields.js';
export type { TransactionField } from './transaction-fields.js';
export { TransactionOrchestrator } from './orchestrator.js';
export type { OrchestratorOptions, AwaitConfirmationOptions, DeployContractParams } from './orchestrator.js';
export { TokenOperations, TokenReader, parseTokenAmount } from './token-operations.js';
export type { TokenTransferParams } from './token-operations.js';
export { FaucetClient } from './faucet.js';
export type { FaucetClientOptions } from './faucet.js';
