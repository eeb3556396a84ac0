// Application
export {
  CollectionOrchestrator,
  type CollectionDependencies,
  type CollectionSettings,
  type RunPhase,
  type RunReport,
  type RunStatus,
  type ScanSettings,
} from './application/CollectionOrchestrator.js';
export { PreselectedAssetSelector } from './application/PreselectedAssetSelector.js';
export { emptySummary, summarize, type RunSummary } from './application/summary.js';

// Discovery
export {
  AccountDiscoveryService,
  type AccountDiscovery,
  type AccountDiscoveryOptions,
  type DiscoveryIssue,
} from './discovery/AccountDiscovery.js';
export {
  AssetClassifier,
  isSpamToken,
  type AssetClassifierOptions,
  type Classification,
  type ClassificationMiss,
  type NativeAssetInfo,
  type ProbeResult,
  type TokenHolding,
} from './discovery/AssetClassifier.js';
export {
  LogScanner,
  planWindows,
  transferTopicFilters,
  type LogScannerConfig,
  type ScanResult,
  type ScanStats,
  type ScanWindow,
  type WindowOutcome,
} from './discovery/LogScanner.js';

// Inventory and dispatch
export {
  InventoryAggregator,
  aggregateInventory,
  findTotalMismatches,
  toInventoryEntries,
} from './inventory/InventoryAggregator.js';
export {
  TransferDispatcher,
  type DispatcherOptions,
  type TransferDispatcherConfig,
} from './dispatch/TransferDispatcher.js';

// RPC
export { EndpointSelector, type EndpointStatus, type SelectedEndpoint } from './rpc/EndpointSelector.js';
export { ViemRpcClient, createViemRpc, type ViemRpcClientOptions } from './rpc/ViemRpcClient.js';
export { RetryPolicy, RetryExhaustedError, type RetryConfig, type RetryStats } from './resilience/RetryPolicy.js';

// Infrastructure
export {
  ConfigurationService,
  DEFAULT_CHAIN_ID,
  LOG_LEVELS,
  type ChainConfig,
  type CollectorConfig,
  type ConfigOverrides,
  type LogLevelName,
} from './infrastructure/config/ConfigurationService.js';
export {
  loadCredentials,
  parseCredentials,
  toAccounts,
  type CredentialIssue,
  type ParsedCredentials,
} from './infrastructure/credentials/CredentialLoader.js';

// Contracts
export { ERC20_ABI, ERC721_ABI, TRANSFER_EVENT, TRANSFER_TOPIC } from './contracts/abis.js';

// Types
export * from './types/assets.js';
export type * from './types/transfers.js';
export type * from './types/EvmRpc.js';
export type * from './types/Reporter.js';
export type * from './types/AssetSelector.js';

// Errors and utilities
export {
  SweepError,
  TransientRpcError,
  PermanentRpcError,
  PreconditionError,
  NoReachableEndpointError,
  DispatchFailure,
  ConfirmationTimeout,
  ValidationError,
  ErrorUtils,
  type DispatchStage,
  type PreconditionCode,
} from './utils/errors.js';
export { Validators } from './utils/validators.js';
export { sleep, type Sleep } from './utils/delay.js';
