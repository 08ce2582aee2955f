/**
 * @ensemble/client - Session-oriented client for hierarchical coordination services
 *
 * Path-based CRUD, watches, ACL management and atomic multi-op batches over a
 * pluggable session dialer, with namespaces, compression and retry policies.
 *
 * @packageDocumentation
 */

// Client
export {
  CoordinationClient,
  DEFAULT_SESSION_TIMEOUT_MS,
  type AuthInfo,
  type ClientConfiguration,
  type ClientState,
  type ConnectionState,
  type CreateOptions,
  type GetDataOptions,
  type NodeData,
  type SetDataOptions,
  type WatchedResult,
} from './client.js';
export { ClientBuilder, type ClientBuilderOptions } from './builder.js';
export {
  Transaction,
  type TransactionContext,
  type TransactionCreateOptions,
  type TransactionResult,
} from './transaction.js';

// Session contract
export type {
  AclResult,
  ChildrenResult,
  DataResult,
  DialResult,
  Dialer,
  ExistsResult,
  SessionConnection,
  Watched,
} from './session.js';
export { EventChannel, type EventSource } from './channel.js';
export * from './types.js';

// Strategies
export {
  DefaultAclProvider,
  FixedEnsembleProvider,
  GzipCompressionProvider,
  nullTracerDriver,
  type AclProvider,
  type CompressionProvider,
  type EnsembleProvider,
  type TracerDriver,
} from './providers.js';
export {
  ExponentialBackoffRetry,
  RetryNTimes,
  RetryOneTime,
  timerSleeper,
  withRetry,
  type RetryLoopOptions,
  type RetryPolicy,
  type RetrySleeper,
} from './retry.js';
export {
  DefaultEnsurePathHelper,
  NamespacedEnsurePath,
  type EnsurePath,
  type EnsurePathHelper,
} from './ensure-path.js';
export {
  fixForNamespace,
  makePath,
  parentPath,
  pathPrefixes,
  unfixForNamespace,
  validateNamespace,
  validatePath,
} from './paths.js';

// Errors
export * from './errors.js';

// Logging
export {
  createConsoleLogger,
  noopLogger,
  type ConsoleLoggerOptions,
  type LogLevel,
  type Logger,
} from './logger.js';
