/**
 * @ensemble/test-utils - Doubles and a run harness for testing code built on
 * @ensemble/client
 *
 * @packageDocumentation
 */

// Harness
export {
  ClientHarness,
  DEPENDENCY_KEYS,
  HARNESS_CONNECT_STRING,
  assertDependencyKeys,
  resolveDependencies,
  withClient,
  withClientAndNamespace,
  type BagCallback,
  type ClientHarnessOptions,
  type DependencyKey,
  type HarnessDependencies,
  type HarnessRequest,
  type HarnessState,
  type KeyedCallback,
  type ResolveDependencies,
} from './harness.js';
export { CompletionSignal } from './completion-signal.js';

// Doubles
export { MockDouble } from './mock-double.js';
export { MockConnection, type MockConnectionOptions } from './mock-connection.js';
export { MockDialer } from './mock-dialer.js';
export {
  MockAclProvider,
  MockCompressionProvider,
  MockEnsurePath,
  MockEnsurePathHelper,
  MockRetrySleeper,
  MockTracerDriver,
} from './mock-providers.js';

// Expectations
export {
  Expectation,
  ExpectationTable,
  type ArgMatchers,
  type ArgsOf,
  type ExpectationTableOptions,
  type MethodName,
  type Repetition,
  type ResultOf,
} from './expectation-table.js';
export { anything, argsMatch, bytes, isArgMatcher, matching, structurallyEqual, type ArgMatcher } from './matchers.js';
export { formatCall, formatValue, type CallOutcome } from './format.js';

// Errors
export {
  HarnessAssertionError,
  HarnessErrorCode,
  SimulatedCrashError,
  type HarnessErrorCodeType,
} from './errors.js';

export type { CallLogEntry, MockDoubleOptions } from './types.js';
