/**
 * ClientHarness - runs a test callback against a real CoordinationClient
 * wired to doubles
 *
 * One run: program the dial, build, start (dials once), hand the callback
 * what it asks for, wait for outstanding work, close (closes the session
 * once), close the event channel, then verify every double.
 */

import {
  ClientBuilder,
  DEFAULT_SESSION_TIMEOUT_MS,
  EventChannel,
  FixedEnsembleProvider,
  RetryOneTime,
  noopLogger,
  type CoordinationClient,
  type Logger,
  type SessionEvent,
} from '@ensemble/client';
import { CompletionSignal } from './completion-signal.js';
import { HarnessAssertionError, HarnessErrorCode } from './errors.js';
import { bytes } from './matchers.js';
import { MockConnection } from './mock-connection.js';
import { MockDialer } from './mock-dialer.js';
import { MockCompressionProvider } from './mock-providers.js';

/** Connect string of the harness's fixed ensemble */
export const HARNESS_CONNECT_STRING = 'connectString';

/**
 * Everything a callback may ask for
 */
export interface HarnessDependencies {
  builder: ClientBuilder;
  client: CoordinationClient;
  connection: MockConnection;
  dialer: MockDialer;
  compression: MockCompressionProvider;
  /** Session events delivered to the client; send() resolves once the client took the event */
  events: EventChannel<SessionEvent>;
  /** Teardown waits until every unit added here is done */
  done: CompletionSignal;
}

export type DependencyKey = keyof HarnessDependencies;

export const DEPENDENCY_KEYS: readonly DependencyKey[] = [
  'builder',
  'client',
  'connection',
  'dialer',
  'compression',
  'events',
  'done',
];

const KNOWN_KEYS: ReadonlySet<string> = new Set(DEPENDENCY_KEYS);

function isDependencyKey(key: string): key is DependencyKey {
  return KNOWN_KEYS.has(key);
}

/**
 * Positional handles for a list of keys, e.g. `['client', 'done']` gives
 * `[CoordinationClient, CompletionSignal]`
 */
export type ResolveDependencies<K extends readonly DependencyKey[]> = {
  -readonly [I in keyof K]: K[I] extends DependencyKey ? HarnessDependencies[K[I]] : never;
};

export type BagCallback = (deps: HarnessDependencies) => unknown;

/**
 * A callback taking its dependencies positionally, in the order of `keys`
 */
export type KeyedCallback = (...deps: never[]) => unknown;

export type HarnessRequest =
  | { callback: BagCallback }
  | { keys: readonly string[]; callback: KeyedCallback };

function unsupportedDependency(key: string): HarnessAssertionError {
  return new HarnessAssertionError(
    HarnessErrorCode.UNSUPPORTED_DEPENDENCY,
    `unsupported callback dependency "${key}"`,
    [`supported: ${DEPENDENCY_KEYS.join(', ')}`]
  );
}

/**
 * @throws HarnessAssertionError (UNSUPPORTED_DEPENDENCY) naming the first unknown key
 */
export function assertDependencyKeys(keys: readonly string[]): asserts keys is readonly DependencyKey[] {
  const foreign = keys.find(key => !isDependencyKey(key));
  if (foreign !== undefined) {
    throw unsupportedDependency(foreign);
  }
}

/**
 * Look up the handle for each key, in order
 *
 * @throws HarnessAssertionError (UNSUPPORTED_DEPENDENCY) naming the first unknown key
 */
export function resolveDependencies(keys: readonly string[], deps: HarnessDependencies): unknown[] {
  return keys.map(key => {
    if (!isDependencyKey(key)) {
      throw unsupportedDependency(key);
    }
    return deps[key];
  });
}

/** What teardown needs from each double */
interface VerifiedDouble {
  verify(): string[];
  readonly expectations: { readonly failures: readonly HarnessAssertionError[] };
}

export type HarnessState = 'configured' | 'built' | 'running' | 'torn-down';

export interface ClientHarnessOptions {
  namespace?: string;
  /** Receives the doubles' call traces and the client's own logs */
  logger?: Logger;
  canBeReadOnly?: boolean;
}

/**
 * @example
 * ```typescript
 * await new ClientHarness().run(['client', 'connection'], async (client, connection) => {
 *   connection.on('get', '/a').returns({ data: bytes('v') }).once();
 *   expect((await client.getData('/a')).data).toEqual(bytes('v'));
 * });
 * ```
 */
export class ClientHarness {
  readonly builder: ClientBuilder;
  readonly connection: MockConnection;
  readonly dialer: MockDialer;
  readonly compression: MockCompressionProvider;
  readonly events = new EventChannel<SessionEvent>();
  readonly signal = new CompletionSignal();

  private readonly logger: Logger;
  private _state: HarnessState = 'configured';
  private _client: CoordinationClient | undefined;

  constructor(options: ClientHarnessOptions = {}) {
    const logger = options.logger ?? noopLogger;
    this.logger = logger;
    this.connection = new MockConnection({ logger });
    this.dialer = new MockDialer({ logger });
    this.compression = new MockCompressionProvider({ logger });

    this.builder = new ClientBuilder({
      dialer: this.dialer,
      ensembleProvider: new FixedEnsembleProvider(HARNESS_CONNECT_STRING),
      compressionProvider: this.compression,
      retryPolicy: new RetryOneTime(0),
      defaultData: bytes('default'),
      namespace: options.namespace,
      canBeReadOnly: options.canBeReadOnly ?? false,
      logger,
    });
  }

  get state(): HarnessState {
    return this._state;
  }

  /**
   * The client under test, once built
   */
  get client(): CoordinationClient | undefined {
    return this._client;
  }

  withNamespace(namespace: string): this {
    if (this._state !== 'configured') {
      throw new HarnessAssertionError(
        HarnessErrorCode.INVALID_STATE,
        `namespace can only be set before the client is built (harness is ${this._state})`
      );
    }
    this.builder.namespace = namespace;
    return this;
  }

  /**
   * Run a callback taking the whole dependency bag. Add to `done` for
   * background work teardown must wait for.
   */
  run(callback: BagCallback): Promise<void>;
  /**
   * Run a callback taking the handles named by `keys`, positionally.
   * Asking for 'done' registers one unit of pending work.
   */
  run<const K extends readonly DependencyKey[]>(
    keys: K,
    callback: (...deps: ResolveDependencies<K>) => unknown
  ): Promise<void>;
  run(keysOrCallback: readonly DependencyKey[] | BagCallback, callback?: KeyedCallback): Promise<void> {
    return this.execute(toRequest(keysOrCallback, callback));
  }

  /**
   * Untyped entry point behind run(); keys are validated before anything is dialed
   */
  async execute(request: HarnessRequest): Promise<void> {
    if (this._state !== 'configured') {
      throw new HarnessAssertionError(
        HarnessErrorCode.INVALID_STATE,
        `a harness runs once (harness is ${this._state})`
      );
    }
    if ('keys' in request) {
      try {
        assertDependencyKeys(request.keys);
      } catch (error) {
        this.finish();
        throw error;
      }
    }

    const { builder, connection, dialer, compression, events, signal } = this;
    const connectString = builder.ensembleProvider?.connectionString() ?? HARNESS_CONNECT_STRING;
    dialer
      .on('dial', connectString, DEFAULT_SESSION_TIMEOUT_MS, builder.canBeReadOnly)
      .returns({ connection, events })
      .once();

    const client = builder.build();
    this._client = client;
    this._state = 'built';

    try {
      await client.start();
    } catch (error) {
      this.finish();
      throw this.collectFailures() ?? error;
    }
    this._state = 'running';

    const deps: HarnessDependencies = { builder, client, connection, dialer, compression, events, done: signal };

    try {
      if ('keys' in request) {
        const args = resolveDependencies(request.keys, deps);
        if (request.keys.includes('done')) {
          signal.add(1);
        }
        const result: unknown = Reflect.apply(request.callback, undefined, args);
        await result;
      } else {
        await request.callback(deps);
      }
      await signal.wait();
    } catch (error) {
      await this.closeAfterFailure(client);
      throw error;
    }

    try {
      connection.on('close').once();
      await client.close();
    } finally {
      this.finish();
    }

    const failure = this.collectFailures();
    if (failure) {
      throw failure;
    }
  }

  /**
   * Close the session once after the callback failed; the callback's error stays the one reported
   */
  private async closeAfterFailure(client: CoordinationClient): Promise<void> {
    try {
      this.connection.on('close').once();
      await client.close();
    } catch (closeError) {
      this.logger.error('Closing the client after a failed callback also failed', closeError);
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    if (!this.events.closed) {
      this.events.close();
    }
    this._state = 'torn-down';
  }

  /**
   * One error listing every double's recorded failures and unmet expectations
   */
  private collectFailures(): HarnessAssertionError | undefined {
    const doubles: VerifiedDouble[] = [this.connection, this.dialer, this.compression];
    const problems = doubles.flatMap(double => double.verify());
    if (problems.length === 0) {
      return undefined;
    }

    const recorded = doubles.flatMap(double => double.expectations.failures);
    const code = recorded[0]?.code ?? HarnessErrorCode.UNSATISFIED_EXPECTATION;
    return new HarnessAssertionError(code, 'harness expectations not met', problems);
  }
}

function toRequest(keysOrCallback: readonly string[] | BagCallback, callback?: KeyedCallback): HarnessRequest {
  if (typeof keysOrCallback === 'function') {
    return { callback: keysOrCallback };
  }
  if (!callback) {
    throw new HarnessAssertionError(HarnessErrorCode.INVALID_STATE, 'a callback is required');
  }
  return { keys: keysOrCallback, callback };
}

/**
 * Run a callback against a fresh harness
 */
export function withClient(callback: BagCallback): Promise<void>;
export function withClient<const K extends readonly DependencyKey[]>(
  keys: K,
  callback: (...deps: ResolveDependencies<K>) => unknown
): Promise<void>;
export function withClient(keysOrCallback: readonly DependencyKey[] | BagCallback, callback?: KeyedCallback): Promise<void> {
  return new ClientHarness().execute(toRequest(keysOrCallback, callback));
}

/**
 * Run a callback against a fresh harness whose client uses `namespace`
 */
export function withClientAndNamespace(namespace: string, callback: BagCallback): Promise<void>;
export function withClientAndNamespace<const K extends readonly DependencyKey[]>(
  namespace: string,
  keys: K,
  callback: (...deps: ResolveDependencies<K>) => unknown
): Promise<void>;
export function withClientAndNamespace(
  namespace: string,
  keysOrCallback: readonly DependencyKey[] | BagCallback,
  callback?: KeyedCallback
): Promise<void> {
  return new ClientHarness({ namespace }).execute(toRequest(keysOrCallback, callback));
}
