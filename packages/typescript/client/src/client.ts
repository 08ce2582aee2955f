/**
 * CoordinationClient - namespace-aware, retrying front end to one session
 */

import type { EventSource } from './channel.js';
import type { EnsurePath, EnsurePathHelper } from './ensure-path.js';
import { NamespacedEnsurePath } from './ensure-path.js';
import { ClientStateError, NoNodeError } from './errors.js';
import type { Logger } from './logger.js';
import { fixForNamespace, parentPath, unfixForNamespace } from './paths.js';
import type { AclProvider, CompressionProvider, EnsembleProvider, TracerDriver } from './providers.js';
import { withRetry, type RetryPolicy, type RetrySleeper } from './retry.js';
import type { Dialer, SessionConnection } from './session.js';
import { Transaction } from './transaction.js';
import {
  ANY_VERSION,
  CreateMode,
  EventType,
  KeeperState,
  type Acl,
  type SessionEvent,
  type Stat,
} from './types.js';

/** Session timeout requested when dialing, unless configured otherwise */
export const DEFAULT_SESSION_TIMEOUT_MS = 60_000;

export interface AuthInfo {
  scheme: string;
  credential: Uint8Array;
}

/**
 * Configuration snapshot a client is built from. Never mutated after build.
 */
export interface ClientConfiguration {
  readonly dialer: Dialer;
  readonly ensembleProvider: EnsembleProvider;
  readonly compressionProvider: CompressionProvider;
  readonly aclProvider: AclProvider;
  readonly retryPolicy: RetryPolicy;
  readonly retrySleeper: RetrySleeper;
  readonly ensurePathHelper: EnsurePathHelper;
  readonly defaultData: Uint8Array;
  readonly namespace?: string;
  readonly sessionTimeoutMs: number;
  readonly canBeReadOnly: boolean;
  readonly authInfos: readonly AuthInfo[];
  readonly tracer: TracerDriver;
  readonly logger: Logger;
}

export type ClientState = 'latent' | 'started' | 'stopped';

export type ConnectionState = 'connected' | 'suspended' | 'lost' | 'read-only';

export interface CreateOptions {
  /** Node payload (default: the configured default data) */
  data?: Uint8Array;
  mode?: number;
  acl?: Acl[];
  /** Pass the payload through the compression provider */
  compressed?: boolean;
  /** Create missing parent nodes and retry once when the parent does not exist */
  creatingParentsIfNeeded?: boolean;
}

export interface SetDataOptions {
  version?: number;
  compressed?: boolean;
}

export interface GetDataOptions {
  decompressed?: boolean;
}

export interface NodeData {
  data: Uint8Array;
  stat?: Stat;
}

export type WatchedResult<T> = T & { watch: EventSource<SessionEvent> };

const CONNECTION_STATES: Partial<Record<SessionEvent['state'], ConnectionState>> = {
  [KeeperState.SYNC_CONNECTED]: 'connected',
  [KeeperState.DISCONNECTED]: 'suspended',
  [KeeperState.EXPIRED]: 'lost',
  [KeeperState.CONNECTED_READ_ONLY]: 'read-only',
};

/**
 * @example
 * ```typescript
 * const client = new ClientBuilder({ dialer }).connectString('zk1:2181,zk2:2181').build();
 * await client.start();
 *
 * await client.create('/config', { data: payload, creatingParentsIfNeeded: true });
 * const { data, stat } = await client.getData('/config');
 *
 * await client.close();
 * ```
 */
export class CoordinationClient {
  private _state: ClientState = 'latent';
  private _connection: SessionConnection | undefined;
  private _connectionState: ConnectionState | undefined;
  private readonly _eventListeners = new Set<(event: SessionEvent) => void>();
  private readonly _stateListeners = new Set<(state: ConnectionState) => void>();

  constructor(readonly config: ClientConfiguration) {}

  get state(): ClientState {
    return this._state;
  }

  get namespace(): string | undefined {
    return this.config.namespace;
  }

  /**
   * Last connection state reported by the session, if any
   */
  get connectionState(): ConnectionState | undefined {
    return this._connectionState;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Dial the ensemble and start watching the session
   */
  async start(): Promise<void> {
    if (this._state !== 'latent') {
      throw new ClientStateError('Cannot be started more than once');
    }
    this._state = 'started';

    const { ensembleProvider, dialer, logger } = this.config;
    try {
      await ensembleProvider.start();
      const connectString = ensembleProvider.connectionString();
      logger.info(`Connecting to ${connectString}`);

      const { connection, events } = await dialer.dial(
        connectString,
        this.config.sessionTimeoutMs,
        this.config.canBeReadOnly
      );
      this._connection = connection;

      for (const auth of this.config.authInfos) {
        await connection.addAuth(auth.scheme, auth.credential);
      }

      void this.watchSession(events);
    } catch (error) {
      this._state = 'stopped';
      throw error;
    }
  }

  /**
   * Close the session. Closing a client that is not started only marks it stopped.
   */
  async close(): Promise<void> {
    if (this._state !== 'started') {
      this._state = 'stopped';
      return;
    }
    this._state = 'stopped';

    const connection = this._connection;
    this._connection = undefined;
    this.config.logger.info('Closing');

    try {
      connection?.close();
    } finally {
      await this.config.ensembleProvider.close();
    }
  }

  /**
   * The live session connection
   *
   * @throws ClientStateError when the client is not started
   */
  getConnection(): SessionConnection {
    if (this._state !== 'started' || !this._connection) {
      throw new ClientStateError(`Client is ${this._state}, expected started`);
    }
    return this._connection;
  }

  onSessionEvent(listener: (event: SessionEvent) => void): () => void {
    this._eventListeners.add(listener);
    return () => {
      this._eventListeners.delete(listener);
    };
  }

  onConnectionStateChange(listener: (state: ConnectionState) => void): () => void {
    this._stateListeners.add(listener);
    return () => {
      this._stateListeners.delete(listener);
    };
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  async create(path: string, options: CreateOptions = {}): Promise<string> {
    const fullPath = this.fixPath(path);
    const mode = options.mode ?? CreateMode.PERSISTENT;
    const acl = options.acl ?? this.aclForPath(fullPath);
    let data = options.data ?? this.config.defaultData;
    if (options.compressed) {
      data = await this.config.compressionProvider.compress(fullPath, data);
    }

    const created = await this.run('create', async connection => {
      try {
        return await connection.create(fullPath, data, mode, acl);
      } catch (error) {
        if (!options.creatingParentsIfNeeded || !(error instanceof NoNodeError)) {
          throw error;
        }
        await this.config.ensurePathHelper.ensure(this, parentPath(fullPath), true);
        return connection.create(fullPath, data, mode, acl);
      }
    });
    return this.unfixPath(created);
  }

  async checkExists(path: string): Promise<Stat | undefined> {
    const fullPath = this.fixPath(path);
    const { exists, stat } = await this.run('exists', connection => connection.exists(fullPath));
    return exists ? stat : undefined;
  }

  async watchExists(path: string): Promise<WatchedResult<{ stat?: Stat }>> {
    const fullPath = this.fixPath(path);
    const { exists, stat, watch } = await this.run('exists-watch', connection => connection.existsW(fullPath));
    return { stat: exists ? stat : undefined, watch };
  }

  async getData(path: string, options: GetDataOptions = {}): Promise<NodeData> {
    const fullPath = this.fixPath(path);
    const { data, stat } = await this.run('get-data', connection => connection.get(fullPath));
    return { data: await this.maybeDecompress(fullPath, data, options), stat };
  }

  async watchData(path: string, options: GetDataOptions = {}): Promise<WatchedResult<NodeData>> {
    const fullPath = this.fixPath(path);
    const { data, stat, watch } = await this.run('get-data-watch', connection => connection.getW(fullPath));
    return { data: await this.maybeDecompress(fullPath, data, options), stat, watch };
  }

  async setData(path: string, data: Uint8Array, options: SetDataOptions = {}): Promise<Stat | undefined> {
    const fullPath = this.fixPath(path);
    const payload = options.compressed
      ? await this.config.compressionProvider.compress(fullPath, data)
      : data;
    const version = options.version ?? ANY_VERSION;
    return this.run('set-data', connection => connection.set(fullPath, payload, version));
  }

  async getChildren(path: string): Promise<string[]> {
    const fullPath = this.fixPath(path);
    const { children } = await this.run('get-children', connection => connection.children(fullPath));
    return children;
  }

  async watchChildren(path: string): Promise<WatchedResult<{ children: string[]; stat?: Stat }>> {
    const fullPath = this.fixPath(path);
    return this.run('get-children-watch', connection => connection.childrenW(fullPath));
  }

  async getAcl(path: string): Promise<{ acl: Acl[]; stat?: Stat }> {
    const fullPath = this.fixPath(path);
    return this.run('get-acl', connection => connection.getAcl(fullPath));
  }

  async setAcl(path: string, acl: Acl[], version: number = ANY_VERSION): Promise<Stat | undefined> {
    const fullPath = this.fixPath(path);
    return this.run('set-acl', connection => connection.setAcl(fullPath, acl, version));
  }

  async delete(path: string, options: { version?: number } = {}): Promise<void> {
    const fullPath = this.fixPath(path);
    const version = options.version ?? ANY_VERSION;
    await this.run('delete', connection => connection.delete(fullPath, version));
  }

  async sync(path: string): Promise<string> {
    const fullPath = this.fixPath(path);
    const synced = await this.run('sync', connection => connection.sync(fullPath));
    return this.unfixPath(synced);
  }

  inTransaction(): Transaction {
    return new Transaction({
      fixPath: path => this.fixPath(path),
      unfixPath: path => this.unfixPath(path),
      defaultData: this.config.defaultData,
      aclForPath: path => this.aclForPath(path),
      submit: ops => this.run('multi', connection => connection.multi(...ops)),
    });
  }

  /**
   * EnsurePath for `path` inside this client's namespace
   */
  newEnsurePath(path: string): EnsurePath {
    return new NamespacedEnsurePath(this.fixPath(path), this.config.ensurePathHelper);
  }

  aclForPath(path: string): Acl[] {
    return this.config.aclProvider.aclForPath(path);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private fixPath(path: string): string {
    return fixForNamespace(this.config.namespace, path);
  }

  private unfixPath(path: string): string {
    return unfixForNamespace(this.config.namespace, path);
  }

  private async maybeDecompress(path: string, data: Uint8Array, options: GetDataOptions): Promise<Uint8Array> {
    return options.decompressed ? this.config.compressionProvider.decompress(path, data) : data;
  }

  private async run<T>(name: string, fn: (connection: SessionConnection) => Promise<T>): Promise<T> {
    const connection = this.getConnection();
    const { retryPolicy, retrySleeper, tracer, logger } = this.config;
    const startTime = Date.now();
    try {
      return await withRetry(() => fn(connection), {
        policy: retryPolicy,
        sleeper: retrySleeper,
        tracer,
        logger,
        name,
      });
    } finally {
      tracer.addTime(name, Date.now() - startTime);
      tracer.addCount(name, 1);
    }
  }

  private async watchSession(events: EventSource<SessionEvent>): Promise<void> {
    try {
      for await (const event of events) {
        this.dispatch(event);
      }
    } catch (error) {
      this.config.logger.error('Session watcher stopped', error);
    }
  }

  private dispatch(event: SessionEvent): void {
    const { logger } = this.config;

    if (event.type === EventType.SESSION) {
      const next = CONNECTION_STATES[event.state];
      if (next && next !== this._connectionState) {
        this._connectionState = next;
        logger.info(`Connection state changed to ${next}`);
        for (const listener of [...this._stateListeners]) {
          try {
            listener(next);
          } catch (error) {
            logger.error('Connection state listener failed', error);
          }
        }
      }
    }

    for (const listener of [...this._eventListeners]) {
      try {
        listener(event);
      } catch (error) {
        logger.error('Session event listener failed', error);
      }
    }
  }
}
