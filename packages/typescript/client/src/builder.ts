/**
 * ClientBuilder - configuration aggregate for CoordinationClient
 */

import {
  CoordinationClient,
  DEFAULT_SESSION_TIMEOUT_MS,
  type AuthInfo,
  type ClientConfiguration,
} from './client.js';
import { DefaultEnsurePathHelper, type EnsurePathHelper } from './ensure-path.js';
import { ClientConfigurationError } from './errors.js';
import { noopLogger, type Logger } from './logger.js';
import { validateNamespace } from './paths.js';
import {
  DefaultAclProvider,
  FixedEnsembleProvider,
  GzipCompressionProvider,
  nullTracerDriver,
  type AclProvider,
  type CompressionProvider,
  type EnsembleProvider,
  type TracerDriver,
} from './providers.js';
import { ExponentialBackoffRetry, timerSleeper, type RetryPolicy, type RetrySleeper } from './retry.js';
import type { Dialer } from './session.js';

/**
 * Builder settings; everything but the dialer and ensemble has a default
 */
export type ClientBuilderOptions = Partial<Omit<ClientConfiguration, 'authInfos'>> & {
  authInfos?: AuthInfo[];
};

/**
 * Safe environment variable access
 */
function getEnv(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key];
  return value !== undefined && value !== '' ? value : undefined;
}

/**
 * Mutable until `build()`, which takes an immutable snapshot.
 *
 * @example
 * ```typescript
 * const client = new ClientBuilder({ dialer, namespace: 'app' })
 *   .connectString('localhost:2181')
 *   .authorization('digest', credentials)
 *   .build();
 * ```
 */
export class ClientBuilder {
  dialer?: Dialer;
  ensembleProvider?: EnsembleProvider;
  compressionProvider: CompressionProvider;
  aclProvider: AclProvider;
  retryPolicy: RetryPolicy;
  retrySleeper: RetrySleeper;
  ensurePathHelper: EnsurePathHelper;
  defaultData: Uint8Array;
  namespace?: string;
  sessionTimeoutMs: number;
  canBeReadOnly: boolean;
  authInfos: AuthInfo[];
  tracer: TracerDriver;
  logger: Logger;

  constructor(options: ClientBuilderOptions = {}) {
    this.dialer = options.dialer;
    this.ensembleProvider = options.ensembleProvider;
    this.compressionProvider = options.compressionProvider ?? new GzipCompressionProvider();
    this.aclProvider = options.aclProvider ?? new DefaultAclProvider();
    this.retryPolicy = options.retryPolicy ?? new ExponentialBackoffRetry(1000, 3);
    this.retrySleeper = options.retrySleeper ?? timerSleeper;
    this.ensurePathHelper = options.ensurePathHelper ?? new DefaultEnsurePathHelper();
    this.defaultData = options.defaultData ?? new Uint8Array(0);
    this.namespace = options.namespace;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.canBeReadOnly = options.canBeReadOnly ?? false;
    this.authInfos = options.authInfos ?? [];
    this.tracer = options.tracer ?? nullTracerDriver;
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Builder pre-filled from environment variables:
   * ENSEMBLE_CONNECT_STRING, ENSEMBLE_NAMESPACE, ENSEMBLE_SESSION_TIMEOUT_MS, ENSEMBLE_READ_ONLY
   */
  static fromEnv(
    env: Record<string, string | undefined> = process.env,
    options: ClientBuilderOptions = {}
  ): ClientBuilder {
    const builder = new ClientBuilder(options);

    const connectString = getEnv(env, 'ENSEMBLE_CONNECT_STRING');
    if (connectString) {
      builder.connectString(connectString);
    }

    const namespace = getEnv(env, 'ENSEMBLE_NAMESPACE');
    if (namespace) {
      builder.namespace = namespace;
    }

    const timeout = getEnv(env, 'ENSEMBLE_SESSION_TIMEOUT_MS');
    if (timeout) {
      const parsed = Number(timeout);
      if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ClientConfigurationError(`ENSEMBLE_SESSION_TIMEOUT_MS must be a positive integer, got "${timeout}"`);
      }
      builder.sessionTimeoutMs = parsed;
    }

    const readOnly = getEnv(env, 'ENSEMBLE_READ_ONLY');
    if (readOnly) {
      builder.canBeReadOnly = readOnly === 'true' || readOnly === '1';
    }

    return builder;
  }

  /**
   * Use a fixed connect string, e.g. 'host1:2181,host2:2181'
   */
  connectString(connectString: string): this {
    this.ensembleProvider = new FixedEnsembleProvider(connectString);
    return this;
  }

  /**
   * Add credentials sent with addAuth once the session is established
   */
  authorization(scheme: string, credential: Uint8Array): this {
    this.authInfos.push({ scheme, credential });
    return this;
  }

  /**
   * Snapshot the configuration into a new client. Does not dial.
   */
  build(): CoordinationClient {
    if (!this.dialer) {
      throw new ClientConfigurationError('A dialer is required');
    }
    if (!this.ensembleProvider) {
      throw new ClientConfigurationError('An ensemble provider or connect string is required');
    }
    if (this.namespace !== undefined && this.namespace !== '') {
      validateNamespace(this.namespace);
    }
    if (!Number.isInteger(this.sessionTimeoutMs) || this.sessionTimeoutMs <= 0) {
      throw new ClientConfigurationError(`sessionTimeoutMs must be a positive integer, got ${this.sessionTimeoutMs}`);
    }

    const config: ClientConfiguration = Object.freeze({
      dialer: this.dialer,
      ensembleProvider: this.ensembleProvider,
      compressionProvider: this.compressionProvider,
      aclProvider: this.aclProvider,
      retryPolicy: this.retryPolicy,
      retrySleeper: this.retrySleeper,
      ensurePathHelper: this.ensurePathHelper,
      defaultData: this.defaultData.slice(),
      namespace: this.namespace || undefined,
      sessionTimeoutMs: this.sessionTimeoutMs,
      canBeReadOnly: this.canBeReadOnly,
      authInfos: Object.freeze(this.authInfos.map(auth => ({ ...auth }))),
      tracer: this.tracer,
      logger: this.logger,
    });

    return new CoordinationClient(config);
  }
}
