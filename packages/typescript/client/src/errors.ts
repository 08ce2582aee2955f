/**
 * @ensemble/client - Error types
 *
 * Keeper errors mirror the numeric result codes of the coordination service
 * wire protocol. Client errors describe misuse of the client itself.
 *
 * Error Code Ranges:
 * - negative: coordination-service result codes
 * - 9xxx: client-side errors
 */

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Coordination-service result codes, as sent on the wire
 */
export const KeeperErrorCode = {
  SYSTEM_ERROR: -1,
  RUNTIME_INCONSISTENCY: -2,
  DATA_INCONSISTENCY: -3,
  CONNECTION_LOSS: -4,
  MARSHALLING_ERROR: -5,
  UNIMPLEMENTED: -6,
  OPERATION_TIMEOUT: -7,
  BAD_ARGUMENTS: -8,
  API_ERROR: -100,
  NO_NODE: -101,
  NO_AUTH: -102,
  BAD_VERSION: -103,
  NO_CHILDREN_FOR_EPHEMERALS: -108,
  NODE_EXISTS: -110,
  NOT_EMPTY: -111,
  SESSION_EXPIRED: -112,
  INVALID_CALLBACK: -113,
  INVALID_ACL: -114,
  AUTH_FAILED: -115,
  CLOSING: -116,
  NOTHING: -117,
  SESSION_MOVED: -118,
} as const;

export type KeeperErrorCodeType = (typeof KeeperErrorCode)[keyof typeof KeeperErrorCode];

/**
 * Client-side error codes
 */
export const ClientErrorCode = {
  INVALID_STATE: 9001,
  INVALID_CONFIGURATION: 9002,
  INVALID_PATH: 9003,
  CHANNEL_CLOSED: 9004,
} as const;

export type ClientErrorCodeType = (typeof ClientErrorCode)[keyof typeof ClientErrorCode];

export type ErrorCodeType = KeeperErrorCodeType | ClientErrorCodeType;

const CODE_NAMES = new Map<number, string>(
  [...Object.entries(KeeperErrorCode), ...Object.entries(ClientErrorCode)].map(
    ([name, code]): [number, string] => [code, name]
  )
);

/**
 * String name of an error code, e.g. 'NO_NODE' for -101
 */
export function errorCodeName(code: number): string {
  return CODE_NAMES.get(code) ?? 'UNKNOWN_ERROR';
}

// ============================================================================
// Base Error Class
// ============================================================================

/**
 * Base class for every error raised by the client.
 *
 * Error Hierarchy:
 * - EnsembleError (base)
 *   - KeeperError: results reported by the coordination service
 *     - NoNodeError, NodeExistsError, BadVersionError, NotEmptyError, ...
 *   - ClientStateError, ClientConfigurationError, InvalidPathError, ChannelClosedError
 */
export class EnsembleError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCodeType,
    public readonly codeName: string = errorCodeName(code)
  ) {
    super(message);
    this.name = 'EnsembleError';
  }

  toJSON(): { name: string; message: string; code: number; codeName: string } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: this.codeName,
    };
  }
}

// ============================================================================
// Keeper Errors
// ============================================================================

/**
 * A result code reported by the coordination service for an operation on `path`
 */
export class KeeperError extends EnsembleError {
  constructor(
    message: string,
    code: KeeperErrorCodeType,
    public readonly path?: string
  ) {
    super(message, code);
    this.name = 'KeeperError';
  }
}

export class ConnectionLossError extends KeeperError {
  constructor(path?: string) {
    super('connection loss', KeeperErrorCode.CONNECTION_LOSS, path);
    this.name = 'ConnectionLossError';
  }
}

export class OperationTimeoutError extends KeeperError {
  constructor(path?: string) {
    super('operation timeout', KeeperErrorCode.OPERATION_TIMEOUT, path);
    this.name = 'OperationTimeoutError';
  }
}

export class NoNodeError extends KeeperError {
  constructor(path?: string) {
    super(path ? `node does not exist: ${path}` : 'node does not exist', KeeperErrorCode.NO_NODE, path);
    this.name = 'NoNodeError';
  }
}

export class NoAuthError extends KeeperError {
  constructor(path?: string) {
    super('not authenticated', KeeperErrorCode.NO_AUTH, path);
    this.name = 'NoAuthError';
  }
}

export class BadVersionError extends KeeperError {
  constructor(path?: string) {
    super(path ? `version conflict: ${path}` : 'version conflict', KeeperErrorCode.BAD_VERSION, path);
    this.name = 'BadVersionError';
  }
}

export class NodeExistsError extends KeeperError {
  constructor(path?: string) {
    super(path ? `node already exists: ${path}` : 'node already exists', KeeperErrorCode.NODE_EXISTS, path);
    this.name = 'NodeExistsError';
  }
}

export class NotEmptyError extends KeeperError {
  constructor(path?: string) {
    super(path ? `node has children: ${path}` : 'node has children', KeeperErrorCode.NOT_EMPTY, path);
    this.name = 'NotEmptyError';
  }
}

export class SessionExpiredError extends KeeperError {
  constructor(path?: string) {
    super('session has been expired by the server', KeeperErrorCode.SESSION_EXPIRED, path);
    this.name = 'SessionExpiredError';
  }
}

export class SessionMovedError extends KeeperError {
  constructor(path?: string) {
    super('session moved to another server', KeeperErrorCode.SESSION_MOVED, path);
    this.name = 'SessionMovedError';
  }
}

// ============================================================================
// Client Errors
// ============================================================================

/**
 * Thrown when an operation is not allowed in the client's current lifecycle state
 */
export class ClientStateError extends EnsembleError {
  constructor(message: string) {
    super(message, ClientErrorCode.INVALID_STATE);
    this.name = 'ClientStateError';
  }
}

/**
 * Thrown by ClientBuilder.build() for an incomplete or invalid configuration
 */
export class ClientConfigurationError extends EnsembleError {
  constructor(message: string) {
    super(message, ClientErrorCode.INVALID_CONFIGURATION);
    this.name = 'ClientConfigurationError';
  }
}

export class InvalidPathError extends EnsembleError {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`Invalid path "${path}": ${message}`, ClientErrorCode.INVALID_PATH);
    this.name = 'InvalidPathError';
  }
}

export class ChannelClosedError extends EnsembleError {
  constructor(message: string = 'channel is closed') {
    super(message, ClientErrorCode.CHANNEL_CLOSED);
    this.name = 'ChannelClosedError';
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Checks if an error is an EnsembleError with a specific code
 */
export function isErrorCode(error: unknown, code: ErrorCodeType): boolean {
  return error instanceof EnsembleError && error.code === code;
}

/**
 * Creates the KeeperError subclass matching a wire result code
 */
export function createKeeperError(code: KeeperErrorCodeType, path?: string): KeeperError {
  switch (code) {
    case KeeperErrorCode.CONNECTION_LOSS:
      return new ConnectionLossError(path);
    case KeeperErrorCode.OPERATION_TIMEOUT:
      return new OperationTimeoutError(path);
    case KeeperErrorCode.NO_NODE:
      return new NoNodeError(path);
    case KeeperErrorCode.NO_AUTH:
      return new NoAuthError(path);
    case KeeperErrorCode.BAD_VERSION:
      return new BadVersionError(path);
    case KeeperErrorCode.NODE_EXISTS:
      return new NodeExistsError(path);
    case KeeperErrorCode.NOT_EMPTY:
      return new NotEmptyError(path);
    case KeeperErrorCode.SESSION_EXPIRED:
      return new SessionExpiredError(path);
    case KeeperErrorCode.SESSION_MOVED:
      return new SessionMovedError(path);
    default:
      return new KeeperError(errorCodeName(code).toLowerCase().replace(/_/g, ' '), code, path);
  }
}

/**
 * Whether a failed operation may be retried under the client's retry policy
 */
export function isRetriableError(error: unknown): boolean {
  return (
    isErrorCode(error, KeeperErrorCode.CONNECTION_LOSS) ||
    isErrorCode(error, KeeperErrorCode.OPERATION_TIMEOUT) ||
    isErrorCode(error, KeeperErrorCode.SESSION_MOVED)
  );
}
