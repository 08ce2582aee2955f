/**
 * Shared data shapes of the coordination-service session contract
 */

// ============================================================================
// Node Metadata
// ============================================================================

/**
 * Version and metadata record attached to a node.
 *
 * An absent `Stat` (`undefined`) means the node does not exist, or that the
 * caller did not ask for one.
 */
export interface Stat {
  /** Transaction id of the change that created the node */
  czxid: number;
  /** Transaction id of the last change to the node's data */
  mzxid: number;
  /** Creation time in ms since epoch */
  ctime: number;
  /** Last modification time in ms since epoch */
  mtime: number;
  /** Data version, used for optimistic-concurrency checks */
  version: number;
  /** Children version */
  cversion: number;
  /** ACL version */
  aversion: number;
  /** Session id of the owner when ephemeral, otherwise 0 */
  ephemeralOwner: number;
  dataLength: number;
  numChildren: number;
  /** Transaction id of the last change to the node's children */
  pzxid: number;
}

/**
 * Build a Stat with zeroed fields, overriding the given ones
 */
export function createStat(fields: Partial<Stat> = {}): Stat {
  return {
    czxid: 0,
    mzxid: 0,
    ctime: 0,
    mtime: 0,
    version: 0,
    cversion: 0,
    aversion: 0,
    ephemeralOwner: 0,
    dataLength: 0,
    numChildren: 0,
    pzxid: 0,
    ...fields,
  };
}

/** Version value that matches any node version */
export const ANY_VERSION = -1;

// ============================================================================
// ACLs
// ============================================================================

export const Perms = {
  READ: 1 << 0,
  WRITE: 1 << 1,
  CREATE: 1 << 2,
  DELETE: 1 << 3,
  ADMIN: 1 << 4,
  ALL: 0x1f,
} as const;

export interface Acl {
  perms: number;
  scheme: string;
  id: string;
}

/**
 * ACL granting `perms` to everyone
 */
export function worldAcl(perms: number): Acl[] {
  return [{ perms, scheme: 'world', id: 'anyone' }];
}

/**
 * ACL granting `perms` to the authenticated creator of the node
 */
export function authAcl(perms: number): Acl[] {
  return [{ perms, scheme: 'auth', id: '' }];
}

export const OPEN_ACL_UNSAFE: readonly Acl[] = worldAcl(Perms.ALL);
export const READ_ACL_UNSAFE: readonly Acl[] = worldAcl(Perms.READ);
export const CREATOR_ALL_ACL: readonly Acl[] = authAcl(Perms.ALL);

// ============================================================================
// Create Modes
// ============================================================================

/**
 * Node create modes, as the numeric flags sent on the wire
 */
export const CreateMode = {
  PERSISTENT: 0,
  EPHEMERAL: 1,
  PERSISTENT_SEQUENTIAL: 2,
  EPHEMERAL_SEQUENTIAL: 3,
} as const;

export type CreateModeType = (typeof CreateMode)[keyof typeof CreateMode];

// ============================================================================
// Session Events
// ============================================================================

export const EventType = {
  NONE: 'none',
  NODE_CREATED: 'node-created',
  NODE_DELETED: 'node-deleted',
  NODE_DATA_CHANGED: 'node-data-changed',
  NODE_CHILDREN_CHANGED: 'node-children-changed',
  SESSION: 'session',
  NOT_WATCHING: 'not-watching',
} as const;

export type EventTypeValue = (typeof EventType)[keyof typeof EventType];

export const KeeperState = {
  UNKNOWN: 'unknown',
  DISCONNECTED: 'disconnected',
  SYNC_CONNECTED: 'sync-connected',
  AUTH_FAILED: 'auth-failed',
  CONNECTED_READ_ONLY: 'connected-read-only',
  SASL_AUTHENTICATED: 'sasl-authenticated',
  EXPIRED: 'expired',
} as const;

export type KeeperStateValue = (typeof KeeperState)[keyof typeof KeeperState];

/**
 * Notification delivered over a session or watch channel
 */
export interface SessionEvent {
  type: EventTypeValue;
  state: KeeperStateValue;
  /** Node path for node events, empty for session events */
  path: string;
  error?: Error;
}

export function connectedEvent(): SessionEvent {
  return { type: EventType.SESSION, state: KeeperState.SYNC_CONNECTED, path: '' };
}

export function disconnectedEvent(): SessionEvent {
  return { type: EventType.SESSION, state: KeeperState.DISCONNECTED, path: '' };
}

export function expiredEvent(): SessionEvent {
  return { type: EventType.SESSION, state: KeeperState.EXPIRED, path: '' };
}

export function nodeEvent(
  type: Exclude<EventTypeValue, 'session' | 'none'>,
  path: string
): SessionEvent {
  return { type, state: KeeperState.SYNC_CONNECTED, path };
}

// ============================================================================
// Multi-op Batches
// ============================================================================

export interface CreateRequest {
  type: 'create';
  path: string;
  data: Uint8Array;
  acl: Acl[];
  flags: number;
}

export interface DeleteRequest {
  type: 'delete';
  path: string;
  version: number;
}

export interface SetDataRequest {
  type: 'set-data';
  path: string;
  data: Uint8Array;
  version: number;
}

export interface CheckVersionRequest {
  type: 'check';
  path: string;
  version: number;
}

/**
 * One sub-operation of an atomic batch
 */
export type MultiOp = CreateRequest | DeleteRequest | SetDataRequest | CheckVersionRequest;

export type MultiOpType = MultiOp['type'];

/**
 * Per-operation outcome of an atomic batch
 */
export interface MultiResponse {
  stat?: Stat;
  path?: string;
  error?: Error;
}
