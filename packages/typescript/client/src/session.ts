/**
 * Session contract - what a live connection to the coordination service offers
 */

import type { EventSource } from './channel.js';
import type { Acl, MultiOp, MultiResponse, SessionEvent, Stat } from './types.js';

export interface ExistsResult {
  exists: boolean;
  stat?: Stat;
}

export interface DataResult {
  data: Uint8Array;
  stat?: Stat;
}

export interface ChildrenResult {
  children: string[];
  stat?: Stat;
}

export interface AclResult {
  acl: Acl[];
  stat?: Stat;
}

/**
 * A read result paired with a one-shot watch armed for the path
 */
export type Watched<T> = T & { watch: EventSource<SessionEvent> };

/**
 * One session with the coordination service.
 *
 * Failures reported by the service reject with a KeeperError subclass.
 */
export interface SessionConnection {
  addAuth(scheme: string, credential: Uint8Array): Promise<void>;
  create(path: string, data: Uint8Array, flags: number, acl: Acl[]): Promise<string>;
  exists(path: string): Promise<ExistsResult>;
  existsW(path: string): Promise<Watched<ExistsResult>>;
  get(path: string): Promise<DataResult>;
  getW(path: string): Promise<Watched<DataResult>>;
  set(path: string, data: Uint8Array, version: number): Promise<Stat | undefined>;
  children(path: string): Promise<ChildrenResult>;
  childrenW(path: string): Promise<Watched<ChildrenResult>>;
  getAcl(path: string): Promise<AclResult>;
  setAcl(path: string, acl: Acl[], version: number): Promise<Stat | undefined>;
  delete(path: string, version: number): Promise<void>;
  multi(...ops: MultiOp[]): Promise<MultiResponse[]>;
  sync(path: string): Promise<string>;
  /** Ends the session; called exactly once */
  close(): void;
}

export interface DialResult {
  connection: SessionConnection;
  /** Session-level notifications, closed when the session ends */
  events: EventSource<SessionEvent>;
}

/**
 * Establishes sessions
 */
export interface Dialer {
  dial(connectString: string, sessionTimeoutMs: number, canBeReadOnly: boolean): Promise<DialResult>;
}
