/**
 * MockConnection - programmable stand-in for a live session
 */

import {
  EventChannel,
  type Acl,
  type AclResult,
  type ChildrenResult,
  type DataResult,
  type EventSource,
  type ExistsResult,
  type MultiOp,
  type MultiResponse,
  type SessionConnection,
  type SessionEvent,
  type Stat,
  type Watched,
} from '@ensemble/client';
import { SimulatedCrashError } from './errors.js';
import {
  field,
  isAclList,
  isBytes,
  isEventSource,
  isMultiResponse,
  isStat,
  isString,
  isStringArray,
} from './guards.js';
import { MockDouble } from './mock-double.js';
import type { MockDoubleOptions } from './types.js';

export interface MockConnectionOptions extends MockDoubleOptions {
  /** Make close() throw SimulatedCrashError instead of consuming an expectation */
  crashOnClose?: boolean;
}

/**
 * Every operation is served from the programmed table; a result left
 * unprogrammed reads as the zero value of its shape (empty payload, no stat,
 * no children). Watched reads without a programmed watch get a fresh channel.
 *
 * @example
 * ```typescript
 * const connection = new MockConnection();
 * connection.on('get', '/a').returns({ data: bytes('v'), stat: createStat({ version: 1 }) }).once();
 * connection.on('create', '/a', anything(), CreateMode.PERSISTENT, anything()).throws(new NodeExistsError('/a'));
 * ```
 */
export class MockConnection extends MockDouble<SessionConnection> implements SessionConnection {
  private readonly _operations: MultiOp[] = [];
  crashOnClose: boolean;

  constructor(options: MockConnectionOptions = {}) {
    super('connection', options);
    this.crashOnClose = options.crashOnClose ?? false;
  }

  /**
   * Every sub-operation passed to multi(), in call order, whatever the
   * programmed outcome
   */
  get operations(): readonly MultiOp[] {
    return this._operations;
  }

  async addAuth(scheme: string, credential: Uint8Array): Promise<void> {
    this.called('addAuth', [scheme, credential]);
  }

  async create(path: string, data: Uint8Array, flags: number, acl: Acl[]): Promise<string> {
    const createdPath = this.called('create', [path, data, flags, acl]);
    return isString(createdPath) ? createdPath : '';
  }

  async exists(path: string): Promise<ExistsResult> {
    return existsResult(this.called('exists', [path]));
  }

  async existsW(path: string): Promise<Watched<ExistsResult>> {
    const result = this.called('existsW', [path]);
    return { ...existsResult(result), watch: watchOf(result) };
  }

  async get(path: string): Promise<DataResult> {
    return dataResult(this.called('get', [path]));
  }

  async getW(path: string): Promise<Watched<DataResult>> {
    const result = this.called('getW', [path]);
    return { ...dataResult(result), watch: watchOf(result) };
  }

  async set(path: string, data: Uint8Array, version: number): Promise<Stat | undefined> {
    const stat = this.called('set', [path, data, version]);
    return isStat(stat) ? stat : undefined;
  }

  async children(path: string): Promise<ChildrenResult> {
    return childrenResult(this.called('children', [path]));
  }

  async childrenW(path: string): Promise<Watched<ChildrenResult>> {
    const result = this.called('childrenW', [path]);
    return { ...childrenResult(result), watch: watchOf(result) };
  }

  async getAcl(path: string): Promise<AclResult> {
    const result = this.called('getAcl', [path]);
    return { acl: field(result, 'acl', isAclList) ?? [], stat: field(result, 'stat', isStat) };
  }

  async setAcl(path: string, acl: Acl[], version: number): Promise<Stat | undefined> {
    const stat = this.called('setAcl', [path, acl, version]);
    return isStat(stat) ? stat : undefined;
  }

  async delete(path: string, version: number): Promise<void> {
    this.called('delete', [path, version]);
  }

  async multi(...ops: MultiOp[]): Promise<MultiResponse[]> {
    this._operations.push(...ops);
    const responses = this.called('multi', ops);
    return Array.isArray(responses) ? responses.filter(isMultiResponse) : [];
  }

  async sync(path: string): Promise<string> {
    const synced = this.called('sync', [path]);
    return isString(synced) ? synced : '';
  }

  close(): void {
    if (this.crashOnClose) {
      this.logger.debug(`${this.name}.close() crashed`);
      throw new SimulatedCrashError('connection crashed while closing');
    }
    this.called('close', []);
  }
}

function existsResult(result: unknown): ExistsResult {
  return { exists: field(result, 'exists', isBoolean) ?? false, stat: field(result, 'stat', isStat) };
}

function dataResult(result: unknown): DataResult {
  return { data: field(result, 'data', isBytes) ?? new Uint8Array(0), stat: field(result, 'stat', isStat) };
}

function childrenResult(result: unknown): ChildrenResult {
  return { children: field(result, 'children', isStringArray) ?? [], stat: field(result, 'stat', isStat) };
}

function watchOf(result: unknown): EventSource<SessionEvent> {
  return field(result, 'watch', isEventSource) ?? new EventChannel<SessionEvent>();
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}
