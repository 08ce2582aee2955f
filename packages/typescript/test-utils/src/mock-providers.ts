/**
 * Doubles for the client's pluggable strategies
 */

import type {
  Acl,
  AclProvider,
  CompressionProvider,
  CoordinationClient,
  EnsurePath,
  EnsurePathHelper,
  RetrySleeper,
  TracerDriver,
} from '@ensemble/client';
import { isAclList, isBytes, isRecord } from './guards.js';
import { MockDouble } from './mock-double.js';
import type { MockDoubleOptions } from './types.js';

export class MockCompressionProvider extends MockDouble<CompressionProvider> implements CompressionProvider {
  constructor(options: MockDoubleOptions = {}) {
    super('compression', options);
  }

  async compress(path: string, data: Uint8Array): Promise<Uint8Array> {
    const compressed = this.called('compress', [path, data]);
    return isBytes(compressed) ? compressed : new Uint8Array(0);
  }

  async decompress(path: string, compressedData: Uint8Array): Promise<Uint8Array> {
    const data = this.called('decompress', [path, compressedData]);
    return isBytes(data) ? data : new Uint8Array(0);
  }
}

/**
 * ACL selection has no failure path: programming throws() is rejected.
 */
export class MockAclProvider extends MockDouble<AclProvider> implements AclProvider {
  constructor(options: MockDoubleOptions = {}) {
    super('acl', { ...options, allowThrows: false });
  }

  defaultAcl(): Acl[] {
    const acl = this.called('defaultAcl', []);
    return isAclList(acl) ? acl : [];
  }

  aclForPath(path: string): Acl[] {
    const acl = this.called('aclForPath', [path]);
    return isAclList(acl) ? acl : [];
  }
}

function isEnsurePath(value: unknown): value is EnsurePath {
  return isRecord(value) && typeof value.ensure === 'function' && typeof value.excludingLast === 'function';
}

/**
 * excludingLast() returns the programmed EnsurePath, or this double when none is programmed
 */
export class MockEnsurePath extends MockDouble<EnsurePath> implements EnsurePath {
  constructor(name: string = 'ensurePath', options: MockDoubleOptions = {}) {
    super(name, options);
  }

  async ensure(client: CoordinationClient): Promise<void> {
    this.called('ensure', [client]);
  }

  excludingLast(): EnsurePath {
    const variant = this.called('excludingLast', []);
    return isEnsurePath(variant) ? variant : this;
  }
}

export class MockEnsurePathHelper extends MockDouble<EnsurePathHelper> implements EnsurePathHelper {
  constructor(options: MockDoubleOptions = {}) {
    super('ensurePathHelper', options);
  }

  async ensure(client: CoordinationClient, path: string, makeLastNode: boolean): Promise<void> {
    this.called('ensure', [client, path, makeLastNode]);
  }
}

export class MockRetrySleeper extends MockDouble<RetrySleeper> implements RetrySleeper {
  constructor(options: MockDoubleOptions = {}) {
    super('retrySleeper', options);
  }

  async sleepFor(durationMs: number): Promise<void> {
    this.called('sleepFor', [durationMs]);
  }
}

export class MockTracerDriver extends MockDouble<TracerDriver> implements TracerDriver {
  constructor(options: MockDoubleOptions = {}) {
    super('tracer', options);
  }

  addTime(name: string, durationMs: number): void {
    this.called('addTime', [name, durationMs]);
  }

  addCount(name: string, increment: number): void {
    this.called('addCount', [name, increment]);
  }
}
