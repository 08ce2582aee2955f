/**
 * Pluggable strategies consumed by the client: ensemble addressing,
 * payload compression, ACL selection and tracing
 */

import { gunzipSync, gzipSync } from 'node:zlib';
import { OPEN_ACL_UNSAFE, type Acl } from './types.js';

// ============================================================================
// Ensemble
// ============================================================================

/**
 * Supplies the connect string used to dial the ensemble
 */
export interface EnsembleProvider {
  start(): Promise<void>;
  connectionString(): string;
  close(): Promise<void>;
}

/**
 * Ensemble provider with a fixed connect string
 */
export class FixedEnsembleProvider implements EnsembleProvider {
  constructor(private readonly _connectString: string) {}

  async start(): Promise<void> {}

  connectionString(): string {
    return this._connectString;
  }

  async close(): Promise<void> {}
}

// ============================================================================
// Compression
// ============================================================================

export interface CompressionProvider {
  compress(path: string, data: Uint8Array): Promise<Uint8Array>;
  decompress(path: string, compressedData: Uint8Array): Promise<Uint8Array>;
}

export class GzipCompressionProvider implements CompressionProvider {
  async compress(_path: string, data: Uint8Array): Promise<Uint8Array> {
    return gzipSync(data);
  }

  async decompress(_path: string, compressedData: Uint8Array): Promise<Uint8Array> {
    return gunzipSync(compressedData);
  }
}

// ============================================================================
// ACLs
// ============================================================================

/**
 * Chooses the ACL applied to nodes the client creates
 */
export interface AclProvider {
  defaultAcl(): Acl[];
  aclForPath(path: string): Acl[];
}

export class DefaultAclProvider implements AclProvider {
  constructor(private readonly _acl: readonly Acl[] = OPEN_ACL_UNSAFE) {}

  defaultAcl(): Acl[] {
    return [...this._acl];
  }

  aclForPath(_path: string): Acl[] {
    return this.defaultAcl();
  }
}

// ============================================================================
// Tracing
// ============================================================================

/**
 * Receives operation timings and counters
 */
export interface TracerDriver {
  addTime(name: string, durationMs: number): void;
  addCount(name: string, increment: number): void;
}

export const nullTracerDriver: TracerDriver = {
  addTime: () => {},
  addCount: () => {},
};
