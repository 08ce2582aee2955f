/**
 * Ensure-path strategies: make sure every segment of a path exists before a
 * dependent operation runs
 */

import type { CoordinationClient } from './client.js';
import { NodeExistsError } from './errors.js';
import { pathPrefixes } from './paths.js';
import { CreateMode } from './types.js';

/**
 * Low-level, path-parameterized ensure
 */
export interface EnsurePathHelper {
  /**
   * Create every missing node along `path`; `makeLastNode` false stops at its parent
   */
  ensure(client: CoordinationClient, path: string, makeLastNode: boolean): Promise<void>;
}

/**
 * Guarantees a fixed path exists
 */
export interface EnsurePath {
  ensure(client: CoordinationClient): Promise<void>;
  /** A variant that ensures all but the final path segment */
  excludingLast(): EnsurePath;
}

export class DefaultEnsurePathHelper implements EnsurePathHelper {
  async ensure(client: CoordinationClient, path: string, makeLastNode: boolean): Promise<void> {
    const connection = client.getConnection();

    for (const prefix of pathPrefixes(path, makeLastNode)) {
      const { exists } = await connection.exists(prefix);
      if (exists) continue;

      try {
        await connection.create(prefix, new Uint8Array(0), CreateMode.PERSISTENT, client.aclForPath(prefix));
      } catch (error) {
        // created concurrently
        if (!(error instanceof NodeExistsError)) {
          throw error;
        }
      }
    }
  }
}

/**
 * EnsurePath over an absolute (already namespaced) path.
 *
 * Once the path has been ensured successfully, later calls return immediately.
 */
export class NamespacedEnsurePath implements EnsurePath {
  private _ensured = false;

  constructor(
    readonly path: string,
    private readonly helper: EnsurePathHelper = new DefaultEnsurePathHelper(),
    readonly makeLastNode: boolean = true
  ) {}

  async ensure(client: CoordinationClient): Promise<void> {
    if (this._ensured) {
      return;
    }
    await this.helper.ensure(client, this.path, this.makeLastNode);
    this._ensured = true;
  }

  excludingLast(): EnsurePath {
    return new NamespacedEnsurePath(this.path, this.helper, false);
  }
}
