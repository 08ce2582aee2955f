/**
 * Transaction - builds an atomic multi-op batch
 */

import { ClientStateError } from './errors.js';
import {
  ANY_VERSION,
  CreateMode,
  type Acl,
  type MultiOp,
  type MultiOpType,
  type MultiResponse,
  type Stat,
} from './types.js';

export interface TransactionResult {
  type: MultiOpType;
  /** Path the operation was requested for, without namespace */
  forPath: string;
  /** Created path for create operations, without namespace */
  resultPath?: string;
  stat?: Stat;
}

export interface TransactionCreateOptions {
  data?: Uint8Array;
  mode?: number;
  acl?: Acl[];
}

/**
 * What a transaction needs from the client that opened it
 */
export interface TransactionContext {
  fixPath(path: string): string;
  unfixPath(path: string): string;
  readonly defaultData: Uint8Array;
  aclForPath(path: string): Acl[];
  submit(ops: MultiOp[]): Promise<MultiResponse[]>;
}

/**
 * @example
 * ```typescript
 * const results = await client
 *   .inTransaction()
 *   .create('/jobs/1', { data: payload })
 *   .setData('/jobs', counter, stat.version)
 *   .commit();
 * ```
 */
export class Transaction {
  private readonly _ops: MultiOp[] = [];
  private readonly _paths: string[] = [];
  private _committed = false;

  constructor(private readonly context: TransactionContext) {}

  get operations(): readonly MultiOp[] {
    return this._ops;
  }

  create(path: string, options: TransactionCreateOptions = {}): this {
    const fullPath = this.context.fixPath(path);
    return this.add(path, {
      type: 'create',
      path: fullPath,
      data: options.data ?? this.context.defaultData,
      acl: options.acl ?? this.context.aclForPath(fullPath),
      flags: options.mode ?? CreateMode.PERSISTENT,
    });
  }

  delete(path: string, version: number = ANY_VERSION): this {
    return this.add(path, { type: 'delete', path: this.context.fixPath(path), version });
  }

  setData(path: string, data: Uint8Array, version: number = ANY_VERSION): this {
    return this.add(path, { type: 'set-data', path: this.context.fixPath(path), data, version });
  }

  check(path: string, version: number): this {
    return this.add(path, { type: 'check', path: this.context.fixPath(path), version });
  }

  /**
   * Submit every operation as one batch.
   *
   * Rejects with the first per-operation error when the batch was not applied.
   */
  async commit(): Promise<TransactionResult[]> {
    if (this._committed) {
      throw new ClientStateError('Transaction already committed');
    }
    this._committed = true;

    if (this._ops.length === 0) {
      return [];
    }

    const responses = await this.context.submit([...this._ops]);
    const failed = responses.find(response => response.error !== undefined);
    if (failed?.error) {
      throw failed.error;
    }

    return this._ops.map((op, index) => {
      const response = responses[index] ?? {};
      return {
        type: op.type,
        forPath: this._paths[index] ?? op.path,
        resultPath: response.path !== undefined ? this.context.unfixPath(response.path) : undefined,
        stat: response.stat,
      };
    });
  }

  private add(path: string, op: MultiOp): this {
    this._ops.push(op);
    this._paths.push(path);
    return this;
  }
}
