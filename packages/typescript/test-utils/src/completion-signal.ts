/**
 * CompletionSignal - counts outstanding asynchronous work
 */

import { HarnessAssertionError, HarnessErrorCode } from './errors.js';

/**
 * @example
 * ```typescript
 * const signal = new CompletionSignal();
 * signal.add();
 * setTimeout(() => signal.done(), 10);
 * await signal.wait();
 * ```
 */
export class CompletionSignal {
  private _pending = 0;
  private _waiters: Array<() => void> = [];

  get pending(): number {
    return this._pending;
  }

  add(count: number = 1): void {
    if (!Number.isInteger(count) || count < 0) {
      throw new HarnessAssertionError(HarnessErrorCode.INVALID_STATE, `add() needs a non-negative integer, got ${count}`);
    }
    this._pending += count;
  }

  /**
   * Mark one unit of work complete
   */
  done(): void {
    if (this._pending === 0) {
      throw new HarnessAssertionError(HarnessErrorCode.INVALID_STATE, 'done() called with no pending work');
    }
    this._pending--;
    if (this._pending === 0) {
      const waiters = this._waiters;
      this._waiters = [];
      waiters.forEach(resolve => resolve());
    }
  }

  /**
   * Resolves once no work is pending
   */
  wait(): Promise<void> {
    if (this._pending === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this._waiters.push(resolve);
    });
  }
}
