/**
 * MockDialer - programmable session factory
 */

import type { Dialer, DialResult, SessionConnection } from '@ensemble/client';
import { HarnessAssertionError, HarnessErrorCode } from './errors.js';
import { field, isEventSource, isRecord } from './guards.js';
import { MockDouble } from './mock-double.js';
import type { MockDoubleOptions } from './types.js';

function isSessionConnection(value: unknown): value is SessionConnection {
  return isRecord(value) && typeof value.get === 'function' && typeof value.close === 'function';
}

/**
 * @example
 * ```typescript
 * const dialer = new MockDialer();
 * dialer.on('dial', 'connectString', DEFAULT_SESSION_TIMEOUT_MS, false).returns({ connection, events }).once();
 * ```
 */
export class MockDialer extends MockDouble<Dialer> implements Dialer {
  constructor(options: MockDoubleOptions = {}) {
    super('dialer', options);
  }

  async dial(connectString: string, sessionTimeoutMs: number, canBeReadOnly: boolean): Promise<DialResult> {
    const result = this.called('dial', [connectString, sessionTimeoutMs, canBeReadOnly]);

    const connection = field(result, 'connection', isSessionConnection);
    const events = field(result, 'events', isEventSource);
    if (!connection || !events) {
      throw new HarnessAssertionError(
        HarnessErrorCode.INVALID_STATE,
        `${this.name}: dial() was programmed without a connection and an event source`
      );
    }
    return { connection, events };
  }
}
