/**
 * Harness failures
 *
 * These are test failures, not simulated coordination-service errors: a
 * double that wants to simulate "node exists" throws a KeeperError instead.
 */

export const HarnessErrorCode = {
  /** A double received a call nobody programmed */
  UNPROGRAMMED_CALL: 'UNPROGRAMMED_CALL',
  /** A programmed call was invoked more times than its repetition allows */
  OVER_INVOCATION: 'OVER_INVOCATION',
  /** A programmed call was never (or not often enough) invoked */
  UNSATISFIED_EXPECTATION: 'UNSATISFIED_EXPECTATION',
  /** A callback asked for a dependency the harness does not provide */
  UNSUPPORTED_DEPENDENCY: 'UNSUPPORTED_DEPENDENCY',
  /** The harness or a double was used out of order */
  INVALID_STATE: 'INVALID_STATE',
} as const;

export type HarnessErrorCodeType = (typeof HarnessErrorCode)[keyof typeof HarnessErrorCode];

/**
 * A harness-level test failure. Never retried, never expected by the client under test.
 */
export class HarnessAssertionError extends Error {
  constructor(
    public readonly code: HarnessErrorCodeType,
    message: string,
    public readonly details: readonly string[] = []
  ) {
    super(details.length > 0 ? `${message}\n${details.map(line => `  - ${line}`).join('\n')}` : message);
    this.name = 'HarnessAssertionError';
    Object.setPrototypeOf(this, HarnessAssertionError.prototype);
  }

  toJSON(): { name: string; message: string; code: string; details: readonly string[] } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Thrown by a double configured to crash, e.g. MockConnection with crashOnClose
 */
export class SimulatedCrashError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SimulatedCrashError';
    Object.setPrototypeOf(this, SimulatedCrashError.prototype);
  }
}
