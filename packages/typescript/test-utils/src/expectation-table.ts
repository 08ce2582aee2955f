/**
 * ExpectationTable - the programmed-call table behind every test double
 *
 * Each double owns one table holding an ordered list of expectations
 * (matcher, outcome, repetition). A call is served by the first expectation
 * whose method and arguments match and which still has invocations left.
 */

import { HarnessAssertionError, HarnessErrorCode, type HarnessErrorCodeType } from './errors.js';
import { formatCall, type CallOutcome } from './format.js';
import { argsMatch, type ArgMatcher } from './matchers.js';
import type { CallLogEntry } from './types.js';

type AnyMethod = (...args: never[]) => unknown;

/** Names of the function-valued members of an API */
export type MethodName<TApi> = {
  [K in keyof TApi]-?: TApi[K] extends AnyMethod ? K : never;
}[keyof TApi] &
  string;

export type ArgsOf<TApi, M extends keyof TApi> = TApi[M] extends (...args: infer A extends unknown[]) => unknown
  ? A
  : never;

/** Resolved result type of a method (promises unwrapped) */
export type ResultOf<TApi, M extends keyof TApi> = TApi[M] extends (...args: never[]) => infer R
  ? Awaited<R>
  : never;

/** Each argument either as a literal compared structurally or as a matcher */
export type ArgMatchers<A extends unknown[]> = { [I in keyof A]: A[I] | ArgMatcher };

export type Repetition = { kind: 'unlimited' } | { kind: 'times'; count: number };

/**
 * One programmed call. Unlimited by default; `once()` or `times(n)` make it exact.
 */
export class Expectation<TResult> {
  private _outcome: CallOutcome | undefined;
  private _repetition: Repetition = { kind: 'unlimited' };
  private _calls = 0;

  constructor(
    readonly method: string,
    readonly args: readonly unknown[],
    private readonly allowThrows: boolean = true
  ) {}

  get calls(): number {
    return this._calls;
  }

  get repetition(): Repetition {
    return this._repetition;
  }

  get outcome(): CallOutcome | undefined {
    return this._outcome;
  }

  /**
   * Resolve calls with `value`
   */
  returns(value: TResult): this {
    this._outcome = { kind: 'return', value };
    return this;
  }

  /**
   * Reject calls with `error`, e.g. a simulated NodeExistsError
   */
  throws(error: Error): this {
    if (!this.allowThrows) {
      throw new HarnessAssertionError(
        HarnessErrorCode.INVALID_STATE,
        `${this.method}() cannot be programmed to fail`
      );
    }
    this._outcome = { kind: 'throw', error };
    return this;
  }

  once(): this {
    return this.times(1);
  }

  times(count: number): this {
    if (!Number.isInteger(count) || count < 1) {
      throw new HarnessAssertionError(HarnessErrorCode.INVALID_STATE, `times() needs a positive integer, got ${count}`);
    }
    this._repetition = { kind: 'times', count };
    return this;
  }

  always(): this {
    this._repetition = { kind: 'unlimited' };
    return this;
  }

  /** Whether another invocation is allowed */
  get available(): boolean {
    return this._repetition.kind === 'unlimited' || this._calls < this._repetition.count;
  }

  /** Whether the repetition policy has been met */
  get satisfied(): boolean {
    return this._repetition.kind === 'unlimited' ? this._calls > 0 : this._calls === this._repetition.count;
  }

  describe(): string {
    return formatCall(this.method, this.args);
  }

  /** @internal */
  consume(): CallOutcome | undefined {
    this._calls++;
    return this._outcome;
  }
}

export interface ExpectationTableOptions {
  /** Name used in failure messages */
  name: string;
  /** Whether expectations may be programmed with throws() (default: true) */
  allowThrows?: boolean;
}

/**
 * @example
 * ```typescript
 * const table = new ExpectationTable<SessionConnection>({ name: 'connection' });
 * table.on('get', '/a').returns({ data: bytes('v'), stat }).once();
 *
 * table.invoke('get', ['/a']); // { kind: 'return', value: { data, stat } }
 * table.invoke('get', ['/a']); // throws OVER_INVOCATION
 * ```
 */
export class ExpectationTable<TApi> {
  private readonly _expectations: Expectation<unknown>[] = [];
  private readonly _failures: HarnessAssertionError[] = [];
  private readonly _callLog: CallLogEntry[] = [];

  constructor(private readonly options: ExpectationTableOptions) {}

  get name(): string {
    return this.options.name;
  }

  get callLog(): readonly CallLogEntry[] {
    return this._callLog;
  }

  /** Failures raised by this table so far, kept even if the caller swallowed them */
  get failures(): readonly HarnessAssertionError[] {
    return this._failures;
  }

  get expectations(): readonly Expectation<unknown>[] {
    return this._expectations;
  }

  /**
   * Program a call to `method` with the given arguments
   */
  on<M extends MethodName<TApi>>(
    method: M,
    ...args: [...ArgMatchers<ArgsOf<TApi, M>>]
  ): Expectation<ResultOf<TApi, M>> {
    const expectation = new Expectation<ResultOf<TApi, M>>(method, args, this.options.allowThrows ?? true);
    this._expectations.push(expectation);
    return expectation;
  }

  /**
   * Serve a call. Returns the programmed outcome, or undefined when the
   * matching expectation has none.
   *
   * @throws HarnessAssertionError for unprogrammed calls and over-invocations
   */
  invoke(method: string, args: readonly unknown[]): CallOutcome | undefined {
    this._callLog.push({ method, args: [...args], timestamp: Date.now() });

    const candidates = this._expectations.filter(
      expectation => expectation.method === method && argsMatch(expectation.args, args)
    );

    const next = candidates.find(expectation => expectation.available);
    if (next) {
      return next.consume();
    }

    if (candidates.length > 0) {
      const allowed = candidates.reduce(
        (total, candidate) => total + (candidate.repetition.kind === 'times' ? candidate.repetition.count : 0),
        0
      );
      throw this.fail(
        HarnessErrorCode.OVER_INVOCATION,
        `${this.name}: ${formatCall(method, args)} was called more than the ${allowed} time(s) programmed`
      );
    }

    const sameMethod = this._expectations.filter(expectation => expectation.method === method);
    throw this.fail(
      HarnessErrorCode.UNPROGRAMMED_CALL,
      `${this.name}: unexpected call ${formatCall(method, args)}`,
      sameMethod.map(expectation => `programmed: ${expectation.describe()}`)
    );
  }

  /**
   * Problems found so far: recorded failures and unmet expectations
   */
  verify(): string[] {
    const problems = this._failures.map(failure => failure.message.split('\n')[0] ?? failure.message);

    for (const expectation of this._expectations) {
      if (expectation.satisfied) continue;
      const wanted =
        expectation.repetition.kind === 'times'
          ? `${expectation.repetition.count} call(s)`
          : 'at least 1 call';
      problems.push(`${this.name}: ${expectation.describe()} expected ${wanted}, got ${expectation.calls}`);
    }

    return problems;
  }

  /**
   * @throws HarnessAssertionError if any problem was found
   */
  assertExpectations(): void {
    const problems = this.verify();
    if (problems.length === 0) return;

    const code = this._failures[0]?.code ?? HarnessErrorCode.UNSATISFIED_EXPECTATION;
    throw new HarnessAssertionError(code, `${this.name} expectations not met`, problems);
  }

  getCallsForMethod(method: string): CallLogEntry[] {
    return this._callLog.filter(entry => entry.method === method);
  }

  wasMethodCalled(method: string): boolean {
    return this._callLog.some(entry => entry.method === method);
  }

  private fail(code: HarnessErrorCodeType, message: string, details: readonly string[] = []): HarnessAssertionError {
    const error = new HarnessAssertionError(code, message, details);
    this._failures.push(error);
    return error;
  }
}
