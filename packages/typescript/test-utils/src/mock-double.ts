/**
 * MockDouble - base class for the collaborator doubles
 */

import { noopLogger, type Logger } from '@ensemble/client';
import {
  ExpectationTable,
  type ArgMatchers,
  type ArgsOf,
  type Expectation,
  type MethodName,
  type ResultOf,
} from './expectation-table.js';
import { formatCall } from './format.js';
import type { CallLogEntry, MockDoubleOptions } from './types.js';

export abstract class MockDouble<TApi> {
  readonly expectations: ExpectationTable<TApi>;
  logger: Logger;

  protected constructor(
    readonly name: string,
    options: MockDoubleOptions & { allowThrows?: boolean } = {}
  ) {
    this.expectations = new ExpectationTable<TApi>({ name, allowThrows: options.allowThrows });
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * Program a call
   *
   * @example
   * ```typescript
   * connection.on('get', '/a').returns({ data: bytes('v'), stat }).once();
   * ```
   */
  on<M extends MethodName<TApi>>(
    method: M,
    ...args: [...ArgMatchers<ArgsOf<TApi, M>>]
  ): Expectation<ResultOf<TApi, M>> {
    return this.expectations.on(method, ...args);
  }

  get callLog(): readonly CallLogEntry[] {
    return this.expectations.callLog;
  }

  getCallsForMethod(method: MethodName<TApi>): CallLogEntry[] {
    return this.expectations.getCallsForMethod(method);
  }

  wasMethodCalled(method: MethodName<TApi>): boolean {
    return this.expectations.wasMethodCalled(method);
  }

  /**
   * Unmet expectations and recorded failures of this double
   */
  verify(): string[] {
    return this.expectations.verify();
  }

  /**
   * @throws HarnessAssertionError if any expectation is unmet or any failure was recorded
   */
  assertExpectations(): void {
    this.expectations.assertExpectations();
  }

  /**
   * Serve a call from the table, tracing it. Returns the programmed value,
   * undefined when the matching expectation has none.
   */
  protected called(method: MethodName<TApi>, args: readonly unknown[]): unknown {
    let outcome;
    try {
      outcome = this.expectations.invoke(method, args);
    } catch (error) {
      this.logger.debug(`${this.name}.${formatCall(method, args, { kind: 'throw', error })}`);
      throw error;
    }

    this.logger.debug(`${this.name}.${formatCall(method, args, outcome ?? { kind: 'return', value: undefined })}`);

    if (outcome?.kind === 'throw') {
      throw outcome.error;
    }
    return outcome?.value;
  }
}
