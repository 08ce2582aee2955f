/**
 * Argument matchers for programmed calls
 */

import { isDeepStrictEqual } from 'node:util';

const MATCHER = Symbol('ensemble.argMatcher');

/**
 * Matches an argument by predicate instead of by structural equality
 */
export interface ArgMatcher {
  readonly [MATCHER]: true;
  readonly description: string;
  matches(actual: unknown): boolean;
}

export function isArgMatcher(value: unknown): value is ArgMatcher {
  return typeof value === 'object' && value !== null && MATCHER in value;
}

/**
 * Matches any argument
 */
export function anything(): ArgMatcher {
  return matching(() => true, 'anything');
}

/**
 * Matches arguments accepted by `predicate`
 *
 * @example
 * ```typescript
 * connection.on('create', matching(p => String(p).startsWith('/locks/'), 'lock path'), anything(), 3, anything());
 * ```
 */
export function matching(predicate: (actual: unknown) => boolean, description: string = 'matching(...)'): ArgMatcher {
  return {
    [MATCHER]: true,
    description,
    matches: predicate,
  };
}

/**
 * Encode a string as a byte payload
 */
export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function isByteView(value: unknown): value is ArrayBufferView {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

function sameBytes(a: ArrayBufferView, b: ArrayBufferView): boolean {
  if (a.byteLength !== b.byteLength) return false;
  const left = new Uint8Array(a.buffer, a.byteOffset, a.byteLength);
  const right = new Uint8Array(b.buffer, b.byteOffset, b.byteLength);
  return left.every((byte, index) => byte === right[index]);
}

/**
 * Structural equality, with byte payloads compared by content whatever their
 * concrete typed-array class (Buffer and Uint8Array compare equal)
 */
export function structurallyEqual(expected: unknown, actual: unknown): boolean {
  if (Object.is(expected, actual)) return true;
  if (isArgMatcher(expected)) return expected.matches(actual);
  if (isByteView(expected) || isByteView(actual)) {
    return isByteView(expected) && isByteView(actual) && sameBytes(expected, actual);
  }
  if (Array.isArray(expected) || Array.isArray(actual)) {
    if (!Array.isArray(expected) || !Array.isArray(actual)) return false;
    const items: unknown[] = actual;
    return (
      expected.length === items.length &&
      expected.every((item, index) => structurallyEqual(item, items[index]))
    );
  }
  if (isPlainObject(expected) && isPlainObject(actual)) {
    const left = expected;
    const right = actual;
    const keys = Object.keys(left).filter(key => left[key] !== undefined);
    const rightKeys = Object.keys(right).filter(key => right[key] !== undefined);
    return (
      keys.length === rightKeys.length &&
      keys.every(key => structurallyEqual(left[key], right[key]))
    );
  }
  return isDeepStrictEqual(expected, actual);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether actual call arguments satisfy programmed ones
 */
export function argsMatch(expected: readonly unknown[], actual: readonly unknown[]): boolean {
  return (
    expected.length === actual.length &&
    expected.every((value, index) => structurallyEqual(value, actual[index]))
  );
}
