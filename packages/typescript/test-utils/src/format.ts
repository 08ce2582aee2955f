/**
 * Human-readable rendering of calls for trace logs and failure messages
 */

import { isArgMatcher } from './matchers.js';

const MAX_DEPTH = 3;

export type CallOutcome =
  | { kind: 'return'; value: unknown }
  | { kind: 'throw'; error: unknown };

/**
 * Render a value the way it appears in traces, e.g. `bytes("v")` for payloads
 */
export function formatValue(value: unknown, depth = 0): string {
  if (value === undefined) return 'undefined';
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (typeof value === 'symbol') return value.toString();
  if (typeof value === 'function') return `<function ${value.name || 'anonymous'}>`;
  if (isArgMatcher(value)) return `<${value.description}>`;
  if (value instanceof Uint8Array) {
    return `bytes(${JSON.stringify(new TextDecoder().decode(value))})`;
  }
  if (value instanceof Error) return `${value.name}(${JSON.stringify(value.message)})`;
  if (depth >= MAX_DEPTH) return Array.isArray(value) ? '[...]' : '{...}';
  if (Array.isArray(value)) {
    return `[${value.map(item => formatValue(item, depth + 1)).join(', ')}]`;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  if (proto !== Object.prototype && proto !== null) {
    return `<${value.constructor.name}>`;
  }

  const entries = Object.entries(value)
    .filter(([, entry]) => entry !== undefined)
    .map(([key, entry]) => `${key}: ${formatValue(entry, depth + 1)}`);
  return `{${entries.join(', ')}}`;
}

/**
 * Render a call and its outcome as one trace line
 *
 * @example
 * ```typescript
 * formatCall('get', ['/a'], { kind: 'return', value: { data: bytes('v') } });
 * // 'get("/a") => {data: bytes("v")}'
 * ```
 */
export function formatCall(method: string, args: readonly unknown[], outcome?: CallOutcome): string {
  const call = `${method}(${args.map(arg => formatValue(arg)).join(', ')})`;
  if (!outcome) return call;
  if (outcome.kind === 'throw') return `${call} throws ${formatValue(outcome.error)}`;
  return `${call} => ${formatValue(outcome.value)}`;
}
