/**
 * Readers for programmed results
 *
 * A programmed result that is missing or of the wrong shape reads as the
 * zero value of the expected type.
 */

import type { Acl, EventSource, MultiResponse, SessionEvent, Stat } from '@ensemble/client';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isBytes(value: unknown): value is Uint8Array {
  return value instanceof Uint8Array;
}

export function isString(value: unknown): value is string {
  return typeof value === 'string';
}

export function isStat(value: unknown): value is Stat {
  return isRecord(value) && typeof value.version === 'number';
}

export function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

export function isAclList(value: unknown): value is Acl[] {
  return (
    Array.isArray(value) &&
    value.every(entry => isRecord(entry) && typeof entry.perms === 'number' && isString(entry.scheme))
  );
}

export function isMultiResponse(value: unknown): value is MultiResponse {
  return isRecord(value) && (value.stat === undefined || isStat(value.stat));
}

export function isEventSource(value: unknown): value is EventSource<SessionEvent> {
  return isRecord(value) && typeof value.receive === 'function';
}

/**
 * `source[key]` when it passes `guard`
 */
export function field<T>(source: unknown, key: string, guard: (value: unknown) => value is T): T | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return guard(value) ? value : undefined;
}
