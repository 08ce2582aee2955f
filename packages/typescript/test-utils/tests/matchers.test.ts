/**
 * Tests for argument matchers and call formatting
 */

import { describe, it, expect } from 'vitest';
import { EventChannel, NodeExistsError, NoNodeError } from '@ensemble/client';
import { formatCall, formatValue } from '../src/format.js';
import { anything, argsMatch, bytes, isArgMatcher, matching, structurallyEqual } from '../src/matchers.js';

describe('structurallyEqual', () => {
  it('should compare byte payloads by content', () => {
    expect(structurallyEqual(bytes('v'), Buffer.from('v'))).toBe(true);
    expect(structurallyEqual(bytes('v'), bytes('w'))).toBe(false);
    expect(structurallyEqual(bytes('v'), 'v')).toBe(false);
  });

  it('should compare arrays and plain objects deeply', () => {
    expect(structurallyEqual([{ perms: 31, scheme: 'world', id: 'anyone' }], [{ perms: 31, scheme: 'world', id: 'anyone' }])).toBe(true);
    expect(structurallyEqual([1, 2], [1, 2, 3])).toBe(false);
    expect(structurallyEqual({ path: '/a', data: bytes('x') }, { path: '/a', data: bytes('x') })).toBe(true);
  });

  it('should ignore keys holding undefined', () => {
    expect(structurallyEqual({ path: '/a', stat: undefined }, { path: '/a' })).toBe(true);
  });

  it('should apply matchers found at any depth', () => {
    expect(structurallyEqual({ path: anything() }, { path: '/anything' })).toBe(true);
    expect(structurallyEqual([matching(value => value === 3)], [4])).toBe(false);
  });
});

describe('argsMatch', () => {
  it('should require the same arity', () => {
    expect(argsMatch(['/a'], ['/a'])).toBe(true);
    expect(argsMatch(['/a'], ['/a', -1])).toBe(false);
  });
});

describe('matchers', () => {
  it('should be recognizable', () => {
    expect(isArgMatcher(anything())).toBe(true);
    expect(isArgMatcher({ description: 'anything' })).toBe(false);
  });
});

describe('formatValue', () => {
  it('should render values the way traces show them', () => {
    expect(formatValue('a')).toBe('"a"');
    expect(formatValue(-1)).toBe('-1');
    expect(formatValue(bytes('v'))).toBe('bytes("v")');
    expect(formatValue(new NoNodeError('/a'))).toBe('NoNodeError("node does not exist: /a")');
    expect(formatValue(anything())).toBe('<anything>');
    expect(formatValue(new EventChannel<number>())).toBe('<EventChannel>');
    expect(formatValue({ path: '/a', version: 1, stat: undefined })).toBe('{path: "/a", version: 1}');
    expect(formatValue(['x', 2])).toBe('["x", 2]');
  });

  it('should limit depth', () => {
    expect(formatValue({ a: { b: { c: { d: 1 } } } })).toBe('{a: {b: {c: {...}}}}');
  });
});

describe('formatCall', () => {
  it('should render a call and its result', () => {
    expect(formatCall('get', ['/a'])).toBe('get("/a")');
    expect(formatCall('get', ['/a'], { kind: 'return', value: { data: bytes('v') } })).toBe(
      'get("/a") => {data: bytes("v")}'
    );
    expect(formatCall('create', ['/a'], { kind: 'throw', error: new NodeExistsError('/a') })).toBe(
      'create("/a") throws NodeExistsError("node already exists: /a")'
    );
  });
});
