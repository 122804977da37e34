import { describe, expect, it } from 'vitest';
import { safeFloat, toJsonSafe } from '../../../runtime/server/src/lib/json-safe.js';

class Handle {
  readonly size = 3;
}

describe('toJsonSafe', () => {
  it('keeps primitives, plain objects and arrays', () => {
    expect(toJsonSafe({ a: 1, b: 'two', c: [true, 'x'], d: { e: null } })).toEqual({ a: 1, b: 'two', c: [true, 'x'], d: {} });
  });

  it('drops class instances, functions and non-finite numbers', () => {
    expect(toJsonSafe({
      handle: new Handle(),
      fn: () => 1,
      bytes: new Uint8Array([1, 2]),
      list: [1, Number.NaN, Infinity, 'ok'],
      kept: 5,
    })).toEqual({ list: [1, 'ok'], kept: 5 });
  });

  it('turns sets into arrays', () => {
    expect(toJsonSafe(new Set(['a', 'b']))).toEqual(['a', 'b']);
  });

  it('stops at the depth limit', () => {
    expect(toJsonSafe({ a: { b: { c: 1 } } }, 2)).toEqual({ a: {} });
  });

  it('returns null for unsupported roots', () => {
    expect(toJsonSafe(undefined)).toBeNull();
    expect(toJsonSafe(new Handle())).toBeNull();
  });
});

describe('safeFloat', () => {
  it('parses numeric strings and falls back to 0', () => {
    expect(safeFloat('12.5')).toBe(12.5);
    expect(safeFloat(' -3 ')).toBe(-3);
    expect(safeFloat(7)).toBe(7);
    expect(safeFloat('abc')).toBe(0);
    expect(safeFloat('')).toBe(0);
    expect(safeFloat(null)).toBe(0);
    expect(safeFloat(Infinity)).toBe(0);
  });
});
