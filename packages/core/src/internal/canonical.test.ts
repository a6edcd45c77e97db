/**
 * Tests for key canonicalization and the equality rule
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { CircularReferenceError } from '../errors';
import { canonicalize, snapshotKey, strictEquals, tokensEqual } from './canonical';

const same = (a: unknown, b: unknown) => tokensEqual(canonicalize(a).token, canonicalize(b).token);

describe('canonicalize', () => {
  it('should keep 1, "1" and true apart', () => {
    expect(same(1, '1')).toBe(false);
    expect(same(1, true)).toBe(false);
    expect(same('1', true)).toBe(false);
    expect(same(0, false)).toBe(false);
    expect(same(null, undefined)).toBe(false);
    expect(same(1, 1n)).toBe(false);
  });

  it('should equate structurally identical arrays', () => {
    const a = canonicalize([1, ['x', null]]);
    const b = canonicalize([1, ['x', null]]);
    expect(a.hash).toBe(b.hash);
    expect(tokensEqual(a.token, b.token)).toBe(true);
    expect(same([1, 2], [2, 1])).toBe(false);
    expect(same([1], [1, 1])).toBe(false);
  });

  it('should compare objects by identity', () => {
    const obj = { id: 1 };
    expect(same(obj, obj)).toBe(true);
    expect(same({ id: 1 }, { id: 1 })).toBe(false);
    expect(same(new Date(0), new Date(0))).toBe(false);
  });

  it('should key functions and prototype-less objects by identity', () => {
    const fn = () => 1;
    const bare: object = Object.create(null);
    expect(canonicalize(fn).token).toEqual({ tag: 'object', ref: fn });
    expect(same(fn, fn)).toBe(true);
    expect(same(fn, () => 1)).toBe(false);
    expect(canonicalize(bare).token).toEqual({ tag: 'object', ref: bare });
    expect(same(bare, Object.create(null))).toBe(false);
    expect(canonicalize(null).token).toEqual({ tag: 'null' });
  });

  it('should treat zeros and NaNs as equal', () => {
    expect(same(0, -0)).toBe(true);
    expect(canonicalize(0).hash).toBe(canonicalize(-0).hash);
    expect(same(Number.NaN, Number.NaN)).toBe(true);
  });

  it('should keep distinct symbols apart', () => {
    const s = Symbol('k');
    expect(same(s, s)).toBe(true);
    expect(same(Symbol('k'), Symbol('k'))).toBe(false);
  });

  it('should reject arrays that contain themselves', () => {
    const cyclic: unknown[] = [1];
    cyclic.push(cyclic);
    expect(() => canonicalize(cyclic)).toThrow(CircularReferenceError);
  });

  it('should accept an array repeated without a cycle', () => {
    const inner = [1];
    expect(same([inner, inner], [[1], [1]])).toBe(true);
  });

  it('should give equal tokens equal hashes', () => {
    const scalar = fc.oneof(fc.integer(), fc.double(), fc.string(), fc.boolean(), fc.constant(null));
    const key = fc.oneof(scalar, fc.array(fc.oneof(scalar, fc.array(scalar))));
    fc.assert(
      fc.property(key, (value) => {
        const copy = snapshotKey(value);
        expect(canonicalize(value).hash).toBe(canonicalize(copy).hash);
        expect(same(value, copy)).toBe(true);
      })
    );
  });
});

describe('strictEquals', () => {
  it('should agree with canonical tokens', () => {
    fc.assert(
      fc.property(fc.anything(), fc.anything(), (a, b) => {
        expect(strictEquals(a, b)).toBe(same(a, b));
      })
    );
  });

  it('should compare arrays by content and objects by identity', () => {
    const obj = {};
    expect(strictEquals([obj, 2], [obj, 2])).toBe(true);
    expect(strictEquals([{}], [{}])).toBe(false);
    expect(strictEquals(1, 1.0)).toBe(true);
    expect(strictEquals('a', ['a'])).toBe(false);
  });

  it('should reject cyclic arrays', () => {
    const a: unknown[] = [];
    a.push(a);
    const b: unknown[] = [];
    b.push(b);
    expect(() => strictEquals(a, b)).toThrow(CircularReferenceError);
  });
});

describe('snapshotKey', () => {
  it('should copy arrays at every level', () => {
    const inner = [2];
    const key = [1, inner];
    const copy = snapshotKey(key);
    inner.push(3);
    expect(copy).toEqual([1, [2]]);
    expect(copy).not.toBe(key);
  });

  it('should return other values unchanged', () => {
    const obj = { a: 1 };
    expect(snapshotKey(obj)).toBe(obj);
    expect(snapshotKey('k')).toBe('k');
  });
});
