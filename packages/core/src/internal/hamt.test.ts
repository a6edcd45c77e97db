/**
 * Tests for the hash trie over canonical keys
 */

import { describe, it, expect } from 'vitest';
import { canonicalize } from './canonical';
import { hamtDelete, hamtEmpty, hamtGet, hamtSet } from './hamt';
import type { CanonicalKey } from './types';

// Forces every key into one bucket
const colliding = (value: number): CanonicalKey => ({ hash: 0xdeadbeef, token: { tag: 'int', value } });

describe('HAMT', () => {
  it('should store and find scalar keys', () => {
    let map = hamtEmpty<string>();
    map = hamtSet(map, undefined, canonicalize(1), 'int');
    map = hamtSet(map, undefined, canonicalize('1'), 'string');
    map = hamtSet(map, undefined, canonicalize(true), 'bool');

    expect(map.size).toBe(3);
    expect(hamtGet(map, canonicalize(1))).toBe('int');
    expect(hamtGet(map, canonicalize('1'))).toBe('string');
    expect(hamtGet(map, canonicalize(true))).toBe('bool');
    expect(hamtGet(map, canonicalize(2))).toBeUndefined();
  });

  it('should overwrite without growing', () => {
    let map = hamtSet(hamtEmpty<number>(), undefined, canonicalize('k'), 1);
    map = hamtSet(map, undefined, canonicalize('k'), 2);
    expect(map.size).toBe(1);
    expect(hamtGet(map, canonicalize('k'))).toBe(2);
  });

  it('should return the same map when nothing changes', () => {
    const map = hamtSet(hamtEmpty<number>(), undefined, canonicalize('k'), 1);
    expect(hamtSet(map, undefined, canonicalize('k'), 1)).toBe(map);
    expect(hamtDelete(map, undefined, canonicalize('missing'))).toBe(map);
  });

  it('should confirm hash hits with the exact token', () => {
    let map = hamtEmpty<string>();
    for (let i = 0; i < 5; i++) map = hamtSet(map, undefined, colliding(i), `v${i}`);

    expect(map.size).toBe(5);
    for (let i = 0; i < 5; i++) expect(hamtGet(map, colliding(i))).toBe(`v${i}`);
    expect(hamtGet(map, colliding(99))).toBeUndefined();

    map = hamtDelete(map, undefined, colliding(2));
    expect(map.size).toBe(4);
    expect(hamtGet(map, colliding(2))).toBeUndefined();
    expect(hamtGet(map, colliding(3))).toBe('v3');
  });

  it('should stay persistent without an owner', () => {
    const before = hamtSet(hamtEmpty<number>(), undefined, canonicalize('a'), 1);
    const after = hamtSet(before, undefined, canonicalize('b'), 2);
    expect(hamtGet(before, canonicalize('b'))).toBeUndefined();
    expect(hamtGet(after, canonicalize('b'))).toBe(2);
  });

  it('should handle many keys across levels', () => {
    const owner = {};
    let map = hamtEmpty<number>();
    for (let i = 0; i < 2000; i++) map = hamtSet(map, owner, canonicalize(i), i * 2);
    for (let i = 0; i < 2000; i += 2) map = hamtDelete(map, owner, canonicalize(i));

    expect(map.size).toBe(1000);
    expect(hamtGet(map, canonicalize(1999))).toBe(3998);
    expect(hamtGet(map, canonicalize(1000))).toBeUndefined();

    for (let i = 1; i < 2000; i += 2) expect(hamtGet(map, canonicalize(i))).toBe(i * 2);
  });
});
