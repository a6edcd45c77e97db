/**
 * Key canonicalization - any runtime value → { hash, token }
 *
 * `hash` only picks a bucket. `token` carries the runtime tag plus the raw
 * scalar, the element tokens of an array, or the object instance itself, and
 * every hit is confirmed with `tokensEqual`.
 */

import { CircularReferenceError } from '../errors';
import type { CanonicalKey, ExactToken, RuntimeTag } from './types';
import { runtimeTag } from './runtime-type';

// Identity hash caches
const OBJ_HASH = new WeakMap<object, number>();
let OBJ_SEQ = 1;
const SYM_HASH = new Map<symbol, number>();
let SYM_SEQ = 1;

const TAG_SEED: Readonly<Record<RuntimeTag, number>> = {
  null: 0x811c9dc5,
  undefined: 0x9747b28c,
  bool: 0x165667b1,
  int: 0x27d4eb2d,
  float: 0x61c88647,
  string: 0x01000193,
  bigint: 0x2545f491,
  symbol: 0x5bd1e995,
  array: 0x7feb352d,
  object: 0x846ca68b,
};

// Splitmix32 finalizer
function mix32(z: number): number {
  z = (z + 0x9e3779b9) | 0;
  z ^= z >>> 16;
  z = Math.imul(z, 0x85ebca6b);
  z ^= z >>> 13;
  z = Math.imul(z, 0xc2b2ae35);
  z ^= z >>> 16;
  return z >>> 0;
}

// Murmur3 32-bit hash for strings
function murmur3(key: string, seed = 0): number {
  let h = seed ^ key.length;
  let k: number;
  let i = 0;

  while (i + 4 <= key.length) {
    k =
      (key.charCodeAt(i) & 0xff) |
      ((key.charCodeAt(i + 1) & 0xff) << 8) |
      ((key.charCodeAt(i + 2) & 0xff) << 16) |
      ((key.charCodeAt(i + 3) & 0xff) << 24);
    i += 4;
    k = Math.imul(k, 0xcc9e2d51);
    k = (k << 15) | (k >>> 17);
    k = Math.imul(k, 0x1b873593);
    h ^= k;
    h = (h << 13) | (h >>> 19);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  k = 0;
  switch (key.length & 3) {
    case 3:
      k ^= (key.charCodeAt(i + 2) & 0xff) << 16;
    // falls through
    case 2:
      k ^= (key.charCodeAt(i + 1) & 0xff) << 8;
    // falls through
    case 1:
      k ^= key.charCodeAt(i) & 0xff;
      k = Math.imul(k, 0xcc9e2d51);
      k = (k << 15) | (k >>> 17);
      k = Math.imul(k, 0x1b873593);
      h ^= k;
  }

  h ^= key.length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

function hashNumber(n: number): number {
  const v = Object.is(n, -0) ? 0 : n;
  return mix32((v | 0) ^ Math.imul((v * 4294967296) | 0, 0x9e3779b1));
}

function hashBigint(n: bigint): number {
  let h = 0;
  const s = n.toString();
  for (let i = 0; i < s.length; i += 4) {
    const chunk = s.slice(i, i + 4);
    let v = 0;
    for (let j = 0; j < chunk.length; j++) {
      v = (v << 8) | chunk.charCodeAt(j);
    }
    h = mix32(h ^ v);
  }
  return h;
}

function identityHash(ref: object): number {
  let id = OBJ_HASH.get(ref);
  if (id === undefined) {
    id = OBJ_SEQ++;
    OBJ_HASH.set(ref, id);
  }
  return (id * 0x85ebca77) >>> 0;
}

function symbolHash(sym: symbol): number {
  let id = SYM_HASH.get(sym);
  if (id === undefined) {
    id = SYM_SEQ++;
    SYM_HASH.set(sym, id);
  }
  return (id * 0x9e3779b1) >>> 0;
}

function canonicalizeInto(value: unknown, open: Set<unknown[]>): CanonicalKey {
  const tag = runtimeTag(value);
  const seed = TAG_SEED[tag];

  switch (typeof value) {
    case 'number':
      return { hash: mix32(hashNumber(value) ^ seed), token: tag === 'int' ? { tag: 'int', value } : { tag: 'float', value } };
    case 'string':
      return { hash: murmur3(value, seed), token: { tag: 'string', value } };
    case 'boolean':
      return { hash: mix32(seed ^ (value ? 1 : 2)), token: { tag: 'bool', value } };
    case 'bigint':
      return { hash: mix32(hashBigint(value) ^ seed), token: { tag: 'bigint', value } };
    case 'symbol':
      return { hash: mix32(symbolHash(value) ^ seed), token: { tag: 'symbol', value } };
    case 'undefined':
      return { hash: seed, token: { tag: 'undefined' } };
    case 'function':
      return identityKey(value, seed);
    case 'object':
      if (value === null) return { hash: seed, token: { tag: 'null' } };
      if (Array.isArray(value)) return arrayKey(value, seed, open);
      return identityKey(value, seed);
  }
}

function arrayKey(value: unknown[], seed: number, open: Set<unknown[]>): CanonicalKey {
  if (open.has(value)) throw new CircularReferenceError();
  open.add(value);
  let h = mix32(seed ^ value.length);
  const items: ExactToken[] = [];
  for (const item of value) {
    const child = canonicalizeInto(item, open);
    h = mix32(h ^ child.hash);
    items.push(child.token);
  }
  open.delete(value);
  return { hash: h, token: { tag: 'array', items } };
}

function identityKey(ref: object, seed: number): CanonicalKey {
  return { hash: mix32(identityHash(ref) ^ seed), token: { tag: 'object', ref } };
}

/**
 * @throws CircularReferenceError If `value` is an array that contains itself.
 */
export function canonicalize(value: unknown): CanonicalKey {
  return canonicalizeInto(value, new Set());
}

export function tokensEqual(a: ExactToken, b: ExactToken): boolean {
  switch (a.tag) {
    case 'null':
    case 'undefined':
      return b.tag === a.tag;
    case 'int':
    case 'float':
      return b.tag === a.tag && (a.value === b.value || (Number.isNaN(a.value) && Number.isNaN(b.value)));
    case 'bool':
      return b.tag === 'bool' && a.value === b.value;
    case 'string':
      return b.tag === 'string' && a.value === b.value;
    case 'bigint':
      return b.tag === 'bigint' && a.value === b.value;
    case 'symbol':
      return b.tag === 'symbol' && a.value === b.value;
    case 'object':
      return b.tag === 'object' && a.ref === b.ref;
    case 'array':
      if (b.tag !== 'array' || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        if (!tokensEqual(a.items[i], b.items[i])) return false;
      }
      return true;
  }
}

function equalsInto(a: unknown, b: unknown, open: Set<unknown[]>): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a === b) return true;
    if (a.length !== b.length) return false;
    if (open.has(a) || open.has(b)) throw new CircularReferenceError();
    open.add(a);
    open.add(b);
    let result = true;
    for (let i = 0; i < a.length && result; i++) {
      result = equalsInto(a[i], b[i], open);
    }
    open.delete(a);
    open.delete(b);
    return result;
  }
  if (runtimeTag(a) !== runtimeTag(b)) return false;
  return a === b || (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b));
}

/**
 * The collection equality rule applied directly to two values: same runtime
 * tag, and same value (primitives), same elements (arrays) or same instance
 * (objects). `0` equals `-0` and `NaN` equals `NaN`.
 */
export function strictEquals(a: unknown, b: unknown): boolean {
  return equalsInto(a, b, new Set());
}

/**
 * Copy of a key the store can own: arrays are copied level by level so the
 * caller mutating its own array cannot move a stored entry; everything else
 * is returned as is.
 */
export function snapshotKey<K>(key: K): K {
  if (!Array.isArray(key)) return key;
  const copy: unknown[] = key.map((item: unknown) => snapshotKey(item));
  return copy as K;
}
