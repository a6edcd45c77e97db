/**
 * Value helpers - cloning, ordering and short descriptions
 */

import { BASIC_TYPE_NAMES, SHORT_STRING_LENGTH } from './constants';
import { className, isObjectLike, runtimeTag } from './runtime-type';

// =====================================================
// Clone-on-materialize
// =====================================================

function cloneInto(value: unknown, seen: WeakMap<object, unknown>): unknown {
  if (!isObjectLike(value) || typeof value === 'function') return value;

  const done = seen.get(value);
  if (done !== undefined) return done;

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(cloneInto(item, seen));
    return copy;
  }
  if (value instanceof Date) {
    const copy = new Date(value.getTime());
    seen.set(value, copy);
    return copy;
  }
  if (value instanceof RegExp) {
    const copy = new RegExp(value.source, value.flags);
    seen.set(value, copy);
    return copy;
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [k, v] of value) copy.set(cloneInto(k, seen), cloneInto(v, seen));
    return copy;
  }
  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const v of value) copy.add(cloneInto(v, seen));
    return copy;
  }

  const proto: object | null = Object.getPrototypeOf(value);
  const copy: object = Object.create(proto);
  seen.set(value, copy);
  for (const key of Reflect.ownKeys(value)) {
    const descriptor = Object.getOwnPropertyDescriptor(value, key);
    if (!descriptor) continue;
    if ('value' in descriptor) {
      descriptor.value = cloneInto(descriptor.value, seen);
    }
    Object.defineProperty(copy, key, descriptor);
  }
  return copy;
}

/**
 * Deep copy that keeps prototypes, so class instances stay instances of
 * their class. Functions are shared, cycles are preserved.
 */
export function deepClone<T>(value: T): T {
  if (!isObjectLike(value) || typeof value === 'function') return value;
  return cloneInto(value, new WeakMap()) as T;
}

// =====================================================
// Ordering
// =====================================================

function tagRank(value: unknown): number {
  const tag = runtimeTag(value);
  // ints and floats sort together
  return tag === 'float' ? BASIC_TYPE_NAMES.indexOf('int') : BASIC_TYPE_NAMES.indexOf(tag);
}

/**
 * Default ordering for sorts: numbers numerically, strings by code unit,
 * false before true, arrays lexicographically, Dates by time. Values of
 * different types order by their runtime tag.
 */
export function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') {
    if (Number.isNaN(a) || Number.isNaN(b)) return Number(Number.isNaN(a)) - Number(Number.isNaN(b));
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : a > b ? 1 : 0;
  if (Array.isArray(a) && Array.isArray(b)) {
    const n = Math.min(a.length, b.length);
    for (let i = 0; i < n; i++) {
      const c = compareValues(a[i], b[i]);
      if (c !== 0) return c;
    }
    return a.length - b.length;
  }
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();

  return tagRank(a) - tagRank(b);
}

// =====================================================
// Descriptions
// =====================================================

export function stringify(value: unknown, seen: Set<unknown> = new Set()): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value.toString()}n`;
    case 'symbol':
      return value.toString();
    case 'function':
      return value.name === '' ? '<Function>' : `<Function ${value.name}>`;
    case 'number':
    case 'boolean':
    case 'undefined':
      return String(value);
  }
  if (value === null) return 'null';
  if (Array.isArray(value)) {
    if (seen.has(value)) return '[...]';
    seen.add(value);
    const inner = value.map((item) => stringify(item, seen)).join(', ');
    seen.delete(value);
    return `[${inner}]`;
  }
  if (value instanceof Date) return `<Date ${Number.isNaN(value.getTime()) ? 'Invalid' : value.toISOString()}>`;
  if (isObjectLike(value)) return `<${className(value)}>`;
  return String(value);
}

/**
 * Abbreviated `stringify` for error and log messages.
 */
export function describeValue(value: unknown, maxLength = SHORT_STRING_LENGTH): string {
  const result = stringify(value);
  if (maxLength > 4 && result.length > maxLength) {
    return result.slice(0, maxLength - 3) + '...';
  }
  return result;
}

export function isNumber(value: unknown): value is number {
  return typeof value === 'number';
}
