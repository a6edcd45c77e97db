/**
 * Runtime type tags - the closed enumeration every dispatch switches on
 */

import { ANONYMOUS_OBJECT_TYPE } from './constants';
import type { RuntimeTag } from './types';

export function runtimeTag(value: unknown): RuntimeTag {
  switch (typeof value) {
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float';
    case 'string':
      return 'string';
    case 'boolean':
      return 'bool';
    case 'bigint':
      return 'bigint';
    case 'symbol':
      return 'symbol';
    case 'undefined':
      return 'undefined';
    case 'function':
      return 'object';
    case 'object':
      if (value === null) return 'null';
      return Array.isArray(value) ? 'array' : 'object';
  }
  return 'object';
}

/**
 * Class name of an object value: the constructor name of its prototype, or
 * 'object' for plain, null-prototype and anonymous-class objects.
 */
export function className(value: object): string {
  if (typeof value === 'function') return 'Function';
  const proto: object | null = Object.getPrototypeOf(value);
  if (proto === null || proto === Object.prototype) return ANONYMOUS_OBJECT_TYPE;
  const ctor: unknown = proto.constructor;
  if (typeof ctor === 'function' && ctor.name !== '') return ctor.name;
  return ANONYMOUS_OBJECT_TYPE;
}

/**
 * Name used in error messages and by type inference: the runtime tag, or the
 * class name for objects.
 */
export function observedType(value: unknown): string {
  if (isObjectLike(value) && !Array.isArray(value)) return className(value);
  return runtimeTag(value);
}

export function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}
