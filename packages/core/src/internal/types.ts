/**
 * Core type definitions
 */

import type { BASIC_TYPE_NAMES, PSEUDO_TYPE_NAMES } from './constants';

// Transient owner for in-place trie edits
export type Owner = object | undefined;

// Closed runtime-type enumeration; every dispatch switches on this
export type RuntimeTag = (typeof BASIC_TYPE_NAMES)[number];

export type BasicTypeName = RuntimeTag;
export type PseudoTypeName = (typeof PSEUDO_TYPE_NAMES)[number];

export type TypeToken =
  | { kind: 'basic'; name: BasicTypeName }
  | { kind: 'pseudo'; name: PseudoTypeName }
  | { kind: 'nominal'; name: string };

// Comparison-ready form of a value, see canonical.ts
export type ExactToken =
  | { tag: 'null' }
  | { tag: 'undefined' }
  | { tag: 'bool'; value: boolean }
  | { tag: 'int'; value: number }
  | { tag: 'float'; value: number }
  | { tag: 'string'; value: string }
  | { tag: 'bigint'; value: bigint }
  | { tag: 'symbol'; value: symbol }
  | { tag: 'array'; items: readonly ExactToken[] }
  | { tag: 'object'; ref: object };

export interface CanonicalKey {
  hash: number;
  token: ExactToken;
}

// One owned key-value association inside an AssociativeStore
export interface StoredEntry<K, V> {
  readonly key: K;
  readonly value: V;
  readonly hash: number;
  readonly token: ExactToken;
}

// Anything a collection can be constructed from
export type TypeSpecInput = string | readonly string[] | null;
