/**
 * Core constants for Tessera collections
 */

// Bit-trie parameters (32-way branching)
export const BITS = 5;
export const MASK = (1 << BITS) - 1; // 31

// OrderIndex marker for deleted entries
export const DELETED = Symbol('DELETED');

// OrderIndex compaction defaults (compact when holes > 50% and slots > 32)
export const DEFAULT_COMPACT_RATIO = 0.5;
export const DEFAULT_COMPACT_MIN_SLOTS = 32;

// Type names accepted in constraint expressions
export const BASIC_TYPE_NAMES = [
  'null',
  'undefined',
  'bool',
  'int',
  'float',
  'string',
  'bigint',
  'symbol',
  'array',
  'object',
] as const;

export const PSEUDO_TYPE_NAMES = ['scalar', 'number', 'uint', 'mixed', 'iterable', 'callable'] as const;

// Tokens each pseudotype makes redundant when both appear in one constraint
export const PSEUDO_SUBSUMES: Readonly<Record<string, readonly string[]>> = {
  scalar: ['bool', 'int', 'float', 'string', 'number', 'uint'],
  number: ['int', 'float', 'uint'],
  uint: [],
  mixed: [],
  iterable: ['array'],
  callable: [],
};

// Class or interface name, optionally namespaced ('Geo.Point')
export const NOMINAL_NAME = /^[A-Z_$][\w$]*(?:\.[A-Za-z_$][\w$]*)*$/;

// Nominal type reported for objects that have no usable class name
export const ANONYMOUS_OBJECT_TYPE = 'object';

// Default length for abbreviated values in error messages
export const SHORT_STRING_LENGTH = 20;
