/**
 * Internal modules barrel export
 */

// Constants
export {
  BITS,
  MASK,
  DELETED,
  DEFAULT_COMPACT_RATIO,
  DEFAULT_COMPACT_MIN_SLOTS,
  BASIC_TYPE_NAMES,
  PSEUDO_TYPE_NAMES,
} from './constants';

// Utils
export { popcount } from './utils';

// Runtime types
export { runtimeTag, className, observedType, isObjectLike } from './runtime-type';

// Nominal registry
export { declareInterface, implementInterface, nominalClosure, satisfiesNominal } from './nominal';

// TypeSpec parser
export { parseTypeSpec, classifyTypeName, tokenKey, type ParsedTypeSpec } from './type-spec';

// Canonical keys
export { canonicalize, tokensEqual, strictEquals, snapshotKey } from './canonical';

// HAMT
export {
  hamtEmpty,
  hamtGet,
  hamtSet,
  hamtDelete,
  type HLeaf,
  type HCollision,
  type HNode,
  type HChild,
  type HMap,
} from './hamt';

// Order Index
export {
  orderEmpty,
  orderSize,
  orderLookup,
  orderAppend,
  orderReplace,
  orderDelete,
  orderNeedsCompaction,
  orderCompact,
  orderClear,
  orderIter,
  type OrderIndex,
  type CompactPolicy,
} from './order';

// Values
export { deepClone, compareValues, stringify, describeValue, isNumber } from './values';

// Logging
export { Logger, createLogger, type LogLevel, type LogEntry, type LogSink, type LoggerOptions } from './logger';

// Types
export type {
  Owner,
  RuntimeTag,
  BasicTypeName,
  PseudoTypeName,
  TypeToken,
  ExactToken,
  CanonicalKey,
  StoredEntry,
  TypeSpecInput,
} from './types';
