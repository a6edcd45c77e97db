/**
 * Tessera – type-constrained collections over an any-key associative store
 *
 * - Sequence      → ordered, integer-indexed, gap-filling with defaults
 * - Dictionary    → insertion-ordered map, keys of any runtime type
 * - ValueSet      → insertion-ordered set of distinct values
 * - TypeSet       → the runtime constraint every collection carries
 */

// Collections
export { Collection } from './collection';
export { Sequence, type SequenceOptions, type Comparator } from './sequence';
export { Dictionary, type DictionaryOptions } from './dictionary';
export { KeyValuePair } from './key-value-pair';
export { ValueSet, type ValueSetOptions } from './value-set';

// Constraint engine
export { TypeSet, type TypeSetInput, type DerivedDefault } from './type-set';
export { AssociativeStore } from './store';

// Internals that are part of the public surface
export {
  canonicalize,
  strictEquals,
  declareInterface,
  implementInterface,
  nominalClosure,
  parseTypeSpec,
  runtimeTag,
  observedType,
  compareValues,
  deepClone,
  Logger,
  createLogger,
  type CanonicalKey,
  type ExactToken,
  type RuntimeTag,
  type TypeToken,
  type TypeSpecInput,
  type StoredEntry,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type LoggerOptions,
} from './internal';

// Configuration
export {
  configure,
  getConfig,
  resetConfig,
  applyEnvOverrides,
  DEFAULT_CONFIG,
  EnvCoercionError,
  type TesseraConfig,
  type EnvRecord,
} from './config';

// Errors
export {
  CollectionError,
  ConstraintSyntaxError,
  TypeMismatchError,
  UnrepresentableDefaultError,
  KeyNotFoundError,
  IndexOutOfRangeError,
  UnderflowError,
  ArgumentArityError,
  InvalidArgumentError,
  CircularReferenceError,
} from './errors';
