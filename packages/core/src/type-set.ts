/**
 * TypeSet - the runtime type constraint carried by every collection.
 *
 * A TypeSet is immutable. It is either `anyOk` (no restriction) or a
 * non-empty set of type tokens; nullability is the presence of `null`.
 *
 * @example
 * ```ts
 * const ids = TypeSet.parse('uint');
 * ids.matches(3);   // true
 * ids.matches(-1);  // false
 *
 * TypeSet.parse('?Date').containsAll('Date', 'null'); // true
 * TypeSet.infer([1, 'x', null]).toString();            // 'int|string|null'
 * ```
 *
 * @packageDocumentation
 */

import { TypeMismatchError, UnrepresentableDefaultError } from './errors';
import { createLogger } from './internal/logger';
import { satisfiesNominal } from './internal/nominal';
import { isObjectLike, observedType, runtimeTag } from './internal/runtime-type';
import { dropSubsumed, parseTypeSpec, tokenKey } from './internal/type-spec';
import { BASIC_TYPE_NAMES } from './internal/constants';
import type { TypeSpecInput, TypeToken } from './internal/types';

const log = createLogger('TypeSet');

export type TypeSetInput = TypeSet | TypeSpecInput;

export type DerivedDefault = { ok: true; value: unknown } | { ok: false };

function tokenMatches(token: TypeToken, value: unknown): boolean {
  switch (token.kind) {
    case 'basic':
      switch (token.name) {
        // every JS number is a double
        case 'float':
          return typeof value === 'number';
        case 'object':
          return isObjectLike(value) && !Array.isArray(value);
        default:
          return runtimeTag(value) === token.name;
      }
    case 'pseudo':
      switch (token.name) {
        case 'mixed':
          return true;
        case 'scalar':
          return typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string';
        case 'number':
          return typeof value === 'number';
        case 'uint':
          return typeof value === 'number' && Number.isInteger(value) && value >= 0;
        case 'iterable':
          return Array.isArray(value) || (isObjectLike(value) && typeof Reflect.get(value, Symbol.iterator) === 'function');
        case 'callable':
          return typeof value === 'function';
      }
      return false;
    case 'nominal':
      return isObjectLike(value) && !Array.isArray(value) && satisfiesNominal(value, token.name);
  }
}

function zeroValue(token: TypeToken): DerivedDefault {
  if (token.kind === 'nominal') return { ok: false };
  switch (token.name) {
    case 'int':
    case 'uint':
    case 'float':
    case 'number':
    case 'scalar':
      return { ok: true, value: 0 };
    case 'bool':
      return { ok: true, value: false };
    case 'string':
      return { ok: true, value: '' };
    case 'array':
    case 'iterable':
      return { ok: true, value: [] };
    case 'bigint':
      return { ok: true, value: 0n };
    case 'null':
    case 'mixed':
      return { ok: true, value: null };
    case 'undefined':
      return { ok: true, value: undefined };
    default:
      return { ok: false };
  }
}

function toToken(name: string): TypeToken {
  const basic = BASIC_TYPE_NAMES.find((b) => b === name);
  return basic === undefined ? { kind: 'nominal', name } : { kind: 'basic', name: basic };
}

export class TypeSet implements Iterable<string> {
  private static readonly ANY = new TypeSet([], true);

  private readonly tokens: readonly TypeToken[];
  private readonly keys: ReadonlySet<string>;
  private readonly unrestricted: boolean;

  private constructor(tokens: readonly TypeToken[], unrestricted: boolean) {
    this.tokens = tokens;
    this.keys = new Set(tokens.map(tokenKey));
    this.unrestricted = unrestricted;
  }

  /** The unrestricted TypeSet. */
  static any(): TypeSet {
    return TypeSet.ANY;
  }

  /**
   * Parses a constraint. `null` means no constraint, which is not the same
   * as the string `'null'`.
   *
   * @throws ConstraintSyntaxError If the expression is malformed.
   */
  static parse(input: TypeSpecInput): TypeSet {
    if (input === null) return TypeSet.ANY;
    const parsed = parseTypeSpec(input);
    return parsed.anyOk ? TypeSet.ANY : new TypeSet(parsed.tokens, false);
  }

  static from(input: TypeSetInput): TypeSet {
    return input instanceof TypeSet ? input : TypeSet.parse(input);
  }

  /**
   * The types actually observed in `values`, in first-seen order; objects
   * contribute their class name. An empty input gives `anyOk`.
   */
  static infer(values: Iterable<unknown>): TypeSet {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const value of values) {
      const name = observedType(value);
      if (!seen.has(name)) {
        seen.add(name);
        names.push(name);
      }
    }
    if (names.length === 0) return TypeSet.ANY;

    const inferred = new TypeSet(names.map(toToken), false);
    log.debug('constraint_inferred', { constraint: inferred.toString() });
    return inferred;
  }

  get size(): number {
    return this.tokens.length;
  }

  anyOk(): boolean {
    return this.unrestricted;
  }

  nullOk(): boolean {
    return this.unrestricted || this.keys.has('null');
  }

  contains(type: string): boolean {
    if (this.unrestricted) return type === 'mixed';
    return this.keys.has(type) || this.keys.has(`#${type}`);
  }

  containsAll(...types: string[]): boolean {
    return types.every((type) => this.contains(type));
  }

  containsAny(...types: string[]): boolean {
    return types.some((type) => this.contains(type));
  }

  /**
   * True when the set holds exactly the given types, no more and no fewer.
   */
  containsOnly(...types: string[]): boolean {
    const distinct = new Set(types);
    if (this.unrestricted) return distinct.size === 1 && distinct.has('mixed');
    return distinct.size === this.tokens.length && this.containsAll(...distinct);
  }

  matches(value: unknown): boolean {
    if (this.unrestricted) return true;
    return this.tokens.some((token) => tokenMatches(token, value));
  }

  /**
   * @throws TypeMismatchError If `value` matches none of the tokens.
   */
  validate(value: unknown, label = 'value'): void {
    if (!this.matches(value)) {
      throw new TypeMismatchError(this.toString(), observedType(value), label);
    }
  }

  /**
   * A default consistent with this set: the zero value of a lone type,
   * otherwise `null` when null is allowed.
   */
  tryDeriveDefault(): DerivedDefault {
    if (this.unrestricted) return { ok: true, value: null };
    if (this.tokens.length === 1) {
      const zero = zeroValue(this.tokens[0]);
      if (zero.ok) return zero;
    }
    if (this.keys.has('null')) return { ok: true, value: null };
    return { ok: false };
  }

  /**
   * @throws UnrepresentableDefaultError If no default can be derived.
   */
  deriveDefault(): unknown {
    const derived = this.tryDeriveDefault();
    if (!derived.ok) throw new UnrepresentableDefaultError(this.toString());
    return derived.value;
  }

  union(other: TypeSet): TypeSet {
    if (this.unrestricted || other.unrestricted) return TypeSet.ANY;
    const merged = [...this.tokens];
    for (const token of other.tokens) {
      if (!this.keys.has(tokenKey(token))) merged.push(token);
    }
    return new TypeSet(dropSubsumed(merged), false);
  }

  equals(other: TypeSet): boolean {
    if (this.unrestricted || other.unrestricted) return this.unrestricted === other.unrestricted;
    return this.tokens.length === other.tokens.length && this.tokens.every((t) => other.keys.has(tokenKey(t)));
  }

  toString(): string {
    return this.unrestricted ? 'mixed' : this.tokens.map((token) => token.name).join('|');
  }

  *[Symbol.iterator](): IterableIterator<string> {
    for (const token of this.tokens) yield token.name;
  }
}
