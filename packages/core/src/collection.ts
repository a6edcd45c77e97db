/**
 * Collection - shared lifecycle for Sequence, Dictionary and ValueSet
 *
 * Iteration is restartable and finite. Mutating a collection while an
 * iteration over it is in progress gives undefined positional results; that
 * is left to the caller.
 */

import type { TypeSet } from './type-set';
import { stringify } from './internal/values';

/**
 * `T` is what iteration yields; `V` is what `valueTypes` constrains. They
 * differ only for keyed collections, which iterate `[key, value]` pairs.
 */
export abstract class Collection<T, V = T> implements Iterable<T> {
  /** Allowed types for values; fixed for the life of the collection. */
  readonly valueTypes: TypeSet;

  protected constructor(valueTypes: TypeSet) {
    this.valueTypes = valueTypes;
  }

  abstract get count(): number;

  abstract clear(): this;

  /**
   * Adds every element of `src`, validating each. Stops at the first invalid
   * element; elements before it stay added.
   */
  abstract import(src: Iterable<T>): this;

  /**
   * Strict membership test (see the equality rule in `strictEquals`).
   */
  abstract contains(value: unknown): boolean;

  /**
   * Same kind of collection with equal entries. TypeSets and defaults are
   * not compared.
   */
  abstract equals(other: Collection<unknown, unknown>): boolean;

  abstract [Symbol.iterator](): Iterator<T>;

  isEmpty(): boolean {
    return this.count === 0;
  }

  all(fn: (item: T) => boolean): boolean {
    for (const item of this) {
      if (!fn(item)) return false;
    }
    return true;
  }

  any(fn: (item: T) => boolean): boolean {
    for (const item of this) {
      if (fn(item)) return true;
    }
    return false;
  }

  toArray(): T[] {
    return [...this];
  }

  toString(): string {
    const items = this.toArray().map((item) => stringify(item));
    return `${this.constructor.name}<${this.valueTypes.toString()}> [${items.join(', ')}]`;
  }

  /** Type guard over `valueTypes`. */
  protected conforms(value: unknown): value is V {
    return this.valueTypes.matches(value);
  }

  protected sameKind(other: Collection<unknown, unknown>): boolean {
    return this.constructor === other.constructor && this.count === other.count;
  }
}
