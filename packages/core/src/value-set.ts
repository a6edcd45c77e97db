/**
 * ValueSet - insertion-ordered collection of distinct values
 *
 * Distinctness follows the collection equality rule, so `1` and `'1'` are
 * both members, and so are two different objects with the same fields.
 */

import { Collection } from './collection';
import { Dictionary } from './dictionary';
import { Sequence } from './sequence';
import { AssociativeStore } from './store';
import { TypeSet, type TypeSetInput } from './type-set';
import { stringify } from './internal/values';

export interface ValueSetOptions<T> {
  /** Allowed types. Omitted: inferred from `source`. `null`: any type. */
  types?: TypeSetInput;
  source?: Iterable<T>;
}

export class ValueSet<T = unknown> extends Collection<T> {
  private readonly store = new AssociativeStore<T, true>();

  constructor(options: ValueSetOptions<T> = {}) {
    const source = options.source === undefined ? [] : [...options.source];
    super(options.types === undefined ? TypeSet.infer(source) : TypeSet.from(options.types));
    this.import(source);
  }

  static of<T>(...items: T[]): ValueSet<T> {
    return new ValueSet<T>({ source: items });
  }

  get count(): number {
    return this.store.size;
  }

  /** Adds each item not already present; stops at the first invalid one. */
  add(...items: T[]): this {
    return this.import(items);
  }

  import(src: Iterable<T>): this {
    for (const item of src) {
      this.valueTypes.validate(item);
      if (!this.store.exists(item)) this.store.set(item, true);
    }
    return this;
  }

  /** Returns whether `item` was a member. */
  remove(item: T): boolean {
    return this.store.delete(item);
  }

  clear(): this {
    this.store.clear();
    return this;
  }

  contains(value: unknown): boolean {
    return this.conforms(value) && this.store.exists(value);
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.store.keys();
  }

  // =====================================================
  // Algebra
  // =====================================================

  union(other: ValueSet<T>): ValueSet<T> {
    const result = new ValueSet<T>({ types: this.valueTypes.union(other.valueTypes), source: this });
    return result.import(other);
  }

  intersect(other: ValueSet<T>): ValueSet<T> {
    return this.filter((item) => other.contains(item));
  }

  /** Members of this set that are not in `other`. */
  diff(other: ValueSet<T>): ValueSet<T> {
    return this.filter((item) => !other.contains(item));
  }

  filter(fn: (item: T) => boolean): ValueSet<T> {
    return new ValueSet<T>({ types: this.valueTypes, source: this.toArray().filter(fn) });
  }

  // =====================================================
  // Comparison
  // =====================================================

  /** Same members; order is ignored. */
  equals(other: Collection<unknown, unknown>): boolean {
    return other instanceof ValueSet && this.sameKind(other) && this.isSubsetOf(other);
  }

  isSubsetOf(other: ValueSet<unknown>): boolean {
    return this.count <= other.count && this.all((item) => other.contains(item));
  }

  isProperSubsetOf(other: ValueSet<unknown>): boolean {
    return this.count < other.count && this.isSubsetOf(other);
  }

  isSupersetOf(other: ValueSet<unknown>): boolean {
    return other.isSubsetOf(this);
  }

  isProperSupersetOf(other: ValueSet<unknown>): boolean {
    return other.isProperSubsetOf(this);
  }

  isDisjointFrom(other: ValueSet<unknown>): boolean {
    return !this.any((item) => other.contains(item));
  }

  // =====================================================
  // Conversion
  // =====================================================

  /** Members keyed by position, starting at 0. */
  toDictionary(): Dictionary<number, T> {
    return new Dictionary<number, T>({
      keyTypes: 'uint',
      valueTypes: this.valueTypes,
      source: this.toArray().map((item, index): [number, T] => [index, item]),
    });
  }

  /**
   * Members in order. When no default can be derived from this set's
   * types, `null` is admitted and becomes the default.
   */
  toSequence(): Sequence<T | null> {
    const types = this.valueTypes.tryDeriveDefault().ok
      ? this.valueTypes
      : this.valueTypes.union(TypeSet.parse('null'));
    return new Sequence<T | null>({ types, source: this });
  }

  toString(): string {
    return `{${this.toArray().map((item) => stringify(item)).join(', ')}}`;
  }
}
