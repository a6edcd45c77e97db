/**
 * Sequence - ordered, integer-indexed, type-constrained collection
 *
 * Positions run from 0 to `length - 1`. Writing past the end fills the gap
 * with fresh copies of the default value.
 *
 * @example
 * ```ts
 * const seq = new Sequence<number | null>({ types: '?int' });
 * seq.append(5);
 * seq.set(2, 7);
 * seq.toArray(); // [5, null, 7]
 * ```
 */

import { Collection } from './collection';
import { Dictionary } from './dictionary';
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  TypeMismatchError,
  UnderflowError,
  UnrepresentableDefaultError,
} from './errors';
import { strictEquals } from './internal/canonical';
import { createLogger } from './internal/logger';
import { observedType } from './internal/runtime-type';
import { compareValues, deepClone, describeValue, isNumber } from './internal/values';
import { AssociativeStore } from './store';
import { TypeSet, type TypeSetInput } from './type-set';
import { ValueSet } from './value-set';

const log = createLogger('Sequence');

export interface SequenceOptions<T> {
  /** Allowed value types. Omitted: inferred from `source`. `null`: any type. */
  types?: TypeSetInput;
  /** Fill value for gaps and unset slots. Derived from `types` when omitted. */
  defaultValue?: T;
  source?: Iterable<T>;
}

export type Comparator<T> = (a: T, b: T) => number;

export class Sequence<T = unknown> extends Collection<T> {
  private readonly storedDefault: T;
  private items: T[] = [];

  constructor(options: SequenceOptions<T> = {}) {
    const source = options.source === undefined ? [] : [...options.source];
    super(options.types === undefined ? TypeSet.infer(source) : TypeSet.from(options.types));

    if ('defaultValue' in options) {
      const explicit = options.defaultValue;
      if (!this.conforms(explicit)) {
        throw new TypeMismatchError(this.valueTypes.toString(), observedType(explicit), 'default value');
      }
      this.storedDefault = deepClone(explicit);
    } else {
      const derived = this.valueTypes.tryDeriveDefault();
      if (!derived.ok || !this.conforms(derived.value)) {
        throw new UnrepresentableDefaultError(this.valueTypes.toString());
      }
      this.storedDefault = derived.value;
      log.debug('default_derived', {
        constraint: this.valueTypes.toString(),
        defaultValue: describeValue(derived.value),
      });
    }

    for (const item of source) this.push(item);
  }

  /** A fresh copy on every read; editing it leaves the Sequence's default alone. */
  get defaultValue(): T {
    return deepClone(this.storedDefault);
  }

  static of<T>(...items: T[]): Sequence<T> {
    return new Sequence<T>({ source: items });
  }

  /**
   * Inclusive arithmetic progression from `start` towards `end`.
   *
   * @throws InvalidArgumentError On a zero step or a step pointing away from `end`.
   */
  static range(start: number, end: number, step = 1): Sequence<number> {
    if (step === 0 || !Number.isFinite(step)) {
      throw new InvalidArgumentError('Step must be a finite, non-zero number.');
    }
    if ((start < end && step < 0) || (start > end && step > 0)) {
      throw new InvalidArgumentError(`Step ${String(step)} never reaches ${String(end)} from ${String(start)}.`);
    }

    const integral = [start, end, step].every((n) => Number.isInteger(n));
    const values: number[] = [];
    for (let i = 0; ; i++) {
      const value = start + i * step;
      if (step > 0 ? value > end : value < end) break;
      values.push(value);
    }
    return new Sequence<number>({ types: integral ? 'int' : 'float', source: values });
  }

  get count(): number {
    return this.items.length;
  }

  get length(): number {
    return this.items.length;
  }

  // =====================================================
  // Positional access
  // =====================================================

  /**
   * @throws IndexOutOfRangeError If `index` is not a current position.
   */
  get(index: number): T {
    this.checkIndex(index, true);
    return this.items[index];
  }

  /**
   * Writes `value` at `index`. Positions between the current end and
   * `index` receive fresh defaults.
   */
  set(index: number, value: T): this {
    this.valueTypes.validate(value);
    this.checkIndex(index, false);
    while (this.items.length < index) this.items.push(this.freshDefault());
    this.items[index] = value;
    return this;
  }

  /** Resets the slot at `index` to a fresh default; the length is unchanged. */
  unset(index: number): this {
    this.checkIndex(index, true);
    this.items[index] = this.freshDefault();
    return this;
  }

  indexExists(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this.items.length;
  }

  first(): T {
    if (this.items.length === 0) throw new IndexOutOfRangeError(0, 'No items in the Sequence.');
    return this.items[0];
  }

  last(): T {
    const n = this.items.length;
    if (n === 0) throw new IndexOutOfRangeError(-1, 'No items in the Sequence.');
    return this.items[n - 1];
  }

  // =====================================================
  // Adding
  // =====================================================

  append(...items: T[]): this {
    for (const item of items) this.push(item);
    return this;
  }

  /** Inserts `items` at the front, in the order given. */
  prepend(...items: T[]): this {
    items.forEach((item, offset) => {
      this.valueTypes.validate(item);
      this.items.splice(offset, 0, item);
    });
    return this;
  }

  /**
   * Inserts `item` before `index`. An index at or past the end behaves like
   * `set`.
   */
  insert(index: number, item: T): this {
    this.valueTypes.validate(item);
    this.checkIndex(index, false);
    if (index >= this.items.length) return this.set(index, item);
    this.items.splice(index, 0, item);
    return this;
  }

  import(src: Iterable<T>): this {
    for (const item of src) this.push(item);
    return this;
  }

  /** Writes `value` at `count` consecutive positions starting at `start`. */
  fill(start: number, count: number, value: T): this {
    if (!Number.isInteger(count) || count < 0) {
      throw new InvalidArgumentError('Fill count must be a non-negative integer.');
    }
    for (let i = 0; i < count; i++) this.set(start + i, deepClone(value));
    return this;
  }

  // =====================================================
  // Removing
  // =====================================================

  removeByIndex(index: number): T {
    this.checkIndex(index, true);
    const [removed] = this.items.splice(index, 1);
    return removed;
  }

  /** Removes every element equal to `value`; returns how many went. */
  removeByValue(value: unknown): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => !strictEquals(item, value));
    return before - this.items.length;
  }

  removeFirst(): T {
    if (this.items.length === 0) throw new UnderflowError('No items in the Sequence.');
    return this.removeByIndex(0);
  }

  removeLast(): T {
    if (this.items.length === 0) throw new UnderflowError('No items in the Sequence.');
    return this.removeByIndex(this.items.length - 1);
  }

  /** Removes `count` randomly chosen elements and returns them in index order. */
  removeRand(count = 1): T[] {
    const picked = this.pickIndexes(count);
    const removed = picked.map((index) => this.items[index]);
    const drop = new Set(picked);
    this.items = this.items.filter((_, index) => !drop.has(index));
    return removed;
  }

  clear(): this {
    this.items = [];
    return this;
  }

  // =====================================================
  // Queries
  // =====================================================

  contains(value: unknown): boolean {
    return this.items.some((item) => strictEquals(item, value));
  }

  /** Index of the first element equal to `value`, or null. */
  search(value: unknown): number | null {
    const index = this.items.findIndex((item) => strictEquals(item, value));
    return index === -1 ? null : index;
  }

  find(fn: (item: T, index: number) => boolean): T | undefined {
    return this.items.find(fn);
  }

  equals(other: Collection<unknown, unknown>): boolean {
    if (!(other instanceof Sequence) || !this.sameKind(other)) return false;
    return this.items.every((item, index) => strictEquals(item, other.items[index]));
  }

  /** `count` distinct random positions with their values, in index order. */
  chooseRand(count = 1): Array<[number, T]> {
    return this.pickIndexes(count).map((index): [number, T] => [index, this.items[index]]);
  }

  // =====================================================
  // Transforms (non-mutating)
  // =====================================================

  /** `length` elements from `start`; a negative `start` counts from the end. */
  slice(start: number, length?: number): Sequence<T> {
    const from = start < 0 ? Math.max(this.items.length + start, 0) : start;
    return this.derive(this.items.slice(from, length === undefined ? undefined : from + length));
  }

  sort(compare: Comparator<T> = compareValues): Sequence<T> {
    return this.derive([...this.items].sort(compare));
  }

  sortReverse(compare: Comparator<T> = compareValues): Sequence<T> {
    return this.derive([...this.items].sort((a, b) => compare(b, a)));
  }

  /** Sorts by the key `fn` computes for each element. */
  sortBy(fn: (item: T) => unknown): Sequence<T> {
    const keyed = this.items.map((item) => ({ item, key: fn(item) }));
    keyed.sort((a, b) => compareValues(a.key, b.key));
    return this.derive(keyed.map(({ item }) => item));
  }

  chunk(size: number): Sequence<T>[] {
    if (!Number.isInteger(size) || size < 1) {
      throw new InvalidArgumentError('Chunk size must be a positive integer.');
    }
    const chunks: Sequence<T>[] = [];
    for (let i = 0; i < this.items.length; i += size) {
      chunks.push(this.derive(this.items.slice(i, i + size)));
    }
    return chunks;
  }

  filter(fn: (item: T, index: number) => boolean): Sequence<T> {
    return this.derive(this.items.filter(fn));
  }

  /**
   * Applies `fn` to every element. The result's types are inferred from
   * what `fn` returns unless given in `options`.
   */
  map<U>(fn: (item: T, index: number) => U, options: Omit<SequenceOptions<U>, 'source'> = {}): Sequence<U> {
    return new Sequence<U>({ ...options, source: this.items.map(fn) });
  }

  /** This sequence followed by `other`; `other`'s elements must fit this TypeSet. */
  merge(other: Iterable<T>): Sequence<T> {
    return this.derive([...this.items, ...other]);
  }

  reverse(): Sequence<T> {
    return this.derive([...this.items].reverse());
  }

  /** First occurrence of every distinct element, in order. */
  unique(): Sequence<T> {
    const seen = new AssociativeStore<T, true>();
    const kept: T[] = [];
    for (const item of this.items) {
      if (!seen.exists(item)) {
        seen.set(item, true);
        kept.push(item);
      }
    }
    return this.derive(kept);
  }

  /** Occurrence count of every distinct element, in first-seen order. */
  countValues(): Dictionary<T, number> {
    const counts = new Dictionary<T, number>({ keyTypes: this.valueTypes, valueTypes: 'uint' });
    for (const item of this.items) {
      counts.set(item, counts.keyExists(item) ? counts.get(item) + 1 : 1);
    }
    return counts;
  }

  // =====================================================
  // Aggregates
  // =====================================================

  reduce<U>(fn: (carry: U, item: T, index: number) => U, initial: U): U {
    return this.items.reduce(fn, initial);
  }

  sum(): number {
    return this.numbers().reduce((a, b) => a + b, 0);
  }

  product(): number {
    return this.numbers().reduce((a, b) => a * b, 1);
  }

  min(): number {
    const values = this.numbers();
    if (values.length === 0) throw new UnderflowError('Cannot take the minimum of an empty Sequence.');
    return values.reduce((a, b) => (b < a ? b : a));
  }

  max(): number {
    const values = this.numbers();
    if (values.length === 0) throw new UnderflowError('Cannot take the maximum of an empty Sequence.');
    return values.reduce((a, b) => (b > a ? b : a));
  }

  average(): number {
    const values = this.numbers();
    if (values.length === 0) throw new UnderflowError('Cannot average an empty Sequence.');
    return values.reduce((a, b) => a + b, 0) / values.length;
  }

  join(glue = ''): string {
    return this.items.map((item) => String(item)).join(glue);
  }

  // =====================================================
  // Conversion
  // =====================================================

  toDictionary(): Dictionary<number, T> {
    return new Dictionary<number, T>({
      keyTypes: 'int',
      valueTypes: this.valueTypes,
      source: this.items.map((item, index): [number, T] => [index, item]),
    });
  }

  toSet(): ValueSet<T> {
    return new ValueSet<T>({ types: this.valueTypes, source: this.items });
  }

  toArray(): T[] {
    return [...this.items];
  }

  [Symbol.iterator](): IterableIterator<T> {
    return this.items.values();
  }

  // =====================================================
  // Internals
  // =====================================================

  private push(item: T): void {
    this.valueTypes.validate(item);
    this.items.push(item);
  }

  private freshDefault(): T {
    return deepClone(this.storedDefault);
  }

  private derive(items: T[]): Sequence<T> {
    return new Sequence<T>({ types: this.valueTypes, defaultValue: this.storedDefault, source: items });
  }

  /**
   * @param existing When true, `index` must name a current position;
   *   otherwise any non-negative integer is accepted.
   */
  private checkIndex(index: number, existing: boolean): void {
    if (!Number.isInteger(index)) throw new IndexOutOfRangeError(index, 'Index must be an integer.');
    if (index < 0) throw new IndexOutOfRangeError(index, 'Index cannot be negative.');
    if (existing && index >= this.items.length) {
      throw new IndexOutOfRangeError(index, `Index ${String(index)} is out of range.`);
    }
  }

  private pickIndexes(count: number): number[] {
    const n = this.items.length;
    if (n === 0) throw new UnderflowError('No items in the Sequence.');
    if (!Number.isInteger(count) || count < 1 || count > n) {
      throw new InvalidArgumentError(`Count must be an integer between 1 and ${String(n)}.`);
    }
    // partial Fisher-Yates over the positions
    const positions = Array.from({ length: n }, (_, i) => i);
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(Math.random() * (n - i));
      [positions[i], positions[j]] = [positions[j], positions[i]];
    }
    return positions.slice(0, count).sort((a, b) => a - b);
  }

  private numbers(): number[] {
    return this.items.map((item) => {
      if (!isNumber(item)) throw new TypeMismatchError('number', observedType(item), 'element');
      return item;
    });
  }
}
