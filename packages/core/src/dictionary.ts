/**
 * Dictionary - insertion-ordered map with type-constrained keys and values
 *
 * Keys may be of any runtime type. `1`, `'1'` and `true` are distinct keys;
 * arrays are keys by content; objects are keys by identity.
 *
 * @example
 * ```ts
 * const dict = new Dictionary<number | string | boolean, string>({ keyTypes: 'int|string|bool' });
 * dict.set(1, 'a').set('1', 'b').set(true, 'c');
 * dict.get(1); // 'a'
 * ```
 */

import { Collection } from './collection';
import { ArgumentArityError, InvalidArgumentError, TypeMismatchError } from './errors';
import { strictEquals } from './internal/canonical';
import { observedType } from './internal/runtime-type';
import { compareValues, stringify } from './internal/values';
import { KeyValuePair } from './key-value-pair';
import { Sequence } from './sequence';
import { AssociativeStore } from './store';
import { TypeSet, type TypeSetInput } from './type-set';

export interface DictionaryOptions<K, V> {
  /** Allowed key types. Omitted: inferred from `source`. `null`: any type. */
  keyTypes?: TypeSetInput;
  /** Allowed value types. Omitted: inferred from `source`. `null`: any type. */
  valueTypes?: TypeSetInput;
  /** `[key, value]` pairs; a `Map` works. */
  source?: Iterable<readonly [K, V]>;
}

export class Dictionary<K = unknown, V = unknown> extends Collection<[K, V], V> {
  readonly keyTypes: TypeSet;
  private readonly store = new AssociativeStore<K, V>();

  constructor(options: DictionaryOptions<K, V> = {}) {
    const pairs = options.source === undefined ? [] : [...options.source];
    super(
      options.valueTypes === undefined
        ? TypeSet.infer(pairs.map(([, value]) => value))
        : TypeSet.from(options.valueTypes)
    );
    this.keyTypes =
      options.keyTypes === undefined ? TypeSet.infer(pairs.map(([key]) => key)) : TypeSet.from(options.keyTypes);

    for (const [key, value] of pairs) this.set(key, value);
  }

  /**
   * Pairs `keys[i]` with `values[i]`. With `inferTypes` off, both TypeSets
   * are unrestricted.
   *
   * @throws InvalidArgumentError If the counts differ or a key repeats.
   */
  static combine<K, V>(keys: Iterable<K>, values: Iterable<V>, inferTypes = true): Dictionary<K, V> {
    const keyList = [...keys];
    const valueList = [...values];
    if (keyList.length !== valueList.length) {
      throw new InvalidArgumentError(
        `Cannot combine: ${String(keyList.length)} keys and ${String(valueList.length)} values.`
      );
    }

    const dict = new Dictionary<K, V>({
      keyTypes: inferTypes ? TypeSet.infer(keyList) : null,
      valueTypes: inferTypes ? TypeSet.infer(valueList) : null,
    });
    keyList.forEach((key, i) => {
      if (dict.keyExists(key)) throw new InvalidArgumentError('Cannot combine: keys are not unique.');
      dict.set(key, valueList[i]);
    });
    return dict;
  }

  /** Own enumerable string-keyed properties of `record`, in property order. */
  static fromObject<V>(
    record: Readonly<Record<string, V>>,
    options: Pick<DictionaryOptions<string, V>, 'valueTypes'> = {}
  ): Dictionary<string, V> {
    return new Dictionary<string, V>({ keyTypes: 'string', ...options, source: Object.entries(record) });
  }

  get count(): number {
    return this.store.size;
  }

  // =====================================================
  // Access
  // =====================================================

  /**
   * @throws TypeMismatchError If the key's type is not allowed.
   * @throws KeyNotFoundError If the key is absent.
   */
  get(key: K): V {
    this.keyTypes.validate(key, 'key');
    return this.store.get(key);
  }

  /** Stores `value` under `key`; an existing key keeps its position. */
  set(key: K, value: V): this {
    return this.put(key, value);
  }

  /**
   * Adds one entry, given either as a `KeyValuePair` or as key and value.
   *
   * @throws TypeMismatchError If a single argument is not a KeyValuePair.
   * @throws ArgumentArityError For any other number of arguments.
   */
  add(pair: KeyValuePair<K, V>): this;
  add(key: K, value: V): this;
  add(...args: unknown[]): this {
    if (args.length === 1) {
      const [pair] = args;
      if (!(pair instanceof KeyValuePair)) {
        throw new TypeMismatchError(
          'KeyValuePair',
          observedType(pair),
          'argument',
          `add() with one argument expects a KeyValuePair, got ${observedType(pair)}.`
        );
      }
      return this.put(pair.key, pair.value);
    }
    if (args.length === 2) return this.put(args[0], args[1]);
    throw new ArgumentArityError('add', '1 (KeyValuePair) or 2 (key, value)', args.length);
  }

  import(src: Iterable<readonly [K, V]>): this {
    for (const [key, value] of src) this.put(key, value);
    return this;
  }

  keyExists(key: unknown): boolean {
    return this.isKey(key) && this.store.exists(key);
  }

  /**
   * @throws KeyNotFoundError If the key is absent.
   */
  removeByKey(key: K): V {
    this.keyTypes.validate(key, 'key');
    return this.store.remove(key);
  }

  /** Same as `removeByKey`, discarding the value. */
  unset(key: K): this {
    this.removeByKey(key);
    return this;
  }

  /** Removes every entry whose value equals `value`; returns how many went. */
  removeByValue(value: unknown): number {
    this.valueTypes.validate(value);
    const doomed = this.keys().filter((key) => strictEquals(this.store.get(key), value));
    for (const key of doomed) this.store.delete(key);
    return doomed.length;
  }

  clear(): this {
    this.store.clear();
    return this;
  }

  // =====================================================
  // Views and queries
  // =====================================================

  keys(): K[] {
    return [...this.store.keys()];
  }

  values(): V[] {
    return [...this.store.values()];
  }

  entries(): Array<[K, V]> {
    return [...this.store.entries()];
  }

  contains(value: unknown): boolean {
    for (const stored of this.store.values()) {
      if (strictEquals(stored, value)) return true;
    }
    return false;
  }

  /** Same keys mapped to equal values, in the same order. */
  equals(other: Collection<unknown, unknown>): boolean {
    if (!(other instanceof Dictionary) || !this.sameKind(other)) return false;
    const theirs = other.entries();
    return this.entries().every(
      ([key, value], i) => strictEquals(key, theirs[i][0]) && strictEquals(value, theirs[i][1])
    );
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store.entries();
  }

  // =====================================================
  // Transforms (non-mutating)
  // =====================================================

  sort(compare: (a: KeyValuePair<K, V>, b: KeyValuePair<K, V>) => number): Dictionary<K, V> {
    const pairs = this.entries().map(([key, value]) => new KeyValuePair(key, value));
    pairs.sort(compare);
    return this.derive(pairs.map((pair) => pair.toTuple()));
  }

  sortByKey(): Dictionary<K, V> {
    return this.sort((a, b) => compareValues(a.key, b.key));
  }

  sortByValue(): Dictionary<K, V> {
    return this.sort((a, b) => compareValues(a.value, b.value));
  }

  /**
   * Values become keys and keys values.
   *
   * @throws InvalidArgumentError If two keys share a value.
   */
  flip(): Dictionary<V, K> {
    const flipped = new Dictionary<V, K>({ keyTypes: this.valueTypes, valueTypes: this.keyTypes });
    for (const [key, value] of this.store) {
      if (flipped.keyExists(value)) {
        throw new InvalidArgumentError('Cannot flip Dictionary: values are not unique.');
      }
      flipped.set(value, key);
    }
    return flipped;
  }

  /**
   * Entries of this dictionary overlaid with `other`'s; on a shared key the
   * value from `other` wins and the position from this one is kept.
   */
  merge(other: Dictionary<K, V>): Dictionary<K, V> {
    const merged = new Dictionary<K, V>({
      keyTypes: this.keyTypes.union(other.keyTypes),
      valueTypes: this.valueTypes.union(other.valueTypes),
      source: this.store,
    });
    return merged.import(other.store);
  }

  filter(fn: (key: K, value: V) => boolean): Dictionary<K, V> {
    return this.derive(this.entries().filter(([key, value]) => fn(key, value)));
  }

  // =====================================================
  // Conversion
  // =====================================================

  /**
   * The entries as KeyValuePairs. The sequence's default is `null`.
   */
  toSequence(): Sequence<KeyValuePair<K, V> | null> {
    return new Sequence<KeyValuePair<K, V> | null>({
      types: '?KeyValuePair',
      source: this.entries().map(([key, value]) => new KeyValuePair(key, value)),
    });
  }

  /**
   * A plain object keyed by the string form of each key.
   *
   * @throws TypeMismatchError If a key is neither a string nor an integer.
   * @throws InvalidArgumentError If two keys share a string form.
   */
  toObject(): Record<string, V> {
    const seen = new Set<string>();
    const props: Array<[string, V]> = [];
    for (const [key, value] of this.store) {
      if (typeof key !== 'string' && !Number.isInteger(key)) {
        throw new TypeMismatchError('int|string', observedType(key), 'key');
      }
      const prop = String(key);
      if (seen.has(prop)) {
        throw new InvalidArgumentError(`Keys collide as object property ${JSON.stringify(prop)}.`);
      }
      seen.add(prop);
      props.push([prop, value]);
    }
    return Object.fromEntries(props);
  }

  toMap(): Map<K, V> {
    return new Map(this.store);
  }

  toString(): string {
    const body = this.entries().map(([key, value]) => `${stringify(key)} => ${stringify(value)}`);
    return `Dictionary<${this.keyTypes.toString()}, ${this.valueTypes.toString()}> {${body.join(', ')}}`;
  }

  // =====================================================
  // Internals
  // =====================================================

  private isKey(key: unknown): key is K {
    return this.keyTypes.matches(key);
  }

  private put(key: unknown, value: unknown): this {
    if (!this.isKey(key)) throw new TypeMismatchError(this.keyTypes.toString(), observedType(key), 'key');
    if (!this.conforms(value)) throw new TypeMismatchError(this.valueTypes.toString(), observedType(value));
    this.store.set(key, value);
    return this;
  }

  private derive(entries: Array<readonly [K, V]>): Dictionary<K, V> {
    return new Dictionary<K, V>({ keyTypes: this.keyTypes, valueTypes: this.valueTypes, source: entries });
  }
}
