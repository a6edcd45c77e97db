import { stringify } from './internal/values';

/**
 * An immutable key/value pair, as accepted by `Dictionary.add` and produced
 * by `Dictionary.toSequence`.
 */
export class KeyValuePair<K, V> {
  constructor(
    readonly key: K,
    readonly value: V
  ) {}

  toTuple(): [K, V] {
    return [this.key, this.value];
  }

  toString(): string {
    return `${stringify(this.key)} => ${stringify(this.value)}`;
  }
}
