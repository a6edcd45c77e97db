/**
 * AssociativeStore - insertion-ordered map accepting keys of any runtime type
 *
 * Keys are compared with the collection equality rule: `1`, `'1'` and `true`
 * are three keys, two arrays with equal elements are one key, two distinct
 * objects are two keys however alike they look.
 *
 * Mutating the store while iterating it gives undefined positional results.
 */

import { getConfig } from './config';
import { KeyNotFoundError } from './errors';
import { canonicalize, snapshotKey } from './internal/canonical';
import { createLogger } from './internal/logger';
import {
  orderAppend,
  orderClear,
  orderCompact,
  orderDelete,
  orderEmpty,
  orderIter,
  orderLookup,
  orderNeedsCompaction,
  orderReplace,
  orderSize,
  type OrderIndex,
} from './internal/order';
import type { StoredEntry } from './internal/types';
import { describeValue } from './internal/values';

const log = createLogger('AssociativeStore');

export class AssociativeStore<K, V> implements Iterable<[K, V]> {
  // Transient owner: trie nodes created by this store are edited in place
  private readonly owner: object = {};
  private order: OrderIndex<StoredEntry<K, V>> = orderEmpty();

  constructor(source?: Iterable<readonly [K, V]>) {
    if (source) {
      for (const [key, value] of source) this.set(key, value);
    }
  }

  get size(): number {
    return orderSize(this.order);
  }

  lookup(key: K): StoredEntry<K, V> | undefined {
    const entry = orderLookup(this.order, canonicalize(key));
    return entry && exposed(entry);
  }

  exists(key: K): boolean {
    return orderLookup(this.order, canonicalize(key)) !== undefined;
  }

  /**
   * @throws KeyNotFoundError If the key is absent.
   */
  get(key: K): V {
    const entry = orderLookup(this.order, canonicalize(key));
    if (!entry) throw new KeyNotFoundError(key, describeValue(key));
    return entry.value;
  }

  /**
   * Stores `value` under `key`. An existing key keeps its position and its
   * entry is replaced; a new key is appended. Returns the replaced entry.
   */
  set(key: K, value: V): StoredEntry<K, V> | undefined {
    const canonical = canonicalize(key);
    const existing = orderLookup(this.order, canonical);
    if (existing) {
      const replaced = orderReplace(this.order, { key: existing.key, value, hash: existing.hash, token: existing.token });
      return replaced && exposed(replaced);
    }
    orderAppend(this.order, this.owner, { key: snapshotKey(key), value, hash: canonical.hash, token: canonical.token });
    return undefined;
  }

  /**
   * @throws KeyNotFoundError If the key is absent.
   */
  remove(key: K): V {
    const removed = this.take(key);
    if (!removed) throw new KeyNotFoundError(key, describeValue(key));
    return removed.value;
  }

  delete(key: K): boolean {
    return this.take(key) !== undefined;
  }

  clear(): void {
    orderClear(this.order);
  }

  *entries(): IterableIterator<[K, V]> {
    for (const entry of orderIter(this.order)) yield [snapshotKey(entry.key), entry.value];
  }

  *keys(): IterableIterator<K> {
    for (const entry of orderIter(this.order)) yield snapshotKey(entry.key);
  }

  *values(): IterableIterator<V> {
    for (const entry of orderIter(this.order)) yield entry.value;
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }

  private take(key: K): StoredEntry<K, V> | undefined {
    const removed = orderDelete(this.order, this.owner, canonicalize(key));
    if (!removed) return undefined;

    const { compactRatio, compactMinSlots } = getConfig();
    if (orderNeedsCompaction(this.order, { ratio: compactRatio, minSlots: compactMinSlots })) {
      const slots = this.order.slots.length;
      orderCompact(this.order, this.owner);
      log.debug('store_compacted', { slots, live: this.size });
    }
    return removed;
  }
}

// Stored array keys never leave the store: a caller editing one would move the
// entry away from its token
function exposed<K, V>(entry: StoredEntry<K, V>): StoredEntry<K, V> {
  return Array.isArray(entry.key) ? { ...entry, key: snapshotKey(entry.key) } : entry;
}
