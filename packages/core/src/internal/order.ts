/**
 * OrderIndex - insertion order for the associative store
 *
 * Entries live in a dense slot array (append = push), the trie maps each
 * canonical key to its slot. Removal leaves a DELETED hole so later slots
 * keep their numbers; once holes pass the compaction threshold the slots are
 * packed and the trie rebuilt, preserving relative order.
 */

import { DELETED } from './constants';
import type { CanonicalKey, Owner } from './types';
import { hamtEmpty, hamtSet, hamtGet, hamtDelete, type HMap } from './hamt';

export { DELETED };

export interface OrderIndex<E extends CanonicalKey> {
  keyToIdx: HMap<number>;
  slots: (E | typeof DELETED)[];
  holes: number;
}

export interface CompactPolicy {
  ratio: number;
  minSlots: number;
}

export function orderEmpty<E extends CanonicalKey>(): OrderIndex<E> {
  return { keyToIdx: hamtEmpty(), slots: [], holes: 0 };
}

export function orderSize<E extends CanonicalKey>(ord: OrderIndex<E>): number {
  return ord.keyToIdx.size;
}

export function orderLookup<E extends CanonicalKey>(ord: OrderIndex<E>, key: CanonicalKey): E | undefined {
  const idx = hamtGet(ord.keyToIdx, key);
  if (idx === undefined) return undefined;
  const slot = ord.slots[idx];
  return slot === DELETED ? undefined : slot;
}

export function orderAppend<E extends CanonicalKey>(ord: OrderIndex<E>, owner: Owner, entry: E): void {
  ord.keyToIdx = hamtSet(ord.keyToIdx, owner, entry, ord.slots.length);
  ord.slots.push(entry);
}

/**
 * Swaps the entry stored under `entry`'s key for `entry`, keeping its slot.
 * Returns the entry it replaced, or undefined when the key is absent.
 */
export function orderReplace<E extends CanonicalKey>(ord: OrderIndex<E>, entry: E): E | undefined {
  const idx = hamtGet(ord.keyToIdx, entry);
  if (idx === undefined) return undefined;
  const previous = ord.slots[idx];
  if (previous === DELETED) return undefined;
  ord.slots[idx] = entry;
  return previous;
}

export function orderDelete<E extends CanonicalKey>(
  ord: OrderIndex<E>,
  owner: Owner,
  key: CanonicalKey
): E | undefined {
  const idx = hamtGet(ord.keyToIdx, key);
  if (idx === undefined) return undefined;
  const removed = ord.slots[idx];
  if (removed === DELETED) return undefined;
  ord.keyToIdx = hamtDelete(ord.keyToIdx, owner, key);
  ord.slots[idx] = DELETED;
  ord.holes++;
  return removed;
}

export function orderNeedsCompaction<E extends CanonicalKey>(ord: OrderIndex<E>, policy: CompactPolicy): boolean {
  return ord.holes > ord.slots.length * policy.ratio && ord.slots.length > policy.minSlots;
}

export function orderCompact<E extends CanonicalKey>(ord: OrderIndex<E>, owner: Owner): void {
  if (ord.holes === 0) return;
  let keyToIdx = hamtEmpty<number>();
  const slots: E[] = [];

  for (const slot of ord.slots) {
    if (slot !== DELETED) {
      keyToIdx = hamtSet(keyToIdx, owner, slot, slots.length);
      slots.push(slot);
    }
  }

  ord.keyToIdx = keyToIdx;
  ord.slots = slots;
  ord.holes = 0;
}

export function orderClear<E extends CanonicalKey>(ord: OrderIndex<E>): void {
  ord.keyToIdx = hamtEmpty();
  ord.slots = [];
  ord.holes = 0;
}

export function* orderIter<E extends CanonicalKey>(ord: OrderIndex<E>): IterableIterator<E> {
  for (const slot of ord.slots) {
    if (slot !== DELETED) yield slot;
  }
}
