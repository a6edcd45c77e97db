/**
 * HAMT - Hash Array Mapped Trie
 * Bitmap-indexed trie from canonical keys to values.
 * A hash match is only a candidate; every hit is confirmed with tokensEqual.
 */

import { BITS, MASK } from './constants';
import { popcount } from './utils';
import { tokensEqual } from './canonical';
import type { CanonicalKey, ExactToken, Owner } from './types';

// Types
export interface HLeaf<V> {
  kind: 'leaf';
  token: ExactToken;
  hash: number;
  value: V;
}

export interface HCollision<V> {
  kind: 'collision';
  entries: HLeaf<V>[];
}

export interface HNode<V> {
  kind: 'node';
  owner?: Owner;
  bitmap: number;
  children: HChild<V>[];
}

export type HChild<V> = HLeaf<V> | HCollision<V> | HNode<V>;

export interface HMap<V> {
  root: HChild<V> | null;
  size: number;
}

export function hamtEmpty<V>(): HMap<V> {
  return { root: null, size: 0 };
}

function ensureEditableHNode<V>(node: HNode<V>, owner: Owner): HNode<V> {
  if (owner && node.owner === owner) return node;
  return {
    kind: 'node',
    owner,
    bitmap: node.bitmap,
    children: node.children.slice(),
  };
}

function mergeLeaves<V>(leaf1: HLeaf<V>, leaf2: HLeaf<V>, owner: Owner, shift: number): HNode<V> {
  const idx1 = (leaf1.hash >>> shift) & MASK;
  const idx2 = (leaf2.hash >>> shift) & MASK;

  if (idx1 === idx2) {
    const child = mergeLeaves(leaf1, leaf2, owner, shift + BITS);
    return {
      kind: 'node',
      owner,
      bitmap: 1 << idx1,
      children: [child],
    };
  }

  return {
    kind: 'node',
    owner,
    bitmap: (1 << idx1) | (1 << idx2),
    children: idx1 < idx2 ? [leaf1, leaf2] : [leaf2, leaf1],
  };
}

function findInCollision<V>(entries: HLeaf<V>[], token: ExactToken): number {
  for (let i = 0; i < entries.length; i++) {
    if (tokensEqual(entries[i].token, token)) return i;
  }
  return -1;
}

function hamtInsert<V>(
  node: HChild<V> | null,
  owner: Owner,
  hash: number,
  token: ExactToken,
  value: V,
  shift: number
): { node: HChild<V>; added: boolean; changed: boolean } {
  if (!node) {
    return {
      node: { kind: 'leaf', token, hash, value },
      added: true,
      changed: true,
    };
  }

  if (node.kind === 'leaf') {
    const leaf = node;
    if (leaf.hash === hash && tokensEqual(leaf.token, token)) {
      if (leaf.value === value) {
        return { node: leaf, added: false, changed: false };
      }
      return {
        node: { kind: 'leaf', token: leaf.token, hash, value },
        added: false,
        changed: true,
      };
    }

    const newLeaf: HLeaf<V> = { kind: 'leaf', token, hash, value };
    if (leaf.hash === hash) {
      return {
        node: { kind: 'collision', entries: [leaf, newLeaf] },
        added: true,
        changed: true,
      };
    }

    return { node: mergeLeaves(leaf, newLeaf, owner, shift), added: true, changed: true };
  }

  if (node.kind === 'collision') {
    const entries = node.entries;
    const idx = findInCollision(entries, token);

    if (idx >= 0) {
      const existing = entries[idx];
      if (existing.value === value) {
        return { node, added: false, changed: false };
      }
      const newEntries = entries.slice();
      newEntries[idx] = { kind: 'leaf', token: existing.token, hash, value };
      return {
        node: { kind: 'collision', entries: newEntries },
        added: false,
        changed: true,
      };
    }

    const newEntries = entries.slice();
    newEntries.push({ kind: 'leaf', token, hash, value });
    return {
      node: { kind: 'collision', entries: newEntries },
      added: true,
      changed: true,
    };
  }

  // node.kind === 'node'
  const n = node;
  const idx = (hash >>> shift) & MASK;
  const bit = 1 << idx;
  const hasSlot = (n.bitmap & bit) !== 0;
  const packedIdx = popcount(n.bitmap & (bit - 1));

  if (!hasSlot) {
    const newLeaf: HLeaf<V> = { kind: 'leaf', token, hash, value };
    const editable = ensureEditableHNode(n, owner);
    editable.children.splice(packedIdx, 0, newLeaf);
    editable.bitmap = n.bitmap | bit;
    return { node: editable, added: true, changed: true };
  }

  const child = n.children[packedIdx];
  const res = hamtInsert(child, owner, hash, token, value, shift + BITS);
  if (!res.changed && !res.added) {
    return { node, added: false, changed: false };
  }

  const editable = ensureEditableHNode(n, owner);
  editable.children[packedIdx] = res.node;
  return {
    node: editable,
    added: res.added,
    changed: true,
  };
}

function hamtRemove<V>(
  node: HChild<V> | null,
  owner: Owner,
  hash: number,
  token: ExactToken,
  shift: number
): { node: HChild<V> | null; removed: boolean } {
  if (!node) return { node, removed: false };

  if (node.kind === 'leaf') {
    if (node.hash === hash && tokensEqual(node.token, token)) {
      return { node: null, removed: true };
    }
    return { node, removed: false };
  }

  if (node.kind === 'collision') {
    const entries = node.entries;
    const idx = findInCollision(entries, token);
    if (idx === -1) return { node, removed: false };
    if (entries.length === 1) {
      return { node: null, removed: true };
    }
    const newEntries = entries.slice();
    newEntries.splice(idx, 1);
    if (newEntries.length === 1) {
      return { node: newEntries[0], removed: true };
    }
    return {
      node: { kind: 'collision', entries: newEntries },
      removed: true,
    };
  }

  // node.kind === 'node'
  const n = node;
  const idx = (hash >>> shift) & MASK;
  const bit = 1 << idx;
  if ((n.bitmap & bit) === 0) {
    return { node, removed: false };
  }

  const packedIdx = popcount(n.bitmap & (bit - 1));
  const child = n.children[packedIdx];

  const res = hamtRemove(child, owner, hash, token, shift + BITS);
  if (!res.removed) return { node, removed: false };

  if (res.node === null) {
    const newBitmap = n.bitmap ^ bit;
    if (newBitmap === 0) {
      return { node: null, removed: true };
    }
    const newChildren = n.children.slice();
    newChildren.splice(packedIdx, 1);

    if (newChildren.length === 1 && newChildren[0].kind !== 'node') {
      return { node: newChildren[0], removed: true };
    }

    return {
      node: {
        kind: 'node',
        owner,
        bitmap: newBitmap,
        children: newChildren,
      },
      removed: true,
    };
  }

  const editable = ensureEditableHNode(n, owner);
  editable.children[packedIdx] = res.node;
  return { node: editable, removed: true };
}

function findLeaf<V>(map: HMap<V>, key: CanonicalKey): HLeaf<V> | undefined {
  const { hash, token } = key;
  let node: HChild<V> | null = map.root;
  let shift = 0;

  while (node) {
    if (node.kind === 'leaf') {
      return node.hash === hash && tokensEqual(node.token, token) ? node : undefined;
    }
    if (node.kind === 'collision') {
      const idx = findInCollision(node.entries, token);
      return idx === -1 ? undefined : node.entries[idx];
    }
    const idx = (hash >>> shift) & MASK;
    const bit = 1 << idx;
    if ((node.bitmap & bit) === 0) return undefined;
    node = node.children[popcount(node.bitmap & (bit - 1))];
    shift += BITS;
  }

  return undefined;
}

export function hamtGet<V>(map: HMap<V>, key: CanonicalKey): V | undefined {
  return findLeaf(map, key)?.value;
}

export function hamtSet<V>(map: HMap<V>, owner: Owner, key: CanonicalKey, value: V): HMap<V> {
  const res = hamtInsert(map.root, owner, key.hash, key.token, value, 0);
  if (!res.changed) return map;
  return {
    root: res.node,
    size: map.size + (res.added ? 1 : 0),
  };
}

export function hamtDelete<V>(map: HMap<V>, owner: Owner, key: CanonicalKey): HMap<V> {
  if (!map.root) return map;
  const res = hamtRemove(map.root, owner, key.hash, key.token, 0);
  if (!res.removed) return map;
  return {
    root: res.node,
    size: map.size - 1,
  };
}
