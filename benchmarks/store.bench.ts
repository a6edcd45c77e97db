/**
 * Benchmark: AssociativeStore vs native Map
 * Scalar keys cost a canonicalization on top of the trie; array keys are
 * compared by content, which a native Map cannot do at all.
 */

import { bench, describe } from 'vitest';
import { AssociativeStore, Dictionary, Sequence } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const intKeys = Array.from({ length: SIZE }, (_, i) => i);
const stringKeys = intKeys.map((i) => `key-${i}`);
const arrayKeys = intKeys.map((i) => [i, i % 7]);

const nativeMap = new Map(intKeys.map((k) => [k, k]));
const store = new AssociativeStore<number, number>(intKeys.map((k) => [k, k]));

describe(`Build ${SIZE} int keys`, () => {
  bench('Native Map', () => {
    const map = new Map<number, number>();
    for (const k of intKeys) map.set(k, k);
  });

  bench('AssociativeStore', () => {
    const s = new AssociativeStore<number, number>();
    for (const k of intKeys) s.set(k, k);
  });
});

describe(`Lookup ${SIZE} int keys`, () => {
  bench('Native Map', () => {
    for (const k of intKeys) nativeMap.get(k);
  });

  bench('AssociativeStore', () => {
    for (const k of intKeys) store.lookup(k);
  });
});

// ===== String keys =====
describe(`Build ${SIZE} string keys`, () => {
  bench('Native Map', () => {
    const map = new Map<string, number>();
    stringKeys.forEach((k, i) => map.set(k, i));
  });

  bench('AssociativeStore', () => {
    const s = new AssociativeStore<string, number>();
    stringKeys.forEach((k, i) => s.set(k, i));
  });
});

// ===== Array keys =====
describe(`Build ${SIZE} array keys`, () => {
  bench('Native Map (JSON.stringify keys)', () => {
    const map = new Map<string, number>();
    arrayKeys.forEach((k, i) => map.set(JSON.stringify(k), i));
  });

  bench('AssociativeStore', () => {
    const s = new AssociativeStore<number[], number>();
    arrayKeys.forEach((k, i) => s.set(k, i));
  });
});

// ===== Removal with compaction =====
describe('Remove every other key', () => {
  bench('Native Map', () => {
    const map = new Map(nativeMap);
    for (let i = 0; i < SIZE; i += 2) map.delete(i);
  });

  bench('AssociativeStore', () => {
    const s = new AssociativeStore<number, number>(store);
    for (let i = 0; i < SIZE; i += 2) s.delete(i);
  });
});

// ===== Collections =====
describe('Typed collections', () => {
  bench('Sequence append (int)', () => {
    const seq = new Sequence<number>({ types: 'int' });
    for (const k of intKeys) seq.append(k);
  });

  bench('Dictionary set (string => int)', () => {
    const dict = new Dictionary<string, number>({ keyTypes: 'string', valueTypes: 'int' });
    stringKeys.forEach((k, i) => dict.set(k, i));
  });
});
