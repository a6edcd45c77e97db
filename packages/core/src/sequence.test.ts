/**
 * Tests for Sequence
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { Sequence } from './sequence';
import {
  IndexOutOfRangeError,
  InvalidArgumentError,
  TypeMismatchError,
  UnderflowError,
  UnrepresentableDefaultError,
} from './errors';

class Tag {
  constructor(public label: string) {}
}

describe('Sequence', () => {
  describe('construction', () => {
    it('should infer types from the source', () => {
      const seq = new Sequence({ source: [1, 2, 3] });
      expect(seq.valueTypes.toString()).toBe('int');
      expect(seq.defaultValue).toBe(0);
    });

    it('should accept everything with null types', () => {
      const seq = new Sequence<unknown>({ types: null, source: [1, 'a', null] });
      expect(seq.valueTypes.anyOk()).toBe(true);
      expect(seq.defaultValue).toBeNull();
    });

    it('should reject an explicit default of the wrong type', () => {
      expect(() => new Sequence<unknown>({ types: 'int', defaultValue: 'x' })).toThrow(
        'Disallowed default value type: expected int, got string.'
      );
    });

    it('should reject types with no derivable default', () => {
      expect(() => new Sequence({ types: 'int|string' })).toThrow(UnrepresentableDefaultError);
      expect(() => Sequence.of(new Tag('a'))).toThrow(UnrepresentableDefaultError);
    });

    it('should accept nominal types given a default', () => {
      const fallback = new Tag('none');
      const seq = new Sequence<Tag>({ types: 'Tag', defaultValue: fallback });
      seq.set(1, new Tag('b'));
      expect(seq.get(0)).toBeInstanceOf(Tag);
      expect(seq.get(0)).not.toBe(fallback);
      expect(seq.get(0).label).toBe('none');
    });

    it('should reject an invalid source item', () => {
      expect(() => new Sequence<unknown>({ types: 'int', source: [1, 'x'] })).toThrow(TypeMismatchError);
    });
  });

  describe('range', () => {
    it('should build inclusive int ranges in both directions', () => {
      expect(Sequence.range(1, 5).toArray()).toEqual([1, 2, 3, 4, 5]);
      expect(Sequence.range(10, 0, -5).toArray()).toEqual([10, 5, 0]);
      expect(Sequence.range(3, 3).toArray()).toEqual([3]);
      expect(Sequence.range(0, 5, 2).valueTypes.toString()).toBe('int');
    });

    it('should use float for fractional steps', () => {
      const seq = Sequence.range(0, 1, 0.25);
      expect(seq.toArray()).toEqual([0, 0.25, 0.5, 0.75, 1]);
      expect(seq.valueTypes.toString()).toBe('float');
    });

    it('should reject zero and wrong-direction steps', () => {
      expect(() => Sequence.range(0, 5, 0)).toThrow(InvalidArgumentError);
      expect(() => Sequence.range(0, 5, -1)).toThrow('Step -1 never reaches 5 from 0.');
      expect(() => Sequence.range(5, 0, 1)).toThrow(InvalidArgumentError);
    });
  });

  describe('positional access', () => {
    it('should gap-fill with null for ?int', () => {
      const seq = new Sequence<number | null>({ types: '?int' });
      expect(seq.defaultValue).toBeNull();
      seq.append(5);
      seq.set(2, null);
      expect(seq.toArray()).toEqual([5, null, null]);

      seq.set(2, 7);
      expect(seq.toArray()).toEqual([5, null, 7]);
    });

    it('should gap-fill with zeros for inferred int', () => {
      const seq = Sequence.of(1, 2);
      seq.set(5, 9);
      expect(seq.length).toBe(6);
      expect(seq.toArray()).toEqual([1, 2, 0, 0, 0, 9]);
    });

    it('should give every gap slot its own default instance', () => {
      const seq = new Sequence<number[]>({ types: 'array' });
      seq.set(2, [1]);
      seq.get(0).push(42);
      expect(seq.get(1)).toEqual([]);
      expect(seq.defaultValue).toEqual([]);
    });

    it('should not follow later edits to the supplied default', () => {
      const fallback: number[] = [];
      const seq = new Sequence<number[]>({ types: 'array', defaultValue: fallback });
      fallback.push(42);
      seq.defaultValue.push(7);
      seq.set(1, [7]);
      expect(seq.get(0)).toEqual([]);
      expect(seq.defaultValue).toEqual([]);
    });

    it('should reset a slot with unset', () => {
      const seq = Sequence.of('a', 'b');
      seq.unset(0);
      expect(seq.toArray()).toEqual(['', 'b']);
      expect(seq.length).toBe(2);
    });

    it('should reject bad indexes', () => {
      const seq = Sequence.of(1, 2);
      expect(() => seq.get(2)).toThrow(new IndexOutOfRangeError(2, 'Index 2 is out of range.'));
      expect(() => seq.get(-1)).toThrow('Index cannot be negative.');
      expect(() => seq.set(1.5, 3)).toThrow('Index must be an integer.');
      expect(seq.indexExists(1)).toBe(true);
      expect(seq.indexExists(2)).toBe(false);
      expect(seq.indexExists(0.5)).toBe(false);
    });

    it('should read first and last', () => {
      const seq = Sequence.of(4, 5, 6);
      expect(seq.first()).toBe(4);
      expect(seq.last()).toBe(6);
      expect(() => new Sequence({ types: 'int' }).first()).toThrow(IndexOutOfRangeError);
    });
  });

  describe('adding', () => {
    it('should keep the valid prefix of a batched append', () => {
      const seq = new Sequence<unknown>({ types: 'int' });
      expect(() => seq.append(3, 4, 'invalid', 5)).toThrow(TypeMismatchError);
      expect(seq.toArray()).toEqual([3, 4]);
    });

    it('should stop import at the first invalid item', () => {
      const seq = new Sequence<unknown>({ types: 'int', source: [1] });
      expect(() => seq.import([2, 2.5, 3])).toThrow('Disallowed value type: expected int, got float.');
      expect(seq.toArray()).toEqual([1, 2]);
    });

    it('should prepend in argument order', () => {
      const seq = Sequence.of(3);
      seq.prepend(1, 2);
      expect(seq.toArray()).toEqual([1, 2, 3]);
    });

    it('should insert before an index or past the end', () => {
      const seq = Sequence.of(1, 3);
      seq.insert(1, 2);
      expect(seq.toArray()).toEqual([1, 2, 3]);
      seq.insert(5, 6);
      expect(seq.toArray()).toEqual([1, 2, 3, 0, 0, 6]);
    });

    it('should fill a run of positions', () => {
      const seq = Sequence.of(1);
      seq.fill(2, 2, 7);
      expect(seq.toArray()).toEqual([1, 0, 7, 7]);
    });
  });

  describe('removing', () => {
    it('should remove by index and by value', () => {
      const seq = Sequence.of(1, 2, 1, 3);
      expect(seq.removeByIndex(1)).toBe(2);
      expect(seq.removeByValue(1)).toBe(2);
      expect(seq.toArray()).toEqual([3]);
    });

    it('should remove from the ends', () => {
      const seq = Sequence.of('a', 'b', 'c');
      expect(seq.removeFirst()).toBe('a');
      expect(seq.removeLast()).toBe('c');
      expect(seq.toArray()).toEqual(['b']);
      seq.clear();
      expect(() => seq.removeFirst()).toThrow(UnderflowError);
      expect(() => seq.removeLast()).toThrow('No items in the Sequence.');
    });

    it('should remove random elements', () => {
      const seq = Sequence.range(1, 10);
      const removed = seq.removeRand(3);
      expect(removed).toHaveLength(3);
      expect(seq.length).toBe(7);
      for (const value of removed) expect(seq.contains(value)).toBe(false);
      expect(() => seq.removeRand(8)).toThrow(InvalidArgumentError);
    });

    it('should choose random positions without removing', () => {
      const seq = Sequence.of('a', 'b', 'c');
      const picked = seq.chooseRand(2);
      expect(picked).toHaveLength(2);
      expect(picked[0][0]).toBeLessThan(picked[1][0]);
      for (const [index, value] of picked) expect(seq.get(index)).toBe(value);
      expect(seq.length).toBe(3);
    });
  });

  describe('queries', () => {
    it('should use the strict equality rule', () => {
      const seq = new Sequence<unknown>({ types: null, source: [1, '1', [1, 2]] });
      expect(seq.contains(true)).toBe(false);
      expect(seq.contains([1, 2])).toBe(true);
      expect(seq.search('1')).toBe(1);
      expect(seq.search(2)).toBeNull();
      expect(seq.find((item) => typeof item === 'string')).toBe('1');
    });

    it('should compare element-wise and ignore types and defaults', () => {
      const a = new Sequence<number>({ types: 'int', source: [1, 2] });
      const b = new Sequence<number>({ types: 'number', defaultValue: 5, source: [1, 2] });
      expect(a.equals(b)).toBe(true);
      expect(a.equals(Sequence.of(2, 1))).toBe(false);
      expect(a.equals(a.toSet())).toBe(false);
    });

    it('should answer all and any', () => {
      const seq = Sequence.of(2, 4);
      expect(seq.all((n) => n % 2 === 0)).toBe(true);
      expect(seq.any((n) => n > 3)).toBe(true);
      expect(new Sequence({ types: 'int' }).all(() => false)).toBe(true);
    });
  });

  describe('transforms', () => {
    it('should slice, reverse and merge without mutating', () => {
      const seq = Sequence.of(1, 2, 3, 4);
      expect(seq.slice(1, 2).toArray()).toEqual([2, 3]);
      expect(seq.slice(-2).toArray()).toEqual([3, 4]);
      expect(seq.reverse().toArray()).toEqual([4, 3, 2, 1]);
      expect(seq.merge([5]).toArray()).toEqual([1, 2, 3, 4, 5]);
      expect(seq.toArray()).toEqual([1, 2, 3, 4]);
    });

    it('should keep the TypeSet and default on derived sequences', () => {
      const seq = new Sequence<number>({ types: 'int', defaultValue: -1, source: [3, 1] });
      const sorted = seq.sort();
      expect(sorted.toArray()).toEqual([1, 3]);
      expect(sorted.defaultValue).toBe(-1);
      expect(sorted.valueTypes.toString()).toBe('int');
    });

    it('should sort in reverse and by key', () => {
      const words = Sequence.of('ccc', 'a', 'bb');
      expect(words.sortReverse().toArray()).toEqual(['ccc', 'bb', 'a']);
      expect(words.sortBy((w) => w.length).toArray()).toEqual(['a', 'bb', 'ccc']);
      expect(words.sort((x, y) => y.length - x.length).toArray()).toEqual(['ccc', 'bb', 'a']);
    });

    it('should chunk', () => {
      const chunks = Sequence.range(1, 5).chunk(2);
      expect(chunks.map((c) => c.toArray())).toEqual([[1, 2], [3, 4], [5]]);
      expect(() => Sequence.of(1).chunk(0)).toThrow('Chunk size must be a positive integer.');
    });

    it('should filter, map and keep unique values', () => {
      const seq = Sequence.of(1, 2, 2, 3, 1);
      expect(seq.filter((n) => n > 1).toArray()).toEqual([2, 2, 3]);
      expect(seq.unique().toArray()).toEqual([1, 2, 3]);

      const labels = seq.map((n) => `#${n}`);
      expect(labels.valueTypes.toString()).toBe('string');
      expect(labels.toArray()).toEqual(['#1', '#2', '#2', '#3', '#1']);
    });

    it('should treat equal arrays as duplicates in unique', () => {
      const seq = new Sequence<number[]>({ types: 'array', source: [[1], [1], [2]] });
      expect(seq.unique().toArray()).toEqual([[1], [2]]);
    });

    it('should reject merged items outside the TypeSet', () => {
      const seq = new Sequence<unknown>({ types: 'int', source: [1] });
      expect(() => seq.merge(['x'])).toThrow(TypeMismatchError);
    });

    it('should count values', () => {
      const counts = Sequence.of('a', 'b', 'a').countValues();
      expect(counts.entries()).toEqual([
        ['a', 2],
        ['b', 1],
      ]);
      expect(counts.valueTypes.toString()).toBe('uint');
    });
  });

  describe('aggregates', () => {
    it('should sum, multiply and average numbers', () => {
      const seq = Sequence.of(1, 2, 3, 4);
      expect(seq.sum()).toBe(10);
      expect(seq.product()).toBe(24);
      expect(seq.average()).toBe(2.5);
      expect(seq.min()).toBe(1);
      expect(seq.max()).toBe(4);
      expect(seq.reduce((acc, n) => acc + String(n), '')).toBe('1234');
      expect(seq.join(', ')).toBe('1, 2, 3, 4');
    });

    it('should handle empty sequences', () => {
      const empty = new Sequence<number>({ types: 'int' });
      expect(empty.sum()).toBe(0);
      expect(empty.product()).toBe(1);
      expect(() => empty.min()).toThrow(UnderflowError);
      expect(() => empty.max()).toThrow(UnderflowError);
      expect(() => empty.average()).toThrow('Cannot average an empty Sequence.');
    });

    it('should reject non-numbers', () => {
      expect(() => Sequence.of('a').sum()).toThrow('Disallowed element type: expected number, got string.');
    });
  });

  describe('conversion', () => {
    it('should convert to a dictionary and a set', () => {
      const seq = Sequence.of('x', 'y', 'x');
      expect(seq.toDictionary().entries()).toEqual([
        [0, 'x'],
        [1, 'y'],
        [2, 'x'],
      ]);
      expect(seq.toSet().toArray()).toEqual(['x', 'y']);
    });

    it('should iterate repeatably', () => {
      const seq = Sequence.of(1, 2);
      expect([...seq]).toEqual([1, 2]);
      expect([...seq]).toEqual([1, 2]);
      expect(seq.toString()).toBe('Sequence<int> [1, 2]');
    });
  });

  describe('properties', () => {
    it('should read back what was set, with defaults in the gap', () => {
      fc.assert(
        fc.property(
          fc.array(fc.integer(), { maxLength: 10 }),
          fc.nat({ max: 20 }),
          fc.integer(),
          (initial, index, value) => {
            const seq = new Sequence<number>({ types: 'int', source: initial });
            seq.set(index, value);
            expect(seq.get(index)).toBe(value);
            expect(seq.length).toBe(Math.max(initial.length, index + 1));
            for (let i = initial.length; i < index; i++) expect(seq.get(i)).toBe(0);
          }
        )
      );
    });
  });
});
