/**
 * Usage - the three collection kinds
 */

import { Dictionary, Sequence, TypeMismatchError, ValueSet } from '../packages/core/src/index';

console.log('=== Sequence ===\n');

const seq = new Sequence<number | null>({ types: '?int' });
seq.append(5);
seq.set(2, 7);
console.log('Gap filled with the default:', seq.toArray()); // [5, null, 7]

const ints = Sequence.of(3, 4);
try {
  ints.import([5, 6]);
  ints.append(Number.NaN);
} catch (error) {
  if (error instanceof TypeMismatchError) console.log('Rejected:', error.message);
}
console.log('Kept the valid prefix:', ints.toArray());

console.log('\n=== Dictionary ===\n');

const dict = new Dictionary<number | string | boolean, string>({ keyTypes: 'int|string|bool' });
dict.set(1, 'a').set('1', 'b').set(true, 'c');
console.log('Three distinct keys:', dict.toString());

const grid = new Dictionary<number[], string>({ keyTypes: 'array', valueTypes: 'string' });
grid.set([0, 0], 'origin');
console.log('Array keys by content:', grid.get([0, 0]));

console.log('\n=== ValueSet ===\n');

const set = ValueSet.of(1, 2, 2, 3, 3, 3);
console.log('Distinct values:', set.toString()); // {1, 2, 3}
console.log('Union:', set.union(ValueSet.of(3, 4)).toString());
