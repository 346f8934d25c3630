/**
 * @module hashset
 * Generic in-memory sets with Value Semantics.
 * - HashSet: hash-table backed, unspecified iteration order.
 * - TreeSet: red-black tree backed, ascending order.
 * Both implement ISet, so set algebra works across backings.
 */

import { HashSet } from './hash-set';
import { Value } from './hash';

export type { IContainer, ISet } from './containers';
export { sortedValues } from './containers';
export type { Primitive, Structural, Value, Comparator } from './hash';
export { Tuple, getHashCode, areEqual, compare } from './hash';
export type { HashSetOptions } from './hash-set';
export { HashSet, MAX_CAPACITY } from './hash-set';
export { TreeSet } from './tree-set';

/** Creates an empty HashSet. */
export function emptySet<T extends Value>(): HashSet<T> { return new HashSet<T>(); }

/** Creates a HashSet containing a single element. */
export function singleton<T extends Value>(el: T): HashSet<T> { return HashSet.of(el); }
