import { Comparator, Value, compare } from './hash';

/**
 * Base capability of every container in the library.
 * `values()` always returns a fresh array the caller may mutate.
 */
export interface IContainer<T> {
    readonly size: number;
    isEmpty(): boolean;
    clear(): void;
    values(): T[];
    toString(): string;
}

/**
 * Set capability. Cross-set operations accept any ISet, so a HashSet can be
 * combined with a TreeSet (or any other backing) without changing call sites.
 */
export interface ISet<T extends Value> extends IContainer<T>, Iterable<T> {
    /** Inserts the items; duplicates are ignored. */
    add(...items: T[]): void;

    /** Deletes the items that are present; absent ones are ignored. */
    remove(...items: T[]): void;

    /** True iff every item is present. True when called without items. */
    contains(...items: T[]): boolean;

    /** True iff the two sets share at least one element. */
    intersect(other: ISet<T>): boolean;

    intersection(other: ISet<T>): ISet<T>;
    union(other: ISet<T>): ISet<T>;

    /** Elements of this set that are not in `other`. */
    subtract(other: ISet<T>): ISet<T>;
}

/** Snapshot of a container's values, sorted by `comparator`. */
export function sortedValues<T extends Value>(container: IContainer<T>, comparator: Comparator<T> = compare): T[] {
    return container.values().sort(comparator);
}
