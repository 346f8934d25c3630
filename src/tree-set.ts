import createTree from 'functional-red-black-tree';

import { ISet } from './containers';
import { Comparator, Value, areEqual, compare, renderValue } from './hash';

// Each node holds the elements the comparator ranks equal, in insertion order.
type Tree<T> = ReturnType<typeof createTree<T, T[]>>;

/**
 * Ordered set backed by a persistent red-black tree.
 * Elements are kept in ascending `comparator` order. Membership uses the
 * same value equality as HashSet, so elements the comparator cannot tell
 * apart are still kept apart when they are not equal.
 *
 * @template T The type of elements in the set.
 */
export class TreeSet<T extends Value> implements ISet<T> {
    readonly comparator: Comparator<T>;
    private _tree: Tree<T>;
    private _size = 0;

    constructor(items: Iterable<T> = [], comparator: Comparator<T> = compare) {
        this.comparator = comparator;
        this._tree = createTree<T, T[]>(comparator);
        for (const item of items) this.insert(item);
    }

    static new<T extends Value>(comparator?: Comparator<T>): TreeSet<T> {
        return new TreeSet<T>([], comparator);
    }

    static of<T extends Value>(...items: T[]): TreeSet<T> {
        return new TreeSet<T>(items);
    }

    get size(): number { return this._size; }
    isEmpty(): boolean { return this._size === 0; }

    add(...items: T[]): void {
        for (const item of items) this.insert(item);
    }

    remove(...items: T[]): void {
        for (const item of items) this.delete(item);
    }

    contains(...items: T[]): boolean {
        return items.every(item => this.has(item));
    }

    intersect(other: ISet<T>): boolean {
        return this.values().some(item => other.contains(item));
    }

    intersection(other: ISet<T>): TreeSet<T> {
        return new TreeSet<T>(this.values().filter(item => other.contains(item)), this.comparator);
    }

    union(other: ISet<T>): TreeSet<T> {
        const res = new TreeSet<T>(this.values(), this.comparator);
        for (const item of other) res.insert(item);
        return res;
    }

    subtract(other: ISet<T>): TreeSet<T> {
        return new TreeSet<T>(this.values().filter(item => !other.contains(item)), this.comparator);
    }

    clear(): void {
        this._tree = createTree<T, T[]>(this.comparator);
        this._size = 0;
    }

    /** Elements in ascending order. */
    values(): T[] {
        const out: T[] = [];
        this._tree.forEach((_key, bucket) => {
            out.push(...bucket);
        });
        return out;
    }

    /** Smallest element, or undefined when empty. */
    first(): T | undefined {
        const bucket = this._tree.begin.value;
        return bucket === undefined ? undefined : bucket[0];
    }

    /** Largest element, or undefined when empty. */
    last(): T | undefined {
        const bucket = this._tree.end.value;
        return bucket === undefined ? undefined : bucket[bucket.length - 1];
    }

    [Symbol.iterator](): Iterator<T> { return this.values()[Symbol.iterator](); }

    toString(): string {
        return `TreeSet\n${this.values().map(renderValue).join(', ')}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    private has(e: T): boolean {
        const bucket = this._tree.get(e);
        return bucket !== undefined && bucket.some(x => areEqual(x, e));
    }

    private insert(e: T): void {
        const bucket = this._tree.get(e);
        if (bucket === undefined) {
            this._tree = this._tree.insert(e, [e]);
        } else if (bucket.some(x => areEqual(x, e))) {
            return;
        } else {
            bucket.push(e);
        }
        this._size++;
    }

    private delete(e: T): void {
        const bucket = this._tree.get(e);
        if (bucket === undefined) return;

        const at = bucket.findIndex(x => areEqual(x, e));
        if (at < 0) return;

        if (bucket.length === 1) {
            this._tree = this._tree.remove(e);
        } else {
            bucket.splice(at, 1);
        }
        this._size--;
    }
}
