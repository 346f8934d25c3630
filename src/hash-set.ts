import { ISet } from './containers';
import { Value, areEqual, getHashCode, renderValue } from './hash';

/** Construction options for {@link HashSet}. */
export interface HashSetOptions {
    /** Number of elements the table should hold before its first resize. */
    capacity?: number;
}

const LOAD_FACTOR = 0.75;
const MIN_BUCKETS = 16;
const MAX_BUCKETS = 2 ** 30;

/** Largest number of elements a HashSet can hold. */
export const MAX_CAPACITY = MAX_BUCKETS * LOAD_FACTOR;

function bucketsFor(capacity: number): number {
    if (!Number.isSafeInteger(capacity) || capacity < 0 || capacity > MAX_CAPACITY) {
        throw new RangeError(`Invalid capacity: ${capacity}`);
    }
    let buckets = MIN_BUCKETS;
    while (buckets * LOAD_FACTOR < capacity) buckets *= 2;
    return buckets;
}

/**
 * A Hash Set with Value Semantics.
 *
 * Architecture:
 * - **Dense Storage**: Elements live in a contiguous array (`_values`) for O(n) iteration.
 * - **Sparse Lookup**: A `Uint32Array` (`_indices`) maps hashes to positions in the dense array.
 * - **Open Addressing**: Linear probing for collision resolution.
 *
 * Iteration order is unspecified: removal moves the last element into the gap,
 * so the order may change after any mutation.
 *
 * Not safe for concurrent mutation.
 *
 * @template T The type of elements in the set.
 */
export class HashSet<T extends Value> implements ISet<T> {

    // Dense arrays for fast iteration and data locality
    private _values: T[] = [];
    private _hashes: number[] = [];

    // Sparse array for O(1) lookups (stores index + 1, where 0 means empty)
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;

    constructor(items: Iterable<T> = [], options: HashSetOptions = {}) {
        this._bucketCount = bucketsFor(options.capacity ?? 0);
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
        for (const item of items) this.insert(item);
    }

    /** Creates an empty set. */
    static new<T extends Value>(options?: HashSetOptions): HashSet<T> {
        return new HashSet<T>([], options);
    }

    /** Creates a set holding the given items. */
    static of<T extends Value>(...items: T[]): HashSet<T> {
        return new HashSet<T>(items, { capacity: items.length });
    }

    get size(): number { return this._values.length; }
    isEmpty(): boolean { return this._values.length === 0; }

    /**
     * Grows the lookup table so that `capacity` elements fit without a resize.
     * Never shrinks.
     */
    ensureCapacity(capacity: number): void {
        const target = bucketsFor(capacity);
        if (target <= this._bucketCount) return;

        this._bucketCount = target;
        this._mask = target - 1;

        // Rebuild the lookup table; the dense arrays stay where they are.
        this._indices = new Uint32Array(target);
        for (let i = 0; i < this._hashes.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    add(...items: T[]): void {
        for (const item of items) this.insert(item);
    }

    remove(...items: T[]): void {
        for (const item of items) this.delete(item);
    }

    contains(...items: T[]): boolean {
        for (const item of items) {
            if (this.find(item) < 0) return false;
        }
        return true;
    }

    intersect(other: ISet<T>): boolean {
        for (const item of this._values) {
            if (other.contains(item)) return true;
        }
        return false;
    }

    intersection(other: ISet<T>): HashSet<T> {
        const res = new HashSet<T>();
        for (const item of this._values) {
            if (other.contains(item)) res.insert(item);
        }
        return res;
    }

    union(other: ISet<T>): HashSet<T> {
        const res = new HashSet<T>(this._values, { capacity: this.size + other.size });
        for (const item of other) res.insert(item);
        return res;
    }

    subtract(other: ISet<T>): HashSet<T> {
        const res = new HashSet<T>();
        for (const item of this._values) {
            if (!other.contains(item)) res.insert(item);
        }
        return res;
    }

    /** Drops every element and starts over with a fresh minimum-size table. */
    clear(): void {
        this._values = [];
        this._hashes = [];
        this._bucketCount = MIN_BUCKETS;
        this._mask = MIN_BUCKETS - 1;
        this._indices = new Uint32Array(MIN_BUCKETS);
    }

    values(): T[] {
        return this._values.slice();
    }

    [Symbol.iterator](): Iterator<T> { return this.values()[Symbol.iterator](); }

    toString(): string {
        return `HashSet\n${this._values.map(renderValue).join(', ')}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }

    // ------------------------------------------------------------------------
    // Table internals
    // ------------------------------------------------------------------------

    /** Returns the slot in `_indices` holding `e`, or -1. */
    private find(e: T): number {
        const h = getHashCode(e);
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return -1;

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], e)) return idx;

            idx = (idx + 1) & this._mask;
        }
    }

    private insert(e: T): void {
        const h = getHashCode(e);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) {
                // Grow only once the element is known to be new
                if (this._values.length + 1 > this._bucketCount * LOAD_FACTOR) {
                    this.ensureCapacity(this._values.length + 1);
                    idx = h & this._mask;
                    while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
                }
                this._hashes.push(h);
                this._values.push(e);
                this._indices[idx] = this._values.length; // 1-based
                return;
            }

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], e)) return;

            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Removes an element using "Swap & Pop".
     * 1. Locate the element's slot and repair the probe chain (`removeIndex`).
     * 2. Move the last dense element into the gap and repoint its slot.
     */
    private delete(e: T): void {
        const idx = this.find(e);
        if (idx < 0) return;

        const valIndex = this._indices[idx] - 1;
        this.removeIndex(idx);

        const lastIndex = this._values.length - 1;
        if (valIndex < lastIndex) {
            const lastHash = this._hashes[lastIndex];
            this._values[valIndex] = this._values[lastIndex];
            this._hashes[valIndex] = lastHash;
            this.updateIndexForValue(lastHash, lastIndex + 1, valIndex + 1);
        }
        this._values.pop();
        this._hashes.pop();
    }

    /** Repoints the slot that referred to dense position `oldLoc`. */
    private updateIndexForValue(hash: number, oldLoc: number, newLoc: number): void {
        let idx = hash & this._mask;
        while (this._indices[idx] !== oldLoc) idx = (idx + 1) & this._mask;
        this._indices[idx] = newLoc;
    }

    /**
     * Repairs the probe chain after clearing `holeIdx`.
     * Later entries move back into the hole when they sit farther from
     * their ideal bucket than the hole does.
     */
    private removeIndex(holeIdx: number): void {
        let i = (holeIdx + 1) & this._mask;
        while (this._indices[i] !== 0) {
            const entry = this._indices[i];
            const h = this._hashes[entry - 1];

            const idealIdx = h & this._mask;
            const distToHole = (holeIdx - idealIdx + this._bucketCount) & this._mask;
            const distToI = (i - idealIdx + this._bucketCount) & this._mask;

            if (distToHole < distToI) {
                this._indices[holeIdx] = entry;
                holeIdx = i;
            }
            i = (i + 1) & this._mask;
        }
        this._indices[holeIdx] = 0;
    }
}
