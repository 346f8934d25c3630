/**
 * @module hash
 * @description
 * Element capability shared by every set in the library:
 * what may be stored, how it is hashed, how two elements are compared.
 * * Contract: a Structural element must keep its `hashCode` stable while stored.
 */

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Primitive types hashed natively by the engine. */
type Primitive = string | number | boolean;

/**
 * Interface for objects that support Value Semantics.
 * Any object implementing this can be stored in a HashSet or TreeSet.
 */
interface Structural {
    /** Hash code; equal objects must report equal hash codes. */
    readonly hashCode: number;

    /** Checks value equality with another object. */
    equals(other: unknown): boolean;
}

/** Anything a set can hold. */
type Value = Primitive | Structural;

/** Total ordering over elements: negative, zero or positive. */
type Comparator<T> = (a: T, b: T) => number;

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

const FNV_PRIME = 16777619;
const FNV_OFFSET = 2166136261;

const NAN_HASH = 0x7ff80000;
const TRUE_HASH = 1231;
const FALSE_HASH = 1237;

const floatBuffer = new ArrayBuffer(8);
const view = new DataView(floatBuffer);

function hashNumber(val: number): number {
    if (Number.isNaN(val)) return NAN_HASH;

    // Integer fast path (covers -0)
    if ((val | 0) === val) {
        let h = val | 0;
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
        return ((h >> 16) ^ h) >>> 0;
    }

    view.setFloat64(0, val, true);
    let h = FNV_OFFSET;
    h ^= view.getInt32(0, true);
    h = Math.imul(h, FNV_PRIME);
    h ^= view.getInt32(4, true);
    h = Math.imul(h, FNV_PRIME);
    return h >>> 0;
}

function hashString(str: string): number {
    let h = FNV_OFFSET;
    const len = str.length;
    for (let i = 0; i < len; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

/**
 * Computes a 32-bit hash code for a given value.
 * - Numbers: integer bit mixing, IEEE-754 words for fractions.
 * - Strings: FNV-1a.
 * - Objects: delegates to `.hashCode`.
 */
function getHashCode(val: Value): number {
    if (typeof val === 'number') return hashNumber(val);
    if (typeof val === 'string') return hashString(val);
    if (typeof val === 'boolean') return val ? TRUE_HASH : FALSE_HASH;
    return val.hashCode | 0;
}

/**
 * Value equality between two elements.
 * Primitives use SameValueZero (NaN equals NaN, 0 equals -0).
 */
function areEqual(a: Value, b: Value): boolean {
    if (a === b) return true;
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    return false;
}

// ============================================================================
// 3. ORDERING
// ============================================================================

function kindScore(v: Value): number {
    switch (typeof v) {
        case 'number': return 1;
        case 'string': return 2;
        case 'boolean': return 3;
        default: return 4;
    }
}

/**
 * Global Comparator providing a Total Ordering.
 * Used by TreeSet and for sorted output.
 * * Logic:
 * 1. Identity check.
 * 2. Kind segregation (Numbers < Strings < Booleans < Objects).
 * 3. Natural order inside a primitive kind; Tuples element-wise.
 * 4. Hash code, then equality, then rendering for other objects.
 * Unequal objects with the same hash and rendering compare as 0;
 * TreeSet keeps such elements apart through `areEqual`.
 */
function compare(a: Value, b: Value): number {
    if (a === b) return 0;

    if (typeof a === 'number' && typeof b === 'number') {
        const nanA = Number.isNaN(a);
        const nanB = Number.isNaN(b);
        if (nanA || nanB) return nanA === nanB ? 0 : (nanA ? 1 : -1);
        return a < b ? -1 : (a > b ? 1 : 0);
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    if (typeof a === 'boolean' && typeof b === 'boolean') return a ? 1 : -1;

    if (typeof a !== 'object' || typeof b !== 'object') return kindScore(a) - kindScore(b);

    if (a instanceof Tuple && b instanceof Tuple) return compareSequences(a.raw, b.raw);
    if (a instanceof Tuple) return -1;
    if (b instanceof Tuple) return 1;

    const h1 = getHashCode(a);
    const h2 = getHashCode(b);
    if (h1 !== h2) return h1 < h2 ? -1 : 1;
    if (a.equals(b)) return 0;

    // Hash collision between unequal objects; may still tie
    const s1 = String(a);
    const s2 = String(b);
    return s1 < s2 ? -1 : (s1 > s2 ? 1 : 0);
}

/** Compares sequences by length first, then element-wise. */
function compareSequences(a: ReadonlyArray<Value>, b: ReadonlyArray<Value>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compare(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}

/** Renders an element the way containers print it. */
function renderValue(v: Value): string {
    return typeof v === 'object' ? v.toString() : String(v);
}

// ============================================================================
// 4. TUPLE (Immutable)
// ============================================================================

/**
 * An immutable, fixed-length sequence of values.
 * Useful as a composite element, e.g. a coordinate pair.
 * @template T The type of the tuple elements array.
 */
class Tuple<T extends Value[]> implements Structural {
    readonly #elements: ReadonlyArray<Value>;
    readonly #hashCode: number;

    /**
     * Copies the input and freezes the internal store.
     * The hash code is computed once here.
     */
    constructor(...elements: T) {
        this.#elements = Object.freeze(elements.slice());

        let h = 1;
        for (const e of this.#elements) {
            h = (Math.imul(h, 31) + getHashCode(e)) | 0;
        }
        this.#hashCode = h;
    }

    get length(): number { return this.#elements.length; }
    get raw(): ReadonlyArray<Value> { return this.#elements; }
    get hashCode(): number { return this.#hashCode; }

    /** Returns the element at the specified index. */
    get(index: number): Value | undefined { return this.#elements[index]; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Tuple)) return false;
        if (this.#hashCode !== other.hashCode) return false;
        if (this.length !== other.length) return false;

        const theirs = other.raw;
        for (let i = 0; i < this.length; i++) {
            if (!areEqual(this.#elements[i], theirs[i])) return false;
        }
        return true;
    }

    toString(): string {
        return `(${this.#elements.map(renderValue).join(', ')})`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

export type {
    Primitive,
    Structural,
    Value,
    Comparator
};

export {
    Tuple,
    getHashCode,
    areEqual,
    compare,
    compareSequences,
    renderValue
};
