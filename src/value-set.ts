/**
 * @module value-set
 * @description
 * A hash set with Value Semantics (Deep Equality), able to hold sets of sets
 * and any other structure that exposes a hash code and an equality check.
 * * Architecture:
 * - Engine: "Compact Layout" Hash Table (Open Addressing, Linear Probing).
 * - Storage: Dense arrays for data (iteration O(N), insertion order), Uint32Array for slots.
 * - Hashing: Integer bit mixing for numbers, FNV-1a for strings, XOR of scrambled member hashes for sets.
 * - Contract: Accessing .hashCode freezes the set (Immutable-after-Hash).
 */

import { FrozenSetError } from './errors';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/** Primitive types supported by the engine (string and number). */
export type Primitive = string | number;

/**
 * Interface for objects that support Value Semantics.
 * Anything implementing this can be stored in a ValueSet.
 */
export interface Structural {
    /**
     * Returns the hash code of the object.
     * SIDE EFFECT: implementations backed by a ValueSet freeze it, so the hash stays stable.
     */
    readonly hashCode: number;

    /** Checks deep equality with another object. */
    equals(other: unknown): boolean;
}

export type Value = Primitive | Structural;

// ============================================================================
// 2. HASH ENGINE
// ============================================================================

/**
 * Computes a 32-bit hash code for a given value.
 * - Numbers: Integer bit mixing.
 * - Strings: FNV-1a.
 * - Objects: Delegates to `.hashCode`.
 */
export function getHashCode(val: Value): number {
    if (typeof val === 'number') {
        let h = val | 0;
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        h = Math.imul((h >>> 16) ^ h, 0x45d9f3b);
        return (h >>> 16) ^ h;
    }
    if (typeof val === 'string') {
        let h = 0x811c9dc5;
        for (let i = 0; i < val.length; i++) {
            h ^= val.charCodeAt(i);
            h = Math.imul(h, 0x01000193);
        }
        return h;
    }
    // Recursive Structures: Accessing .hashCode triggers Freeze!
    return val.hashCode;
}

/**
 * Murmur3 finalizer. Set hashes XOR their members' hashes through this, so
 * nested sets do not cancel out: {{1}, {2}} and {{1, 2}} must hash apart.
 */
function scramble(h: number): number {
    h ^= h >>> 16;
    h = Math.imul(h, 0x85ebca6b);
    h ^= h >>> 13;
    h = Math.imul(h, 0xc2b2ae35);
    return h ^ (h >>> 16);
}

function areEqual(a: Value, b: Value): boolean {
    if (a === b) return true;
    if (typeof a === 'object' && typeof b === 'object') return a.equals(b);
    return false;
}

/**
 * Global Comparator providing a Total Ordering over sets and primitives.
 * Used for sorted output (toString) and for ordering nested sets.
 * * Logic:
 * 1. Identity check.
 * 2. Type segregation (Numbers < Strings < Objects).
 * 3. Hash code comparison (O(1) fast path).
 * 4. Deep recursive comparison for colliding sets, text form for other colliding structures.
 */
export function compare(a: Value, b: Value): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;

    const typeA = typeof a;
    const typeB = typeof b;
    if (typeA !== typeB) {
        const scoreA = (typeA === 'number') ? 1 : (typeA === 'string' ? 2 : 3);
        const scoreB = (typeB === 'number') ? 1 : (typeB === 'string' ? 2 : 3);
        return scoreA - scoreB;
    }

    // HASH SHORTCUT (O(1))
    const h1 = getHashCode(a);
    const h2 = getHashCode(b);
    if (h1 !== h2) return h1 < h2 ? -1 : 1;

    // COLLISION RESOLUTION (Slow, but rare)
    if (a instanceof ValueSet && b instanceof ValueSet) return a.compare(b);
    if (areEqual(a, b)) return 0;
    const sa = String(a);
    const sb = String(b);
    if (sa === sb) return 0;
    return sa < sb ? -1 : 1;
}

function compareSequences(a: ReadonlyArray<Value>, b: ReadonlyArray<Value>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compare(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}

// ============================================================================
// 3. VALUE SET
// ============================================================================

/**
 * A Hash Set focused on fast iteration and Value Semantics.
 *
 * - **Dense Storage**: Elements live in a contiguous array (`_values`), so
 *   iteration follows insertion order of first occurrence.
 * - **Sparse Lookup**: A `Uint32Array` (`_indices`) maps hashes to positions in the dense array.
 * - **Open Addressing**: Linear probing for collisions.
 *
 * @template T The type of elements in the set.
 */
export class ValueSet<T extends Value> implements Structural, Iterable<T> {

    private _values: T[] = [];
    private _hashes: number[] = [];

    // Sparse array for O(1) lookups (stores index + 1, where 0 means empty)
    private _indices: Uint32Array;

    private _bucketCount: number;
    private _mask: number;
    private _xorHash = 0;

    private _isFrozen = false;
    private readonly LOAD_FACTOR = 0.75;
    private readonly MIN_BUCKETS = 16;

    constructor(initialData: Iterable<T> = []) {
        const items = Array.from(initialData);
        this._bucketCount = this.MIN_BUCKETS;
        const target = Math.ceil(items.length / this.LOAD_FACTOR);
        while (this._bucketCount <= target) this._bucketCount <<= 1;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);
        for (const item of items) this.add(item);
    }

    static compare(a: Value, b: Value): number { return compare(a, b); }

    get size(): number { return this._values.length; }
    get isFrozen(): boolean { return this._isFrozen; }

    /**
     * Returns the order-independent hash code (XOR of scrambled member hashes).
     * @warning **Side Effect**: Freezes the set to guarantee hash stability.
     */
    get hashCode(): number {
        this._isFrozen = true;
        return this._xorHash;
    }

    private grow(): void {
        this._bucketCount <<= 1;
        this._mask = this._bucketCount - 1;

        // Rebuild the lookup table only; dense storage stays where it is.
        this._indices = new Uint32Array(this._bucketCount);
        for (let i = 0; i < this._hashes.length; i++) {
            let idx = this._hashes[i] & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    /**
     * Inserts an element unless an equal one is present.
     * @returns true if the element was new.
     */
    add(e: T): boolean {
        if (this._isFrozen) throw new FrozenSetError('add to');
        if (this._values.length >= this._bucketCount * this.LOAD_FACTOR) this.grow();

        const h = getHashCode(e);
        let idx = h & this._mask;

        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) {
                this._hashes.push(h);
                this._values.push(e);
                this._indices[idx] = this._values.length;
                this._xorHash ^= scramble(h);
                return true;
            }

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], e)) return false;

            idx = (idx + 1) & this._mask;
        }
    }

    has(element: T): boolean {
        const h = getHashCode(element);
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;

            const valIndex = entry - 1;
            if (this._hashes[valIndex] === h && areEqual(this._values[valIndex], element)) return true;

            idx = (idx + 1) & this._mask;
        }
    }

    /** Returns an unfrozen copy with the same members in the same order. */
    clone(): ValueSet<T> {
        return new ValueSet<T>(this._values);
    }

    /** True iff every member of this set is in `other` and `other` has more members. */
    isProperSubsetOf(other: ValueSet<T>): boolean {
        if (this.size >= other.size) return false;
        for (const v of this._values) {
            if (!other.has(v)) return false;
        }
        return true;
    }

    [Symbol.iterator](): Iterator<T> { return this._values[Symbol.iterator](); }

    /** Members sorted by the global comparator. */
    sorted(): T[] {
        return [...this._values].sort(compare);
    }

    compare(other: ValueSet<Value>): number {
        if (this === other) return 0;
        if (this.hashCode !== other.hashCode) return this.hashCode < other.hashCode ? -1 : 1;
        return compareSequences(this.sorted(), other.sorted());
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof ValueSet)) return false;
        if (this.size !== other.size) return false;
        if (this.hashCode !== other.hashCode) return false;
        for (const v of this._values) { if (!other.has(v)) return false; }
        return true;
    }

    toString(): string {
        return `{${this.sorted().map(String).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')](): string { return this.toString(); }
}

/** Creates a ValueSet containing a single element. */
export function singleton<T extends Value>(el: T): ValueSet<T> { return new ValueSet<T>([el]); }
