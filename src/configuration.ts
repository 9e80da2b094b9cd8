import { Structural, ValueSet } from './value-set';

/** A set of positive integers. Frozen once it belongs to a configuration. */
export type Clique = ValueSet<number>;

function compareLexicographic(a: readonly number[], b: readonly number[]): number {
    const len = Math.min(a.length, b.length);
    for (let i = 0; i < len; i++) {
        if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
}

/**
 * A collection of cliques over the integers 1..n.
 *
 * Equality and hashing treat the configuration as a set of sets: clique order
 * and repeated cliques do not matter. The supplied order is still kept, since
 * rendering and the classifier walk the cliques in that order.
 *
 * Instances are immutable; every clique is copied and frozen on construction.
 */
export class CliqueConfiguration implements Structural {
    readonly #cliques: readonly Clique[];
    readonly #members: ValueSet<Clique>;

    constructor(cliques: Iterable<Iterable<number>>) {
        const copies: Clique[] = [];
        for (const clique of cliques) {
            copies.push(new ValueSet<number>(clique));
        }
        this.#cliques = Object.freeze(copies);
        // Adding each clique hashes it, which freezes it.
        this.#members = new ValueSet<Clique>(copies);
    }

    /** Cliques in the order they were supplied. */
    get cliques(): readonly Clique[] { return this.#cliques; }

    get hashCode(): number { return this.#members.hashCode; }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof CliqueConfiguration)) return false;
        return this.#members.equals(other.#members);
    }

    /** For every integer in some clique, the number of cliques containing it. */
    numberMembership(): Map<number, number> {
        const count = new Map<number, number>();
        for (const clique of this.#cliques) {
            for (const num of clique) {
                count.set(num, (count.get(num) ?? 0) + 1);
            }
        }
        return count;
    }

    /** Every integer appears in one or two cliques. */
    isValid(): boolean {
        for (const c of this.numberMembership().values()) {
            if (c < 1 || c > 2) return false;
        }
        return true;
    }

    /**
     * Drops cliques that are a strict subset of another clique.
     * Equal cliques are not strict subsets of each other, so both stay.
     */
    removeSubsets(): CliqueConfiguration {
        const filtered = this.#cliques.filter((clique, i) =>
            !this.#cliques.some((other, j) => i !== j && clique.isProperSubsetOf(other))
        );
        return new CliqueConfiguration(filtered);
    }

    /** Largest integer in any clique, 0 for an empty configuration. */
    max(): number {
        let max = 0;
        for (const clique of this.#cliques) {
            for (const num of clique) {
                if (num > max) max = num;
            }
        }
        return max;
    }

    /** Distinct cliques as sorted arrays, in lexicographic order. */
    canonical(): number[][] {
        return [...this.#members].map((clique) => clique.sorted()).sort(compareLexicographic);
    }

    toString(): string {
        return `{${this.canonical().map((c) => `{${c.join(', ')}}`).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')](): string { return this.toString(); }
}
