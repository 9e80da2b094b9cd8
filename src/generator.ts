import { CliqueConfiguration } from './configuration';
import { CliqueInvariantError, InvalidCliqueCountError } from './errors';
import { ValueSet, singleton } from './value-set';

/** The integers lo..hi as a clique. */
function range(lo: number, hi: number): ValueSet<number> {
    const clique = new ValueSet<number>();
    for (let i = lo; i <= hi; i++) clique.add(i);
    return clique;
}

/**
 * Throws CliqueInvariantError unless every integer 1..n sits in one or two
 * cliques and no clique is a strict subset of another.
 */
export function assertWellFormed(config: CliqueConfiguration, n: number): void {
    const membership = config.numberMembership();
    for (let i = 1; i <= n; i++) {
        const count = membership.get(i) ?? 0;
        if (count < 1 || count > 2) {
            throw new CliqueInvariantError(config.toString(), `${String(i)} appears in ${String(count)} cliques`);
        }
    }
    if (membership.size !== n) {
        throw new CliqueInvariantError(config.toString(), `contains integers outside 1..${String(n)}`);
    }
    const cliques = config.cliques;
    for (let i = 0; i < cliques.length; i++) {
        for (let j = 0; j < cliques.length; j++) {
            if (i !== j && cliques[i].isProperSubsetOf(cliques[j])) {
                throw new CliqueInvariantError(config.toString(), `${cliques[i].toString()} is a subset of ${cliques[j].toString()}`);
            }
        }
    }
}

/**
 * The n candidates grown from one configuration of n - 1: the singleton {n},
 * then the ranges {i..n} for i = n-1 down to 1. Subsets are already removed.
 */
function extensions(parent: CliqueConfiguration, n: number): CliqueConfiguration[] {
    const candidates = [new CliqueConfiguration([...parent.cliques, singleton(n)])];
    for (let i = n - 1; i >= 1; i--) {
        candidates.push(new CliqueConfiguration([...parent.cliques, range(i, n)]));
    }
    return candidates.map((candidate) => candidate.removeSubsets());
}

/** The base levels n = 1 and n = 2. */
function baseLevel(n: 1 | 2): ValueSet<CliqueConfiguration> {
    if (n === 1) {
        return new ValueSet([new CliqueConfiguration([[1]])]);
    }
    return new ValueSet([
        new CliqueConfiguration([[1], [2]]),
        new CliqueConfiguration([[1, 2]]),
    ]);
}

/**
 * Builds level n (n >= 3) from the complete level n - 1: every parent is extended in n
 * ways, the candidates are reduced, deduplicated and filtered to those where
 * every integer sits in one or two cliques.
 *
 * @throws InvalidCliqueCountError if n is not an integer of at least 2.
 */
export function nextLevel(previous: Iterable<CliqueConfiguration>, n: number): ValueSet<CliqueConfiguration> {
    if (!Number.isInteger(n) || n < 2) throw new InvalidCliqueCountError(n);
    const pool = new ValueSet<CliqueConfiguration>();
    for (const parent of previous) {
        for (const candidate of extensions(parent, n)) pool.add(candidate);
    }

    const valid = new ValueSet<CliqueConfiguration>();
    for (const config of pool) {
        if (!config.isValid()) continue;
        assertWellFormed(config, n);
        valid.add(config);
    }
    return valid;
}

/**
 * Generates every valid clique configuration over 1..n.
 * Iteration order is the order of first occurrence.
 *
 * @throws InvalidCliqueCountError if n is not a positive integer.
 */
export function generateCliques(n: number): ValueSet<CliqueConfiguration> {
    if (!Number.isInteger(n) || n < 1) throw new InvalidCliqueCountError(n);
    if (n === 1 || n === 2) return baseLevel(n);
    return nextLevel(generateCliques(n - 1), n);
}
