import { endingCliqueSize } from './classifier';
import { CliqueConfiguration } from './configuration';
import { InvalidCliqueCountError } from './errors';
import { generateCliques, nextLevel } from './generator';
import { ValueSet } from './value-set';

export interface LevelSummary {
    readonly n: number;
    readonly configurations: ValueSet<CliqueConfiguration>;
    readonly total: number;
    /** Ending clique size -> number of configurations, sizes ascending. */
    readonly bySize: ReadonlyMap<number, number>;
}

export interface RecurrenceCheck {
    readonly n: number;
    readonly actual: number;
    /** 3 * a(n-1) - 1, or null for the first level. */
    readonly expected: number | null;
    readonly holds: boolean;
}

export function tabulateEndingSizes(configs: Iterable<CliqueConfiguration>, n: number): Map<number, number> {
    const counts = new Map<number, number>();
    for (const config of configs) {
        const size = endingCliqueSize(config, n);
        counts.set(size, (counts.get(size) ?? 0) + 1);
    }
    return new Map([...counts].sort(([a], [b]) => a - b));
}

/** Generates and tabulates every level from 1 to upTo, each level built from the one before. */
export function summarizeLevels(upTo: number): LevelSummary[] {
    if (!Number.isInteger(upTo) || upTo < 1) throw new InvalidCliqueCountError(upTo);

    const summaries: LevelSummary[] = [];
    let configurations = generateCliques(1);
    for (let n = 1; n <= upTo; n++) {
        if (n > 1) configurations = n === 2 ? generateCliques(2) : nextLevel(configurations, n);
        summaries.push({
            n,
            configurations,
            total: configurations.size,
            bySize: tabulateEndingSizes(configurations, n),
        });
    }
    return summaries;
}

/** Checks a(n+1) = 3 * a(n) - 1 against totals listed from n = 1. */
export function checkRecurrence(totals: readonly number[]): RecurrenceCheck[] {
    return totals.map((actual, i) => {
        if (i === 0) return { n: 1, actual, expected: null, holds: true };
        const expected = 3 * totals[i - 1] - 1;
        return { n: i + 1, actual, expected, holds: actual === expected };
    });
}

/** The largest single per-size count across all levels; 0 when there are none. */
export function maxBucketCount(summaries: readonly LevelSummary[]): number {
    let max = 0;
    for (const summary of summaries) {
        for (const count of summary.bySize.values()) {
            if (count > max) max = count;
        }
    }
    return max;
}
