/**
 * Text rendering for configurations and level reports.
 *
 * Everything here is a pure function of finished data; nothing feeds back
 * into generation.
 */

import { LevelSummary, RecurrenceCheck, maxBucketCount } from './breakdown';
import { endingCliqueSize } from './classifier';
import { CliqueConfiguration } from './configuration';

export interface RenderOptions {
    /** Wrap brackets and size labels in ANSI colour codes. */
    readonly colors: boolean;
    /** List every configuration below its level. */
    readonly showFullList: boolean;
    /** Prefix each breakdown count with the clique size it belongs to. */
    readonly showSizeLabels: boolean;
}

const RESET = '\x1b[0m';
const RED = '\x1b[31m';

// green, blue, cyan, magenta, yellow, red, white, grey
const BRACKET_PALETTE = ['\x1b[32m', '\x1b[34m', '\x1b[36m', '\x1b[35m', '\x1b[33m', '\x1b[31m', '\x1b[37m', '\x1b[90m'];

const RULE_WIDTH = 50;

function paint(text: string, code: string, colors: boolean): string {
    return colors ? `${code}${text}${RESET}` : text;
}

/**
 * Draws a configuration on one line, e.g. `[1] (2 (3) 4)`.
 *
 * Each number is printed once, with the opening brackets of the cliques that
 * start at it before and the closing brackets of the cliques that end at it
 * after. Cliques sharing a member with another clique get parentheses, the
 * rest square brackets.
 */
export function visualize(config: CliqueConfiguration, colors: boolean): string {
    const max = config.max();
    if (max === 0) return '';

    const membership = config.numberMembership();
    const cliques = config.cliques;
    const spans = cliques.map((clique) => {
        const members = clique.sorted();
        const shared = members.some((num) => (membership.get(num) ?? 0) > 1);
        return {
            first: members[0],
            last: members[members.length - 1],
            open: shared ? '(' : '[',
            close: shared ? ')' : ']',
        };
    });

    const tokens: string[] = [];
    for (let pos = 1; pos <= max; pos++) {
        let token = '';
        spans.forEach((span, idx) => {
            if (span.first === pos) token += paint(span.open, BRACKET_PALETTE[idx % BRACKET_PALETTE.length], colors);
        });
        token += String(pos);
        spans.forEach((span, idx) => {
            if (span.last === pos) token += paint(span.close, BRACKET_PALETTE[idx % BRACKET_PALETTE.length], colors);
        });
        tokens.push(token);
    }
    return tokens.join(' ');
}

function renderLevel(summary: LevelSummary, width: number, options: RenderOptions): string[] {
    const breakdown: string[] = [];
    for (let size = 1; size <= summary.n; size++) {
        const count = summary.bySize.get(size) ?? 0;
        if (count === 0) continue;
        const padded = String(count).padStart(width);
        breakdown.push(options.showSizeLabels ? `${paint(String(size), RED, options.colors)}: ${padded}` : padded);
    }

    const lines = options.showSizeLabels
        ? [
            `n = ${String(summary.n)}: ${String(summary.total)} configurations`,
            `  Ending clique breakdown: ${breakdown.join(', ')}`,
        ]
        : [`n = ${String(summary.n)}: ${String(summary.total)} configurations = ${breakdown.join(', ')}`];

    if (options.showFullList) {
        lines.push('-'.repeat(RULE_WIDTH));
        let i = 1;
        for (const config of summary.configurations) {
            const size = endingCliqueSize(config, summary.n);
            lines.push(`${String(i).padStart(2)}. ${visualize(config, options.colors)}  (ending size: ${String(size)})`);
            i++;
        }
    }
    lines.push('');
    return lines;
}

function renderCheck(check: RecurrenceCheck, previous: number | undefined, summary: LevelSummary, width: number): string {
    const counts: string[] = [];
    for (let size = 1; size <= summary.n; size++) {
        counts.push(String(summary.bySize.get(size) ?? 0).padStart(width));
    }
    const head = `a_${String(check.n)} = ${String(check.actual)} = [${counts.join(' + ')}]`;
    if (check.expected === null || previous === undefined) return head;
    const mark = check.holds ? '✓' : '✗';
    return `${head}, expected 3*${String(previous)} - 1 = ${String(check.expected)} ${mark}`;
}

/**
 * Full driver report: one block per level, then the recurrence table.
 * `checks` must line up with `summaries` index by index.
 */
export function renderReport(
    summaries: readonly LevelSummary[],
    checks: readonly RecurrenceCheck[],
    options: RenderOptions
): string[] {
    const width = String(maxBucketCount(summaries)).length;
    const lines = ['Clique Configuration Generator', '='.repeat(RULE_WIDTH), ''];

    for (const summary of summaries) {
        lines.push(...renderLevel(summary, width, options));
    }

    lines.push('Verifying recurrence relation: a_{n+1} = 3*a_n - 1', '='.repeat(RULE_WIDTH));
    summaries.forEach((summary, i) => {
        const check = checks[i];
        if (check === undefined) return;
        lines.push(renderCheck(check, i > 0 ? summaries[i - 1].total : undefined, summary, width));
    });
    return lines;
}
