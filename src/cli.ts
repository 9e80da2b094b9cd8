#!/usr/bin/env node

/**
 * Command-line driver: prints configuration counts for n = 1..N, broken down
 * by ending clique size, and checks a(n+1) = 3 * a(n) - 1.
 */

import { checkRecurrence, summarizeLevels } from './breakdown';
import { renderReport } from './render';

export const DEFAULT_UP_TO = 11;

export interface RunOptions {
    readonly upTo: number;
    readonly showFullList: boolean;
    readonly showSizeLabels: boolean;
    /** Undefined means: decide from the terminal. */
    readonly colors: boolean | undefined;
}

export type ParsedArgs =
    | { readonly command: 'run'; readonly options: RunOptions }
    | { readonly command: 'help' }
    | { readonly command: 'error'; readonly message: string };

export const HELP_TEXT = `
clique-configs - enumerate clique configurations over 1..n

Usage:
  clique-configs [options]

Options:
  --up-to, -n <N>  Highest n to generate (default: ${String(DEFAULT_UP_TO)})
  --full, -f       List every configuration
  --no-labels      Print bare counts without clique sizes
  --color          Force coloured output
  --no-color       Disable coloured output
  --help, -h       Show this help message

Examples:
  clique-configs
  clique-configs --up-to 5 --full
`;

/**
 * Parse CLI arguments.
 *
 * @param args - Command line arguments (without node and script).
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
    let upTo = DEFAULT_UP_TO;
    let showFullList = false;
    let showSizeLabels = true;
    let colors: boolean | undefined;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === '--help' || arg === '-h') {
            return { command: 'help' };
        }

        if (arg === '--full' || arg === '-f') {
            showFullList = true;
            continue;
        }

        if (arg === '--no-labels') {
            showSizeLabels = false;
            continue;
        }

        if (arg === '--no-color') {
            colors = false;
            continue;
        }

        if (arg === '--color') {
            colors = true;
            continue;
        }

        if (arg === '--up-to' || arg === '-n') {
            const next = args[i + 1];
            if (next === undefined) {
                return { command: 'error', message: `${arg} requires a value` };
            }
            const parsed = Number(next);
            if (!/^\d+$/.test(next) || parsed < 1) {
                return { command: 'error', message: `${arg} expects a positive integer, got '${next}'` };
            }
            upTo = parsed;
            i++;
            continue;
        }

        return { command: 'error', message: `Unknown argument: ${arg}` };
    }

    return { command: 'run', options: { upTo, showFullList, showSizeLabels, colors } };
}

/**
 * Main CLI entry point.
 *
 * @returns Exit code: 0 on success, 1 on bad arguments or a failed recurrence check.
 */
export function main(args: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
    const parsed = parseArgs(args);

    switch (parsed.command) {
        case 'help':
            console.log(HELP_TEXT);
            return 0;
        case 'error':
            console.error(`Error: ${parsed.message}`);
            console.error(`Run 'clique-configs --help' for usage.`);
            return 1;
        case 'run':
            break;
    }

    const { options } = parsed;
    const colors = options.colors ?? (process.stdout.isTTY === true && env.NO_COLOR === undefined);

    const summaries = summarizeLevels(options.upTo);
    const checks = checkRecurrence(summaries.map((s) => s.total));
    const lines = renderReport(summaries, checks, {
        colors,
        showFullList: options.showFullList,
        showSizeLabels: options.showSizeLabels,
    });
    for (const line of lines) console.log(line);

    return checks.every((check) => check.holds) ? 0 : 1;
}

// Run if executed directly
if (require.main === module) {
    try {
        process.exitCode = main(process.argv.slice(2));
    } catch (error: unknown) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        console.error(`Error: ${errorMessage}`);
        process.exitCode = 1;
    }
}
