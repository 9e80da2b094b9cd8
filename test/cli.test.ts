import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_UP_TO, HELP_TEXT, main, parseArgs } from '../src/cli';

describe('CLI', () => {
    describe('parseArgs', () => {
        it('defaults to a labelled run up to the default bound', () => {
            expect(parseArgs([])).toEqual({
                command: 'run',
                options: { upTo: DEFAULT_UP_TO, showFullList: false, showSizeLabels: true, colors: undefined },
            });
        });

        it('reads every option', () => {
            expect(parseArgs(['-n', '4', '--full', '--no-labels', '--no-color'])).toEqual({
                command: 'run',
                options: { upTo: 4, showFullList: true, showSizeLabels: false, colors: false },
            });
        });

        it('accepts long forms', () => {
            expect(parseArgs(['--up-to', '6', '-f', '--color'])).toEqual({
                command: 'run',
                options: { upTo: 6, showFullList: true, showSizeLabels: true, colors: true },
            });
        });

        it('parses help', () => {
            expect(parseArgs(['--help'])).toEqual({ command: 'help' });
            expect(parseArgs(['-n', '3', '-h'])).toEqual({ command: 'help' });
        });

        it('rejects a missing bound', () => {
            expect(parseArgs(['--up-to'])).toEqual({ command: 'error', message: '--up-to requires a value' });
        });

        it('rejects a bound that is not a positive integer', () => {
            expect(parseArgs(['-n', '0'])).toEqual({ command: 'error', message: "-n expects a positive integer, got '0'" });
            expect(parseArgs(['-n', 'abc'])).toEqual({ command: 'error', message: "-n expects a positive integer, got 'abc'" });
            expect(parseArgs(['-n', '2.5'])).toEqual({ command: 'error', message: "-n expects a positive integer, got '2.5'" });
        });

        it('rejects unknown arguments', () => {
            expect(parseArgs(['--bogus'])).toEqual({ command: 'error', message: 'Unknown argument: --bogus' });
        });
    });

    describe('main', () => {
        function captureConsole() {
            return {
                log: vi.spyOn(console, 'log').mockImplementation(() => undefined),
                error: vi.spyOn(console, 'error').mockImplementation(() => undefined),
            };
        }

        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('prints the report and succeeds', () => {
            const { log, error } = captureConsole();
            expect(main(['-n', '3', '--no-color'])).toBe(0);
            expect(log).toHaveBeenCalledTimes(17);
            expect(log).toHaveBeenNthCalledWith(1, 'Clique Configuration Generator');
            expect(log).toHaveBeenLastCalledWith('a_3 = 5 = [2 + 2 + 1], expected 3*2 - 1 = 5 ✓');
            expect(error).not.toHaveBeenCalled();
        });

        it('turns colours off when NO_COLOR is set', () => {
            const { log } = captureConsole();
            expect(main(['-n', '1'], { NO_COLOR: '1' })).toBe(0);
            expect(log).toHaveBeenNthCalledWith(5, '  Ending clique breakdown: 1: 1');
        });

        it('prints help', () => {
            const { log } = captureConsole();
            expect(main(['-h'])).toBe(0);
            expect(log).toHaveBeenCalledWith(HELP_TEXT);
        });

        it('fails on bad arguments', () => {
            const { log, error } = captureConsole();
            expect(main(['--bogus'])).toBe(1);
            expect(error).toHaveBeenNthCalledWith(1, 'Error: Unknown argument: --bogus');
            expect(log).not.toHaveBeenCalled();
        });
    });
});
