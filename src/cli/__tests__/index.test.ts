import fs from 'fs';
import os from 'os';
import path from 'path';
import { CliOptions, applyCliOptions, main } from '../index';
import { DEFAULT_CONFIG, DiffCovConfig } from '../../config/schema';
import { setLogLevel } from '../../utils/logger';

jest.mock('../../utils/logger');

const FIXTURE = path.join(__dirname, '../../__fixtures__/sample_campaign');

function run(...args: string[]): Promise<number> {
    return main(['node', 'diffcov', ...args]);
}

function freshConfig(): DiffCovConfig {
    return {
        relcov: { ...DEFAULT_CONFIG.relcov },
        filters: { include: [], exclude: [] },
        reader: { ...DEFAULT_CONFIG.reader },
        output: { ...DEFAULT_CONFIG.output, latex: { ...DEFAULT_CONFIG.output.latex } },
        logging: { ...DEFAULT_CONFIG.logging },
    };
}

describe('CLI index.ts', () => {
    let consoleLogSpy: jest.SpyInstance;
    let consoleErrorSpy: jest.SpyInstance;

    beforeEach(() => {
        jest.clearAllMocks();
        consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => { });
        consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => { });
        jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
        jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('commands', () => {
        it('prints relscore rankings', async () => {
            expect(await run('relscore', FIXTURE)).toBe(0);
            expect(consoleLogSpy).toHaveBeenCalledWith('fuzzer_c: 3.00\nfuzzer_a: 1.50\nfuzzer_b: 1.00\nseeds: 0.00');
        });

        it('accepts repeated filters after the subcommand', async () => {
            expect(await run('relscore', FIXTURE, '-x', '^seeds$', '-x', '^nothing$')).toBe(0);
            expect(consoleLogSpy).toHaveBeenCalledWith('fuzzer_c: 1.00\nfuzzer_a: 0.50\nfuzzer_b: 0.00');
        });

        it('prints the relcov table as CSV', async () => {
            expect(await run('-o', 'csv', '-i', '^fuzzer_', 'relcov', FIXTURE)).toBe(0);
            expect(consoleLogSpy).toHaveBeenCalledWith([
                'approach,fuzzer_a,fuzzer_b,fuzzer_c',
                'fuzzer_a,0.667,0.750,0.667',
                'fuzzer_b,0.667,1.000,0.667',
                'fuzzer_c,1.000,1.000,1.000',
            ].join('\n'));
        });

        it('switches reducers per run', async () => {
            expect(await run('relcov', FIXTURE, '-i', '^fuzzer_', '--single', 'fuzzer_a', '--collection-reducer', 'intersection')).toBe(0);
            // intersection of fuzzer_a's trials is {1}
            expect(consoleLogSpy).toHaveBeenCalledWith('fuzzer_b: 1.00\nfuzzer_c: 1.00');
        });

        it('prints reliability', async () => {
            expect(await run('reliability', FIXTURE, '-i', 'fuzzer')).toBe(0);
            expect(consoleLogSpy).toHaveBeenCalledWith('fuzzer_b: 1.00\nfuzzer_c: 1.00\nfuzzer_a: 0.67');
        });

        it('prints reach against one corpus', async () => {
            expect(await run('reach', FIXTURE, '--single', 'seeds')).toBe(0);
            expect(consoleLogSpy).toHaveBeenCalledWith('fuzzer_b: 0.50\nfuzzer_a: 0.33\nfuzzer_c: 0.33');
        });

        it('renders LaTeX with rotated headers', async () => {
            expect(await run('reach', FIXTURE, '-o', 'latex', '--latex-rotate-headers', '90')).toBe(0);
            const output = String(consoleLogSpy.mock.calls[0][0]);
            expect(output).toContain('\\newcommand*\\rotcol{\\multicolumn{1}{R{90}{1em}}}%');
            expect(output).toContain(' & \\rotcol{seeds} \\\\');
        });
    });

    describe('output file', () => {
        const tmpRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'diffcov-cli-'));

        afterAll(() => {
            fs.rmSync(tmpRoot, { recursive: true, force: true });
        });

        it('writes the result instead of printing it', async () => {
            const target = path.join(tmpRoot, 'scores.csv');
            expect(await run('relscore', FIXTURE, '-o', 'csv', '-f', target, '-x', 'seeds')).toBe(0);

            expect(consoleLogSpy).not.toHaveBeenCalled();
            expect(fs.readFileSync(target, 'utf-8')).toBe('approach,score\nfuzzer_c,1.00\nfuzzer_a,0.50\nfuzzer_b,0.00\n');
        });
    });

    describe('failures', () => {
        it('prints the error and exits 1 for an unknown reference', async () => {
            expect(await run('relcov', FIXTURE, '--single', 'nobody')).toBe(1);
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                "Error: Approach 'nobody' not found in campaign (it may have been excluded)"
            );
        });

        it('exits 1 for an unknown reducer', async () => {
            expect(await run('relcov', FIXTURE, '--value-reducer', 'mode')).toBe(1);
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                "Error: Unknown value reducer 'mode'. Supported: median, min, max, mean"
            );
        });

        it('exits 1 when no corpus exists for reach', async () => {
            expect(await run('reach', FIXTURE, '-x', 'seeds')).toBe(1);
            expect(consoleErrorSpy).toHaveBeenCalledWith(
                'Error: No input corpus found: no approach has exactly one trial'
            );
        });

        it('exits 1 for a missing campaign directory', async () => {
            expect(await run('relscore', path.join(FIXTURE, 'missing'))).toBe(1);
        });

        it('exits 1 for an unknown output format', async () => {
            expect(await run('relscore', FIXTURE, '-o', 'html')).toBe(1);
            expect(consoleLogSpy).not.toHaveBeenCalled();
        });

        it('shows help and exits 1 without a subcommand', async () => {
            expect(await run()).toBe(1);
        });

        it('exits 0 for --version', async () => {
            expect(await run('--version')).toBe(0);
        });
    });

    describe('verbose', () => {
        it('raises the log level and prints diagnostics to stderr', async () => {
            expect(await run('reliability', FIXTURE, '-v')).toBe(0);

            expect(setLogLevel).toHaveBeenCalledWith('debug');
            const diagnostics = consoleErrorSpy.mock.calls.map(call => String(call[0])).join('\n');
            expect(diagnostics).toContain('STARTUP DIAGNOSTICS');
            expect(diagnostics).toContain('   Value Reducer: median');
        });
    });
});

describe('applyCliOptions', () => {
    const noFilters: CliOptions = { includeApproach: [], excludeApproach: [] };

    it('leaves the config alone without flags', () => {
        expect(applyCliOptions(freshConfig(), noFilters)).toEqual(DEFAULT_CONFIG);
    });

    it('maps flags onto config sections', () => {
        const config = applyCliOptions(freshConfig(), {
            includeApproach: ['afl'],
            excludeApproach: ['seeds'],
            output: 'latex',
            latexEnableColor: true,
            latexColormap: 'magma',
            latexRotateHeaders: 45,
            outFile: 'out.tex',
            valueReducer: 'mean',
            collectionReducer: 'intersection',
            verbose: true,
        });

        expect(config.filters).toEqual({ include: ['afl'], exclude: ['seeds'] });
        expect(config.output).toEqual({
            format: 'latex',
            file: 'out.tex',
            latex: { enable_color: true, colormap: 'magma', rotate_headers: 45 },
        });
        expect(config.relcov.value_reducer).toBe('mean');
        expect(config.relcov.collection_reducer).toBe('intersection');
        expect(config.logging).toEqual({ level: 'debug', verbose: true });
    });

    it('keeps config filters when no flag is given', () => {
        const config = freshConfig();
        config.filters.exclude = ['^seeds$'];
        expect(applyCliOptions(config, noFilters).filters.exclude).toEqual(['^seeds$']);
    });
});
