import { ScoreFormatter, RenderOptions } from '../ScoreFormatter';
import { DEFAULT_CONFIG, OutputFormat } from '../../config/schema';
import { ScoreReport } from '../../models/CoverageModels';

function options(format: OutputFormat, enableColor: boolean = false): RenderOptions {
    return { format, latex: { ...DEFAULT_CONFIG.output.latex, enable_color: enableColor } };
}

describe('ScoreFormatter', () => {
    const report: ScoreReport = {
        scores: { fuzzer_a: 0.5, fuzzer_b: 0, fuzzer_c: 1 },
        excluded: ['idle'],
    };
    const formatter = new ScoreFormatter();

    it('prints one ranked line per approach', () => {
        expect(formatter.format(report, options('stdout'))).toBe(
            'fuzzer_c: 1.00\nfuzzer_a: 0.50\nfuzzer_b: 0.00\nidle: N/A'
        );
    });

    it('writes CSV with an empty cell for excluded approaches', () => {
        expect(formatter.format(report, options('csv'))).toBe(
            'approach,score\nfuzzer_c,1.00\nfuzzer_a,0.50\nfuzzer_b,0.00\nidle,'
        );
    });

    it('uses its value label as the column name', () => {
        const csv = new ScoreFormatter('reliability').format({ scores: { afl: 1 }, excluded: [] }, options('csv'));
        expect(csv).toBe('approach,reliability\nafl,1.00');
    });

    it('renders a LaTeX tabular', () => {
        expect(formatter.format(report, options('latex')).split('\n')).toEqual([
            '\\begin{tabular}{lr}',
            'approach & score \\\\',
            '\\hline',
            'fuzzer\\_c & 1.00 \\\\',
            'fuzzer\\_a & 0.50 \\\\',
            'fuzzer\\_b & 0.00 \\\\',
            'idle & N/A \\\\',
            '\\end{tabular}',
        ]);
    });

    it('colors LaTeX cells between the lowest and highest score', () => {
        const lines = formatter.format(report, options('latex', true)).split('\n');
        expect(lines[3]).toBe('fuzzer\\_c & \\cellcolor[HTML]{FEF8BE}{1.00} \\\\');
        expect(lines[5]).toBe('fuzzer\\_b & \\cellcolor[HTML]{C7B3CC}{0.00} \\\\');
        expect(lines[6]).toBe('idle & N/A \\\\');
    });

    it('emits JSON with null for excluded approaches', () => {
        expect(JSON.parse(formatter.format(report, options('json')))).toEqual({
            metric: 'score',
            results: [
                { approach: 'fuzzer_c', score: 1 },
                { approach: 'fuzzer_a', score: 0.5 },
                { approach: 'fuzzer_b', score: 0 },
                { approach: 'idle', score: null },
            ],
            excluded: ['idle'],
        });
    });
});
