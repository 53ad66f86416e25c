import Papa from 'papaparse';
import { rankScores } from '../analyzer/RelscoreEngine';
import { ApproachName, ScoreReport, compareNames } from '../models/CoverageModels';
import { LatexConfig, OutputFormat } from '../config/schema';
import { cellColor, escapeLatex } from './latex';
import { colormapLightHex, normalize } from './LatexColor';

export interface RenderOptions {
    format: OutputFormat;
    latex: LatexConfig;
}

interface RankedRow {
    approach: ApproachName;
    score: number | null;
}

/**
 * One value per approach (relscore, reliability, reach, performance against a
 * reference), best first. Approaches without a defined value come last.
 */
export class ScoreFormatter {
    constructor(private readonly valueLabel: string = 'score') { }

    format(report: ScoreReport, options: RenderOptions): string {
        const rows = this.rank(report);
        switch (options.format) {
            case 'csv':
                return this.formatCsv(rows);
            case 'latex':
                return this.formatLatex(rows, options.latex);
            case 'json':
                return JSON.stringify({ metric: this.valueLabel, results: rows, excluded: report.excluded }, null, 2);
            case 'stdout':
            default:
                return rows.map(row => `${row.approach}: ${this.number(row.score, 'N/A')}`).join('\n');
        }
    }

    private rank(report: ScoreReport): RankedRow[] {
        const ranked: RankedRow[] = rankScores(report.scores).map(([approach, score]) => ({ approach, score }));
        const excluded = [...report.excluded].sort(compareNames).map(approach => ({ approach, score: null }));
        return [...ranked, ...excluded];
    }

    private number(value: number | null, missing: string): string {
        return value === null ? missing : value.toFixed(2);
    }

    private formatCsv(rows: RankedRow[]): string {
        return Papa.unparse({
            fields: ['approach', this.valueLabel],
            data: rows.map(row => [row.approach, this.number(row.score, '')]),
        }, { newline: '\n' });
    }

    private formatLatex(rows: RankedRow[], latex: LatexConfig): string {
        const lines = ['\\begin{tabular}{lr}', `approach & ${escapeLatex(this.valueLabel)} \\\\`];
        if (rows.length === 0) {
            lines.push('\\end{tabular}');
            return lines.join('\n');
        }
        lines.push('\\hline');

        const values = rows.flatMap(row => (row.score === null ? [] : [row.score]));
        const min = values.length > 0 ? Math.min(...values) : 0;
        const max = values.length > 0 ? Math.max(...values) : 0;

        for (const row of rows) {
            let cell = this.number(row.score, 'N/A');
            if (latex.enable_color && row.score !== null) {
                cell = cellColor(colormapLightHex(normalize(row.score, min, max), latex.colormap), cell);
            }
            lines.push(`${escapeLatex(row.approach)} & ${cell} \\\\`);
        }
        lines.push('\\end{tabular}');
        return lines.join('\n');
    }
}
