import Papa from 'papaparse';
import { ResultTable } from '../models/CoverageModels';
import { LatexConfig } from '../config/schema';
import { cellColor, escapeLatex, rotcol, rotcolDefinition } from './latex';
import { colormapLightHex, normalize } from './LatexColor';
import { RenderOptions } from './ScoreFormatter';

const ROW_LABEL = 'approach';
const MIN_NUMBER_WIDTH = 10;

function cellValue(table: ResultTable, row: string, column: string): number | undefined {
    return table.values[row]?.[column];
}

/**
 * Renders approach x approach tables. Rows: measured approach; columns:
 * reference approach (or input corpus).
 */
export class TableFormatter {
    format(table: ResultTable, options: RenderOptions): string {
        switch (options.format) {
            case 'csv':
                return this.formatCsv(table);
            case 'latex':
                return this.formatLatex(table, options.latex);
            case 'json':
                return JSON.stringify(table, null, 2);
            case 'stdout':
            default:
                return this.formatPlain(table);
        }
    }

    private formatPlain(table: ResultTable): string {
        const labelWidth = Math.max(ROW_LABEL.length, ...table.rows.map(row => row.length));
        const numberWidth = Math.max(MIN_NUMBER_WIDTH, ...table.columns.map(column => column.length + 2));

        const lines = [ROW_LABEL.padEnd(labelWidth) + table.columns.map(c => c.padStart(numberWidth)).join('')];
        for (const row of table.rows) {
            const cells = table.columns.map(column => {
                const value = cellValue(table, row, column);
                return (value === undefined ? 'N/A' : value.toFixed(5)).padStart(numberWidth);
            });
            lines.push(row.padEnd(labelWidth) + cells.join(''));
        }
        return lines.join('\n');
    }

    private formatCsv(table: ResultTable): string {
        return Papa.unparse({
            fields: [ROW_LABEL, ...table.columns],
            data: table.rows.map(row => [
                row,
                ...table.columns.map(column => cellValue(table, row, column)?.toFixed(3) ?? ''),
            ]),
        }, { newline: '\n' });
    }

    private formatLatex(table: ResultTable, latex: LatexConfig): string {
        const values = table.rows.flatMap(row =>
            table.columns.flatMap(column => {
                const value = cellValue(table, row, column);
                return value === undefined ? [] : [value];
            }));
        const min = values.length > 0 ? Math.min(...values) : 0;
        const max = values.length > 0 ? Math.max(...values) : 0;

        const lines: string[] = [];
        if (latex.rotate_headers !== undefined) {
            lines.push(...rotcolDefinition(latex.rotate_headers));
        }
        lines.push(`\\begin{tabular}{l${'r'.repeat(table.columns.length)}}`);
        const header = ['', ...table.columns.map(column => rotcol(escapeLatex(column), latex.rotate_headers))];
        lines.push(`${header.join(' & ')} \\\\`);
        lines.push('\\hline');

        for (const row of table.rows) {
            const cells = [escapeLatex(row)];
            for (const column of table.columns) {
                const value = cellValue(table, row, column);
                if (value === undefined) {
                    cells.push('');
                } else if (latex.enable_color) {
                    cells.push(cellColor(colormapLightHex(normalize(value, min, max), latex.colormap), value.toFixed(3)));
                } else {
                    cells.push(value.toFixed(3));
                }
            }
            lines.push(`${cells.join(' & ')} \\\\`);
        }
        lines.push('\\end{tabular}');
        return lines.join('\n');
    }
}
