const LATEX_ESCAPES: Record<string, string> = {
    '\\': '\\textbackslash{}',
    '&': '\\&',
    '%': '\\%',
    '$': '\\$',
    '#': '\\#',
    '_': '\\_',
    '{': '\\{',
    '}': '\\}',
    '~': '\\textasciitilde{}',
    '^': '\\textasciicircum{}',
};

export function escapeLatex(text: string): string {
    return text.replace(/[\\&%$#_{}~^]/g, ch => LATEX_ESCAPES[ch] ?? ch);
}

/**
 * Column type and \rotcol command for rotated headers.
 * Needs \usepackage[table]{xcolor} and \usepackage{adjustbox}.
 */
export function rotcolDefinition(angle: number): string[] {
    return [
        '\\newcolumntype{R}[2]{%',
        '    >{\\adjustbox{angle=#1,lap=\\width-(#2)}\\bgroup}%',
        '    l%',
        '    <{\\egroup}%',
        '}',
        `\\newcommand*\\rotcol{\\multicolumn{1}{R{${angle.toFixed(0)}}{1em}}}%`,
    ];
}

export function rotcol(text: string, angle?: number): string {
    return angle === undefined ? text : `\\rotcol{${text}}`;
}

export function cellColor(hex: string, text: string): string {
    return `\\cellcolor[HTML]{${hex}}{${text}}`;
}
