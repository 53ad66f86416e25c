import { ConfigDiagnostics } from '../config/ConfigLoader';
import { DiffCovConfig } from '../config/schema';
import { EnvLoadResult } from '../utils/EnvLoader';

/**
 * Print startup diagnostics for debugging config issues. Goes to stderr so
 * it never mixes with the rendered result.
 */
export function printStartupDiagnostics(
    config: DiffCovConfig,
    diagnostics: ConfigDiagnostics,
    env: EnvLoadResult
): void {
    const lines: string[] = [];
    lines.push('═══════════════════════════════════════════════════════════');
    lines.push('📋 STARTUP DIAGNOSTICS');
    lines.push('═══════════════════════════════════════════════════════════\n');

    lines.push('📁 Config Sources:');
    lines.push(`   Config File: ${diagnostics.configSource}`);
    lines.push(`   Env Files: ${env.loadedFrom.length > 0 ? env.loadedFrom.join(', ') : 'none'}`);
    lines.push(`   Env Overrides: ${diagnostics.envOverrides.length > 0 ? diagnostics.envOverrides.join(', ') : 'none'}\n`);

    lines.push('📐 Analysis:');
    lines.push(`   Value Reducer: ${config.relcov.value_reducer}`);
    lines.push(`   Collection Reducer: ${config.relcov.collection_reducer}`);
    lines.push(`   Undefined Cells: ${config.relcov.skip_undefined ? 'left blank' : 'fail'}`);
    lines.push(`   Include: ${config.filters.include.length > 0 ? config.filters.include.join(', ') : '(all)'}`);
    lines.push(`   Exclude: ${config.filters.exclude.length > 0 ? config.filters.exclude.join(', ') : '(none)'}\n`);

    lines.push('🖨  Output:');
    lines.push(`   Format: ${config.output.format}`);
    lines.push(`   Destination: ${config.output.file ?? 'stdout'}`);
    if (config.output.format === 'latex') {
        lines.push(`   Colors: ${config.output.latex.enable_color ? config.output.latex.colormap : 'off'}`);
        lines.push(`   Header Rotation: ${config.output.latex.rotate_headers ?? 'off'}`);
    }
    lines.push('');

    if (env.errors.length > 0) {
        lines.push('⚠️  Env file errors:');
        env.errors.forEach(error => lines.push(`   - ${error}`));
        lines.push('');
    }

    lines.push('═══════════════════════════════════════════════════════════\n');
    console.error(lines.join('\n'));
}
