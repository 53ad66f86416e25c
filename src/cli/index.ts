#!/usr/bin/env node

import { Command, CommanderError, InvalidArgumentError as InvalidOptionValueError } from 'commander';
import { ConfigLoader } from '../config/ConfigLoader';
import { DiffCovConfig, OUTPUT_FORMATS, OutputFormat } from '../config/schema';
import { AnalysisCommand, AnalysisOrchestrator } from '../orchestrator/AnalysisOrchestrator';
import { ReportWriter } from '../reporter/ReportWriter';
import { EnvLoader } from '../utils/EnvLoader';
import logger, { enableFileLogging, setLogLevel } from '../utils/logger';
import { printStartupDiagnostics } from './diagnostics';

export type CliOptions = {
    includeApproach: string[];
    excludeApproach: string[];
    output?: OutputFormat;
    latexEnableColor?: boolean;
    latexColormap?: string;
    latexRotateHeaders?: number;
    config?: string;
    outFile?: string;
    verbose?: boolean;
    single?: string;
    valueReducer?: string;
    collectionReducer?: string;
};

function collect(value: string, previous: string[]): string[] {
    return previous.concat([value]);
}

function parseOutputFormat(value: string): OutputFormat {
    const format = OUTPUT_FORMATS.find(candidate => candidate === value);
    if (!format) {
        throw new InvalidOptionValueError(`Expected one of ${OUTPUT_FORMATS.join(', ')}.`);
    }
    return format;
}

function parseDegrees(value: string): number {
    const degrees = Number(value);
    if (value.trim() === '' || !Number.isFinite(degrees)) {
        throw new InvalidOptionValueError('Expected a number of degrees.');
    }
    return degrees;
}

/**
 * Apply CLI options to config
 */
export function applyCliOptions(config: DiffCovConfig, options: CliOptions): DiffCovConfig {
    if (options.includeApproach.length > 0) {
        config.filters.include = [...options.includeApproach];
    }
    if (options.excludeApproach.length > 0) {
        config.filters.exclude = [...options.excludeApproach];
    }
    if (options.output) {
        config.output.format = options.output;
    }
    if (options.latexEnableColor) {
        config.output.latex.enable_color = true;
    }
    if (options.latexColormap) {
        config.output.latex.colormap = options.latexColormap;
    }
    if (options.latexRotateHeaders !== undefined) {
        config.output.latex.rotate_headers = options.latexRotateHeaders;
    }
    if (options.outFile) {
        config.output.file = options.outFile;
    }
    if (options.valueReducer) {
        config.relcov.value_reducer = options.valueReducer;
    }
    if (options.collectionReducer) {
        config.relcov.collection_reducer = options.collectionReducer;
    }
    if (options.verbose) {
        config.logging.verbose = true;
        config.logging.level = 'debug';
    }
    return config;
}

async function runAnalysis(command: AnalysisCommand, campaignDir: string, cmd: Command): Promise<void> {
    const options = cmd.optsWithGlobals<CliOptions>();
    if (options.verbose) {
        setLogLevel('debug');
    }

    const env = new EnvLoader().load(campaignDir);
    const configLoader = new ConfigLoader();
    const config = applyCliOptions(await configLoader.load(options.config), options);

    setLogLevel(config.logging.level);
    if (config.logging.file_dir) {
        enableFileLogging(config.logging.file_dir);
    }
    if (config.logging.verbose) {
        printStartupDiagnostics(config, configLoader.getDiagnostics(), env);
    }

    const orchestrator = new AnalysisOrchestrator(config);
    const result = await orchestrator.execute({ command, campaignDir, single: options.single });

    if (result.undefinedCount > 0) {
        logger.warn(`${result.undefinedCount} value(s) are undefined and were left out`);
    }

    if (config.output.file) {
        await new ReportWriter().write(result.output, config.output.file);
    } else {
        console.log(result.output);
    }
}

/**
 * Build the commander program. A fresh instance per call keeps option state
 * from leaking between runs.
 */
export function buildProgram(): Command {
    const program = new Command();

    program
        .name('diffcov')
        .description('Differential coverage analysis for fuzzing campaigns')
        .version('1.0.0')
        .exitOverride()
        .option('-i, --include-approach <regex>', 'Only analyze approaches matching the regex (repeatable)', collect, [])
        .option('-x, --exclude-approach <regex>', 'Skip approaches matching the regex (repeatable)', collect, [])
        .option('-o, --output <format>', `Output format (${OUTPUT_FORMATS.join(', ')})`, parseOutputFormat)
        .option('--latex-enable-color', 'Color LaTeX cells by value')
        .option('--latex-colormap <name>', 'Colormap used for LaTeX cells')
        .option('--latex-rotate-headers <degrees>', 'Rotate LaTeX column headers', parseDegrees)
        .option('-c, --config <path>', 'Custom config file')
        .option('-f, --out-file <path>', 'Write the result to a file instead of stdout')
        .option('-v, --verbose', 'Verbose output');

    program
        .command('relscore')
        .description('Rank approaches by how reliably they cover edges that others miss')
        .argument('<dir>', 'Campaign directory')
        .action((dir: string, _options: unknown, cmd: Command) => runAnalysis('relscore', dir, cmd));

    program
        .command('relcov')
        .description('Relative coverage of every approach against every other approach')
        .argument('<dir>', 'Campaign directory')
        .option('--single <approach>', 'Only compare against this reference approach')
        .option('--value-reducer <reducer>', 'How trial relcovs are combined (median, min, max, mean)')
        .option('--collection-reducer <reducer>', 'How reference trials are combined (union, intersection)')
        .action((dir: string, _options: unknown, cmd: Command) => runAnalysis('relcov', dir, cmd));

    program
        .command('reliability')
        .description('Relative coverage of each approach against the union of its own trials')
        .argument('<dir>', 'Campaign directory')
        .action((dir: string, _options: unknown, cmd: Command) => runAnalysis('reliability', dir, cmd));

    program
        .command('reach')
        .description('Share of each approach covered by a single-trial input corpus')
        .argument('<dir>', 'Campaign directory')
        .option('--single <corpus>', 'Only report against this input corpus')
        .action((dir: string, _options: unknown, cmd: Command) => runAnalysis('reach', dir, cmd));

    return program;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function main(argv: string[] = process.argv): Promise<number> {
    const program = buildProgram();
    try {
        await program.parseAsync(argv);
        return 0;
    } catch (error) {
        if (error instanceof CommanderError) {
            // commander has already printed its own message
            return error.exitCode;
        }
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`diffcov failed: ${message}`);
        console.error(`Error: ${message}`);
        return 1;
    }
}

// Only parse arguments if this module is run directly
if (require.main === module) {
    main().then(code => {
        process.exitCode = code;
    }).catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
}
