/**
 * Output formats understood by the reporters
 */
export type OutputFormat = 'stdout' | 'csv' | 'latex' | 'json';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['stdout', 'csv', 'latex', 'json'];

/**
 * LaTeX rendering options
 */
export interface LatexConfig {
    enable_color: boolean;
    colormap: string;
    /** Rotate column headers by this many degrees; unset keeps them flat */
    rotate_headers?: number;
}

/**
 * Configuration schema for diffcov
 */
export interface DiffCovConfig {
    relcov: {
        value_reducer: string;
        collection_reducer: string;
        /** Render undefined cells as blanks instead of failing */
        skip_undefined: boolean;
    };
    filters: {
        include: string[];
        exclude: string[];
    };
    reader: {
        skip_malformed_lines: boolean;
    };
    output: {
        format: OutputFormat;
        latex: LatexConfig;
        file?: string;
    };
    logging: {
        level: string;
        file_dir?: string;
        verbose: boolean;
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: DiffCovConfig = {
    relcov: {
        value_reducer: 'median',
        collection_reducer: 'union',
        skip_undefined: false,
    },
    filters: {
        include: [],
        exclude: [],
    },
    reader: {
        skip_malformed_lines: false,
    },
    output: {
        format: 'stdout',
        latex: {
            enable_color: false,
            colormap: 'viridis',
        },
    },
    logging: {
        level: 'info',
        verbose: false,
    },
};
