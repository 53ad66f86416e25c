import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { DiffCovConfig, DEFAULT_CONFIG, OUTPUT_FORMATS, OutputFormat } from './schema';
import { parseCollectionReducer, parseValueReducer } from '../analyzer/Reducers';
import { isKnownColormap } from '../reporter/LatexColor';
import { ConfigError, CoverageError } from '../models/Errors';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';

export const DEFAULT_CONFIG_FILE = '.diffcov.yml';

/**
 * A config file may set any subset of any section
 */
export type PartialConfig = {
    [K in keyof DiffCovConfig]?: Partial<DiffCovConfig[K]>;
};

export interface ConfigDiagnostics {
    configSource: string;
    envOverrides: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPartialConfig(value: unknown): value is PartialConfig {
    if (!isRecord(value)) return false;
    return Object.keys(DEFAULT_CONFIG).every(section => value[section] === undefined || isRecord(value[section]));
}

function isOutputFormat(value: string): value is OutputFormat {
    return OUTPUT_FORMATS.some(format => format === value);
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';
    private envOverrides: string[] = [];

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string): Promise<DiffCovConfig> {
        let config: PartialConfig = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            // Try to find .diffcov.yml in current directory
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = this.mergeWithDefaults(config);

        this.applyEnvironmentOverrides(mergedConfig);

        this.validate(mergedConfig);

        logger.debug(`Configuration loaded from: ${this.configSource}`);
        return mergedConfig;
    }

    getDiagnostics(): ConfigDiagnostics {
        return {
            configSource: this.configSource,
            envOverrides: [...this.envOverrides],
        };
    }

    /**
     * Load config from file
     */
    private async loadFromFile(filePath: string): Promise<PartialConfig> {
        let content: string;
        try {
            content = await fs.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new ConfigError(`Failed to read config ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }

        let parsed: unknown;
        try {
            parsed = yaml.load(content);
        } catch (error) {
            throw new ConfigError(`Failed to parse config ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }

        if (parsed === undefined || parsed === null) {
            logger.warn(`Config file ${filePath} is empty, using defaults`);
            return {};
        }
        if (!isPartialConfig(parsed)) {
            throw new ConfigError(`Config ${filePath} must be a mapping of sections (${Object.keys(DEFAULT_CONFIG).join(', ')})`);
        }

        logger.info(`Loaded config from: ${filePath}`);
        return parsed;
    }

    /**
     * Merge with default configuration
     */
    private mergeWithDefaults(config: PartialConfig): DiffCovConfig {
        return {
            relcov: { ...DEFAULT_CONFIG.relcov, ...config.relcov },
            filters: {
                include: config.filters?.include || [...DEFAULT_CONFIG.filters.include],
                exclude: config.filters?.exclude || [...DEFAULT_CONFIG.filters.exclude],
            },
            reader: { ...DEFAULT_CONFIG.reader, ...config.reader },
            output: {
                ...DEFAULT_CONFIG.output,
                ...config.output,
                latex: { ...DEFAULT_CONFIG.output.latex, ...config.output?.latex },
            },
            logging: { ...DEFAULT_CONFIG.logging, ...config.logging },
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: DiffCovConfig): void {
        const override = (name: string, apply: (value: string) => void): void => {
            const value = process.env[name];
            if (value) {
                apply(value);
                this.envOverrides.push(name);
            }
        };

        override('DIFFCOV_OUTPUT', value => {
            if (!isOutputFormat(value)) {
                throw new ConfigError(`DIFFCOV_OUTPUT must be one of ${OUTPUT_FORMATS.join(', ')}, got '${value}'`);
            }
            config.output.format = value;
        });
        override('DIFFCOV_VALUE_REDUCER', value => { config.relcov.value_reducer = value; });
        override('DIFFCOV_COLLECTION_REDUCER', value => { config.relcov.collection_reducer = value; });
        override('DIFFCOV_COLORMAP', value => { config.output.latex.colormap = value; });
        override('DIFFCOV_LOG_DIR', value => { config.logging.file_dir = value; });
        override('LOG_LEVEL', value => { config.logging.level = value; });

        if (process.env.VERBOSE === 'true') {
            config.logging.verbose = true;
            this.envOverrides.push('VERBOSE');
        }
    }

    /**
     * Reject values the analysis cannot use
     */
    private validate(config: DiffCovConfig): void {
        try {
            parseValueReducer(String(config.relcov.value_reducer));
            parseCollectionReducer(String(config.relcov.collection_reducer));
        } catch (error) {
            if (error instanceof CoverageError) {
                throw new ConfigError(`${error.message} (from ${this.configSource})`);
            }
            throw error;
        }

        if (!isOutputFormat(String(config.output.format))) {
            throw new ConfigError(`output.format must be one of ${OUTPUT_FORMATS.join(', ')}, got '${config.output.format}'`);
        }
        if (!isKnownColormap(String(config.output.latex.colormap))) {
            throw new ConfigError(`Unknown colormap '${config.output.latex.colormap}'`);
        }
        const rotate = config.output.latex.rotate_headers;
        if (rotate !== undefined && (typeof rotate !== 'number' || !Number.isFinite(rotate))) {
            throw new ConfigError('output.latex.rotate_headers must be a number of degrees');
        }
        for (const key of ['include', 'exclude'] as const) {
            const patterns: unknown = config.filters[key];
            if (!Array.isArray(patterns) || !patterns.every(p => typeof p === 'string')) {
                throw new ConfigError(`filters.${key} must be a list of regular expressions`);
            }
        }
    }
}
