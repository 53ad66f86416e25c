import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import logger from './logger';

export interface EnvLoadResult {
    loadedFrom: string[];
    tried: string[];
    errors: string[];
}

/**
 * Loads .env files from predictable locations so DIFFCOV_* and LOG_LEVEL
 * settings can live next to a campaign.
 */
export class EnvLoader {
    load(campaignDir?: string): EnvLoadResult {
        const tried: string[] = [];
        const loadedFrom: string[] = [];
        const errors: string[] = [];

        for (const candidate of this.buildCandidatePaths(campaignDir)) {
            if (tried.includes(candidate)) continue;
            tried.push(candidate);

            if (!fs.existsSync(candidate)) {
                continue;
            }

            const result = dotenv.config({ path: candidate });
            if (result.error) {
                errors.push(result.error.message);
                logger.warn(`Failed to load env file ${candidate}: ${result.error.message}`);
            } else {
                loadedFrom.push(candidate);
                logger.debug(`Loaded environment variables from ${candidate}`);
            }
        }

        return { loadedFrom, tried, errors };
    }

    private buildCandidatePaths(campaignDir?: string): string[] {
        const paths: string[] = [];

        if (campaignDir) {
            paths.push(path.resolve(campaignDir, '.env'));
        }

        // Current working directory
        paths.push(path.resolve(process.cwd(), '.env'));

        // Package root (helpful when running from compiled dist)
        paths.push(path.resolve(__dirname, '../../.env'));

        // User-level override
        paths.push(path.join(os.homedir(), '.diffcov.env'));

        return paths;
    }
}
