import { EdgeId } from '../models/CoverageModels';
import { EmptyInputError, InvalidArgumentError } from '../models/Errors';
import logger from '../utils/logger';
import { Campaign } from './Campaign';

export interface ApproachFilterOptions {
    /** Keep only approaches matching any of these patterns */
    include?: string[];
    /** Then drop approaches matching any of these patterns */
    exclude?: string[];
}

function compilePatterns(patterns: string[], flag: string): RegExp[] {
    return patterns.map(pattern => {
        try {
            return new RegExp(pattern);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new InvalidArgumentError(`Invalid regex for ${flag} '${pattern}': ${message}`);
        }
    });
}

/**
 * Narrow a campaign by approach name. Runs before any metric so that dropped
 * approaches do not take part in relscore's missing counts either.
 */
export function filterCampaign<E extends EdgeId>(
    campaign: Campaign<E>,
    options: ApproachFilterOptions
): Campaign<E> {
    const include = compilePatterns(options.include ?? [], '--include-approach');
    const exclude = compilePatterns(options.exclude ?? [], '--exclude-approach');

    let names = campaign.names();
    if (include.length > 0) {
        names = names.filter(name => include.some(re => re.test(name)));
        if (names.length === 0) {
            throw new EmptyInputError('No approaches matched --include-approach; nothing to do');
        }
    }
    if (exclude.length > 0) {
        names = names.filter(name => !exclude.some(re => re.test(name)));
        if (names.length === 0) {
            throw new EmptyInputError('All approaches were excluded via --exclude-approach; nothing to do');
        }
    }

    if (names.length !== campaign.size) {
        logger.info(`Analyzing ${names.length} of ${campaign.size} approaches: ${names.join(', ')}`);
    }
    const kept = new Set(names);
    return campaign.filter(name => kept.has(name));
}
