import { MalformedCoverageRecordError } from '../models/Errors';
import logger from '../utils/logger';

export interface ShowmapParseOptions {
    /** Skip lines without exactly one colon instead of failing */
    skipMalformedLines?: boolean;
}

const COUNT_PATTERN = /^\d+$/;

/**
 * Parse afl-showmap output: one `<edge_id>:<count>` per line.
 *
 * Edge ids are kept as opaque strings. A count that is not a non-negative
 * integer always fails; a line with a missing or extra colon fails unless
 * `skipMalformedLines` is set. Repeated ids keep the larger count.
 */
export function parseShowmap(
    content: string,
    source: string,
    options: ShowmapParseOptions = {}
): Map<string, number> {
    const counts = new Map<string, number>();
    const lines = content.split(/\r?\n/);

    lines.forEach((raw, index) => {
        const line = raw.trim();
        if (!line) return;

        const parts = line.split(':');
        if (parts.length !== 2) {
            if (options.skipMalformedLines) {
                logger.warn(`Skipping malformed line ${source}:${index + 1}: '${line}'`);
                return;
            }
            throw new MalformedCoverageRecordError(source, index + 1, line, 'expected <edge_id>:<count>');
        }

        const edge = parts[0].trim();
        const countText = parts[1].trim();
        if (!edge) {
            throw new MalformedCoverageRecordError(source, index + 1, line, 'empty edge id');
        }
        if (!COUNT_PATTERN.test(countText)) {
            throw new MalformedCoverageRecordError(source, index + 1, line, `count '${countText}' is not a non-negative integer`);
        }

        const count = parseInt(countText, 10);
        counts.set(edge, Math.max(count, counts.get(edge) ?? 0));
    });

    return counts;
}
