import path from 'path';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

/**
 * Saves rendered output to disk
 */
export class ReportWriter {
    async write(content: string, filePath: string): Promise<string> {
        const resolved = path.resolve(filePath);
        await writeFile(resolved, content.endsWith('\n') ? content : `${content}\n`);
        logger.info(`Report written: ${resolved}`);
        return resolved;
    }
}
