import path from 'path';
import { buildCampaign, Campaign } from '../analyzer/Campaign';
import { CoverageCounts, RawCampaign, TrialId, nameRecord } from '../models/CoverageModels';
import { CampaignLayoutError } from '../models/Errors';
import { dirExists, findDirectories, findFiles, readFile } from '../utils/fileUtils';
import logger from '../utils/logger';
import { parseShowmap, ShowmapParseOptions } from './ShowmapParser';

/**
 * Reads a campaign directory:
 *
 *   <root>/<approach>/<trial file>
 *
 * Directory name = approach name, file name without extension = trial id.
 * Dot files are ignored.
 */
export class CampaignReader {
    constructor(private readonly options: ShowmapParseOptions = {}) { }

    /**
     * Raw hit counts, approach -> trial -> edge -> count
     */
    async readRaw(root: string): Promise<RawCampaign<string>> {
        const resolved = path.resolve(root);
        if (!(await dirExists(resolved))) {
            throw new CampaignLayoutError(`Not a directory: ${resolved}`);
        }

        const strayFiles = await findFiles(resolved, '*');
        if (strayFiles.length > 0) {
            throw new CampaignLayoutError(`Invalid file in campaign directory: ${strayFiles[0]}`);
        }

        const campaign: RawCampaign<string> = nameRecord();
        for (const approachDir of await findDirectories(resolved, '*')) {
            campaign[path.basename(approachDir)] = await this.readApproachDir(approachDir);
        }

        logger.info(`Read ${Object.keys(campaign).length} approaches from ${resolved}`);
        return campaign;
    }

    async read(root: string): Promise<Campaign<string>> {
        return buildCampaign(await this.readRaw(root));
    }

    private async readApproachDir(approachDir: string): Promise<Record<TrialId, CoverageCounts<string>>> {
        const nested = await findDirectories(approachDir, '*');
        if (nested.length > 0) {
            throw new CampaignLayoutError(`Invalid directory inside approach directory: ${nested[0]}`);
        }

        const trials: Record<TrialId, CoverageCounts<string>> = nameRecord();
        for (const file of await findFiles(approachDir, '*')) {
            const trialId = path.parse(file).name;
            if (Object.prototype.hasOwnProperty.call(trials, trialId)) {
                throw new CampaignLayoutError(`Duplicate trial id '${trialId}' in ${approachDir}`);
            }
            trials[trialId] = parseShowmap(await readFile(file), file, this.options);
        }

        logger.debug(`Read ${Object.keys(trials).length} trials from ${approachDir}`);
        return trials;
    }
}

/**
 * Read a campaign directory into presence sets
 */
export async function readCampaignDir(root: string, options: ShowmapParseOptions = {}): Promise<Campaign<string>> {
    return new CampaignReader(options).read(root);
}
