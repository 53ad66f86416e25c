import { Campaign } from './analyzer/Campaign';
import { DifferentialCoverageTable, TableOptions } from './analyzer/DifferentialCoverageTable';
import { CollectionReducer, ValueReducer } from './analyzer/Reducers';
import { ConfigLoader } from './config/ConfigLoader';
import { ApproachName, EdgeId, ResultTable } from './models/CoverageModels';
import { AnalysisOrchestrator, AnalysisRequest, AnalysisResult } from './orchestrator/AnalysisOrchestrator';
import { EnvLoader } from './utils/EnvLoader';
import logger from './utils/logger';

/**
 * relcov of `approach` against the reduced coverage of `other`
 */
export function relcovAgainst<E extends EdgeId>(
    campaign: Campaign<E>,
    approach: ApproachName,
    other: ApproachName,
    valueReducer: ValueReducer = ValueReducer.MEDIAN,
    collectionReducer: CollectionReducer = CollectionReducer.UNION
): number {
    return new DifferentialCoverageTable(campaign).relcovAgainst(approach, other, valueReducer, collectionReducer);
}

/**
 * Full approach x approach relcov table
 */
export function relcovTable<E extends EdgeId>(
    campaign: Campaign<E>,
    valueReducer: ValueReducer = ValueReducer.MEDIAN,
    collectionReducer: CollectionReducer = CollectionReducer.UNION,
    options: TableOptions = {}
): ResultTable {
    return new DifferentialCoverageTable(campaign).relcovTable(valueReducer, collectionReducer, options);
}

/**
 * Main entry point for programmatic usage: analyze a campaign directory the
 * way the CLI does and return the rendered result
 */
export async function runAnalysis(request: AnalysisRequest, configPath?: string): Promise<AnalysisResult> {
    try {
        new EnvLoader().load(request.campaignDir);
        const config = await new ConfigLoader().load(configPath);
        return await new AnalysisOrchestrator(config).execute(request);
    } catch (error) {
        logger.error(`Analysis failed: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
    }
}

// Export main components for library usage
export { ApproachData } from './analyzer/ApproachData';
export { Campaign, buildCampaign } from './analyzer/Campaign';
export { DifferentialCoverageTable } from './analyzer/DifferentialCoverageTable';
export type { TableOptions, UndefinedCellPolicy } from './analyzer/DifferentialCoverageTable';
export { RelscoreEngine, relscoreAll, rankScores } from './analyzer/RelscoreEngine';
export {
    CollectionReducer,
    ValueReducer,
    parseCollectionReducer,
    parseValueReducer,
    reduceCollections,
    reduceValues,
} from './analyzer/Reducers';
export { relcov } from './analyzer/relcov';
export { filterCampaign } from './analyzer/ApproachFilter';
export type { ApproachFilterOptions } from './analyzer/ApproachFilter';
export { CampaignReader, readCampaignDir } from './reader/CampaignReader';
export { parseShowmap } from './reader/ShowmapParser';
export { ScoreFormatter } from './reporter/ScoreFormatter';
export type { RenderOptions } from './reporter/ScoreFormatter';
export { TableFormatter } from './reporter/TableFormatter';
export { ReportWriter } from './reporter/ReportWriter';
export { colormapLightHex, colormapNames } from './reporter/LatexColor';
export { ConfigLoader } from './config/ConfigLoader';
export { DEFAULT_CONFIG, OUTPUT_FORMATS } from './config/schema';
export type { DiffCovConfig, LatexConfig, OutputFormat } from './config/schema';
export { AnalysisOrchestrator } from './orchestrator/AnalysisOrchestrator';
export type { AnalysisCommand, AnalysisRequest, AnalysisResult } from './orchestrator/AnalysisOrchestrator';
export * from './models/CoverageModels';
export * from './models/Errors';
