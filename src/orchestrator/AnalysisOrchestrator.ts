import { filterCampaign } from '../analyzer/ApproachFilter';
import { Campaign } from '../analyzer/Campaign';
import { DifferentialCoverageTable, TableOptions } from '../analyzer/DifferentialCoverageTable';
import { parseCollectionReducer, parseValueReducer } from '../analyzer/Reducers';
import { RelscoreEngine } from '../analyzer/RelscoreEngine';
import { DiffCovConfig } from '../config/schema';
import { ApproachName, ResultTable, ScoreReport } from '../models/CoverageModels';
import { EmptyInputError } from '../models/Errors';
import { CampaignReader } from '../reader/CampaignReader';
import { RenderOptions, ScoreFormatter } from '../reporter/ScoreFormatter';
import { TableFormatter } from '../reporter/TableFormatter';
import logger from '../utils/logger';

export type AnalysisCommand = 'relscore' | 'relcov' | 'reliability' | 'reach';

export interface AnalysisRequest {
    command: AnalysisCommand;
    campaignDir: string;
    /** Reference approach (relcov) or input corpus (reach); omit for the full table */
    single?: ApproachName;
}

export interface AnalysisResult {
    command: AnalysisCommand;
    approaches: ApproachName[];
    /** Rendered output in the configured format */
    output: string;
    /** Approaches or cells whose metric is undefined */
    undefinedCount: number;
}

/**
 * Load -> filter -> compute -> render pipeline behind every CLI command
 */
export class AnalysisOrchestrator {
    constructor(
        private readonly config: DiffCovConfig,
        private readonly reader: CampaignReader = new CampaignReader({
            skipMalformedLines: config.reader.skip_malformed_lines,
        })
    ) { }

    async execute(request: AnalysisRequest): Promise<AnalysisResult> {
        logger.info(`Running ${request.command} on ${request.campaignDir}`);
        const campaign = await this.loadCampaign(request.campaignDir);
        const approaches = campaign.names();

        if (request.command === 'relscore') {
            const report = new RelscoreEngine(campaign).compute();
            return this.scoreResult(request.command, approaches, report, 'score');
        }

        const table = new DifferentialCoverageTable(campaign);
        switch (request.command) {
            case 'reliability':
                return this.scoreResult(request.command, approaches, table.reliabilityReport(this.tableOptions()), 'reliability');
            case 'relcov': {
                const valueReducer = parseValueReducer(this.config.relcov.value_reducer);
                const collectionReducer = parseCollectionReducer(this.config.relcov.collection_reducer);
                if (request.single !== undefined) {
                    const report = table.performanceReport(request.single, valueReducer, collectionReducer, this.tableOptions());
                    return this.scoreResult(request.command, approaches, report, 'relcov');
                }
                return this.tableResult(
                    request.command,
                    approaches,
                    table.relcovTable(valueReducer, collectionReducer, this.tableOptions())
                );
            }
            case 'reach': {
                if (request.single !== undefined) {
                    return this.scoreResult(request.command, approaches, table.reachReport(request.single, this.tableOptions()), 'reach');
                }
                if (table.corpusCandidates().length === 0) {
                    throw new EmptyInputError('No input corpus found: no approach has exactly one trial');
                }
                return this.tableResult(request.command, approaches, table.reachTable(this.tableOptions()));
            }
        }
    }

    /**
     * Read the campaign directory and apply include/exclude filters
     */
    async loadCampaign(campaignDir: string): Promise<Campaign<string>> {
        const campaign = await this.reader.read(campaignDir);
        return filterCampaign(campaign, this.config.filters);
    }

    private renderOptions(): RenderOptions {
        return { format: this.config.output.format, latex: this.config.output.latex };
    }

    private tableOptions(): TableOptions {
        return { onUndefined: this.config.relcov.skip_undefined ? 'skip' : 'throw' };
    }

    private scoreResult(
        command: AnalysisCommand,
        approaches: ApproachName[],
        report: ScoreReport,
        label: string
    ): AnalysisResult {
        return {
            command,
            approaches,
            output: new ScoreFormatter(label).format(report, this.renderOptions()),
            undefinedCount: report.excluded.length,
        };
    }

    private tableResult(command: AnalysisCommand, approaches: ApproachName[], table: ResultTable): AnalysisResult {
        return {
            command,
            approaches,
            output: new TableFormatter().format(table, this.renderOptions()),
            undefinedCount: table.undefinedCells.length,
        };
    }
}
