import { ApproachName, EdgeId, ResultTable, ScoreMap, ScoreReport, nameRecord } from '../models/CoverageModels';
import { DivisionUndefinedError, MissingApproachError } from '../models/Errors';
import logger from '../utils/logger';
import { Campaign } from './Campaign';
import { CollectionReducer, ValueReducer } from './Reducers';

/**
 * What to do with a cell or score whose reference set is empty
 */
export type UndefinedCellPolicy = 'throw' | 'skip';

export interface TableOptions {
    onUndefined?: UndefinedCellPolicy;
}

/**
 * Pairwise relcov computations over one campaign.
 *
 * Cell (row, column) always means "how much of column's reduced coverage do
 * row's trials reach". Every cell is computed on its own.
 */
export class DifferentialCoverageTable<E extends EdgeId = EdgeId> {
    constructor(private readonly campaign: Campaign<E>) { }

    /**
     * relcov of `approach`'s trials against the reduced coverage of `other`
     */
    relcovAgainst(
        approach: ApproachName,
        other: ApproachName,
        valueReducer: ValueReducer = ValueReducer.MEDIAN,
        collectionReducer: CollectionReducer = CollectionReducer.UNION
    ): number {
        return this.campaign.get(approach).relcovAgainst(this.campaign.get(other), valueReducer, collectionReducer);
    }

    /**
     * Full approach x approach table
     */
    relcovTable(
        valueReducer: ValueReducer = ValueReducer.MEDIAN,
        collectionReducer: CollectionReducer = CollectionReducer.UNION,
        options: TableOptions = {}
    ): ResultTable {
        const names = this.campaign.names();
        logger.debug(`Computing ${names.length}x${names.length} relcov table (${valueReducer}/${collectionReducer})`);
        return this.buildTable(names, names, (row, column) =>
            this.relcovAgainst(row, column, valueReducer, collectionReducer), options);
    }

    /**
     * Self-consistency of an approach: median relcov of its trials against
     * the union of its own trials
     */
    reliability(approach: ApproachName): number {
        return this.relcovAgainst(approach, approach, ValueReducer.MEDIAN, CollectionReducer.UNION);
    }

    reliabilityAll(): ScoreMap {
        return this.reliabilityReport().scores;
    }

    reliabilityReport(options: TableOptions = {}): ScoreReport {
        return this.scoreEach(this.campaign.names(), name => this.reliability(name), options);
    }

    /**
     * relcov of every other approach against one reference approach
     */
    performanceAgainst(
        reference: ApproachName,
        valueReducer: ValueReducer = ValueReducer.MEDIAN,
        collectionReducer: CollectionReducer = CollectionReducer.UNION
    ): ScoreMap {
        return this.performanceReport(reference, valueReducer, collectionReducer).scores;
    }

    performanceReport(
        reference: ApproachName,
        valueReducer: ValueReducer = ValueReducer.MEDIAN,
        collectionReducer: CollectionReducer = CollectionReducer.UNION,
        options: TableOptions = {}
    ): ScoreReport {
        if (!this.campaign.has(reference)) {
            throw new MissingApproachError(reference);
        }
        const others = this.campaign.names().filter(name => name !== reference);
        return this.scoreEach(
            others,
            name => this.relcovAgainst(name, reference, valueReducer, collectionReducer),
            options
        );
    }

    /**
     * How much of the input corpus's coverage `approach` subsumes.
     *
     * This is the corpus row read at the approach column: the single corpus
     * trial measured against the union of `approach`'s trials.
     */
    reach(corpus: ApproachName, approach: ApproachName): number {
        this.requireCorpus(corpus);
        return this.relcovAgainst(corpus, approach, ValueReducer.MEDIAN, CollectionReducer.UNION);
    }

    reachAll(corpus: ApproachName): ScoreMap {
        return this.reachReport(corpus).scores;
    }

    reachReport(corpus: ApproachName, options: TableOptions = {}): ScoreReport {
        this.requireCorpus(corpus);
        const others = this.campaign.names().filter(name => name !== corpus);
        return this.scoreEach(others, name => this.reach(corpus, name), options);
    }

    /**
     * Approaches that can serve as an input corpus (exactly one trial)
     */
    corpusCandidates(): ApproachName[] {
        return this.campaign.names().filter(name => this.campaign.get(name).trialCount === 1);
    }

    /**
     * Rows: every approach. Columns: every single-trial approach.
     * values[row][corpus] = reach(corpus, row)
     */
    reachTable(options: TableOptions = {}): ResultTable {
        const corpora = this.corpusCandidates();
        return this.buildTable(this.campaign.names(), corpora, (row, corpus) => this.reach(corpus, row), options);
    }

    private requireCorpus(corpus: ApproachName): void {
        if (this.campaign.get(corpus).trialCount !== 1) {
            throw new MissingApproachError(corpus, 'not-single-trial');
        }
    }

    /**
     * One value per approach. Under 'skip', approaches whose value is
     * undefined go to `excluded` instead of failing the whole report.
     */
    private scoreEach(
        names: ApproachName[],
        score: (name: ApproachName) => number,
        options: TableOptions
    ): ScoreReport {
        const policy = options.onUndefined ?? 'throw';
        const report: ScoreReport = { scores: nameRecord(), excluded: [] };

        for (const name of names) {
            try {
                report.scores[name] = score(name);
            } catch (error) {
                if (policy === 'throw' || !(error instanceof DivisionUndefinedError)) {
                    throw error;
                }
                logger.warn(`Value for ${name} is undefined: ${error.message}`);
                report.excluded.push(name);
            }
        }
        return report;
    }

    private buildTable(
        rows: ApproachName[],
        columns: ApproachName[],
        cell: (row: ApproachName, column: ApproachName) => number,
        options: TableOptions
    ): ResultTable {
        const policy = options.onUndefined ?? 'throw';
        const table: ResultTable = { rows, columns, values: nameRecord(), undefinedCells: [] };

        for (const row of rows) {
            table.values[row] = nameRecord();
            for (const column of columns) {
                try {
                    table.values[row][column] = cell(row, column);
                } catch (error) {
                    if (policy === 'throw' || !(error instanceof DivisionUndefinedError)) {
                        throw error;
                    }
                    logger.warn(`relcov(${row}, ${column}) is undefined: ${error.message}`);
                    table.undefinedCells.push({ row, column, reason: error.message });
                }
            }
        }
        return table;
    }
}
