import { ApproachName, EdgeId, ScoreMap, ScoreReport, compareNames, nameRecord } from '../models/CoverageModels';
import { DivisionUndefinedError } from '../models/Errors';
import logger from '../utils/logger';
import { ApproachData } from './ApproachData';
import { Campaign } from './Campaign';

/**
 * relscore: per edge, the number of approaches that never reached it, times
 * the share of an approach's non-empty trials that did. Summed over edges.
 *
 *   relscore(a, e) = missing(e) * hits(a, e) / |trialsWithResult(a)|
 *   score(a)       = Σ_e relscore(a, e)
 *
 * An edge every approach reached carries no differential information and
 * adds nothing.
 */
export class RelscoreEngine<E extends EdgeId = EdgeId> {
    constructor(private readonly campaign: Campaign<E>) { }

    /**
     * Number of approaches whose trials never reached each edge of the campaign
     */
    missingCounts(): Map<E, number> {
        const uppers = this.campaign.entries().map(([, approach]) => approach.upperBound());
        const missing = new Map<E, number>();
        for (const edge of this.campaign.allEdges()) {
            missing.set(edge, uppers.filter(upper => !upper.has(edge)).length);
        }
        return missing;
    }

    missing(edge: E): number {
        return this.campaign.entries().filter(([, approach]) => !approach.upperBound().has(edge)).length;
    }

    /**
     * Contribution of one edge to an approach's score
     */
    relscore(approach: ApproachName, edge: E): number {
        const data = this.campaign.get(approach);
        const usable = this.usableTrialCount(data);
        const hits = data.coverages().filter(coverage => coverage.has(edge)).length;
        return this.missing(edge) * hits / usable;
    }

    /**
     * Total score of one approach
     */
    score(approach: ApproachName, missing: Map<E, number> = this.missingCounts()): number {
        const data = this.campaign.get(approach);
        const usable = this.usableTrialCount(data);
        const coverages = data.coverages();

        let score = 0;
        for (const [edge, count] of missing) {
            if (count === 0) continue;
            const hits = coverages.filter(coverage => coverage.has(edge)).length;
            score += count * hits / usable;
        }
        return score;
    }

    /**
     * Scores for every approach that has usable data; approaches with no
     * non-empty trial are reported in `excluded`.
     */
    compute(): ScoreReport {
        const missing = this.missingCounts();
        const scores: ScoreMap = nameRecord();
        const excluded: ApproachName[] = [];

        for (const name of this.campaign.names()) {
            try {
                scores[name] = this.score(name, missing);
            } catch (error) {
                if (!(error instanceof DivisionUndefinedError)) throw error;
                logger.warn(`Excluding ${name} from relscore: ${error.message}`);
                excluded.push(name);
            }
        }

        logger.debug(`relscore over ${missing.size} edges for ${this.campaign.size} approaches`);
        return { scores, excluded };
    }

    private usableTrialCount(data: ApproachData<E>): number {
        const usable = data.trialsWithResult().length;
        if (usable === 0) {
            throw new DivisionUndefinedError(
                `Approach '${data.name}' has no trials with non-empty coverage`,
                data.name
            );
        }
        return usable;
    }
}

/**
 * Strict form: every approach must have usable data
 */
export function relscoreAll<E extends EdgeId>(campaign: Campaign<E>): ScoreMap {
    const engine = new RelscoreEngine(campaign);
    const missing = engine.missingCounts();
    const scores: ScoreMap = nameRecord();
    for (const name of campaign.names()) {
        scores[name] = engine.score(name, missing);
    }
    return scores;
}

/**
 * Highest score first; equal scores ordered by name
 */
export function rankScores(scores: ScoreMap): Array<[ApproachName, number]> {
    return Object.entries(scores).sort(([nameA, a], [nameB, b]) => (b - a) || compareNames(nameA, nameB));
}
