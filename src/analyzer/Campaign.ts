import {
    ApproachName,
    CampaignInput,
    EdgeId,
    RawCampaign,
    compareNames,
    toTrialCoverage,
} from '../models/CoverageModels';
import { EmptyInputError, InvalidArgumentError, MissingApproachError } from '../models/Errors';
import { ApproachData } from './ApproachData';

/**
 * All approaches of one evaluation, keyed by name. Read-only once built.
 */
export class Campaign<E extends EdgeId = EdgeId> {
    private readonly approaches: ReadonlyMap<ApproachName, ApproachData<E>>;

    constructor(approaches: Iterable<ApproachData<E>>) {
        const byName = new Map<ApproachName, ApproachData<E>>();
        for (const approach of approaches) {
            if (byName.has(approach.name)) {
                throw new InvalidArgumentError(`Approach '${approach.name}' appears twice in the campaign`);
            }
            byName.set(approach.name, approach);
        }
        if (byName.size === 0) {
            throw new EmptyInputError('Campaign has no approaches');
        }
        this.approaches = byName;
    }

    /**
     * Build from an in-memory literal of reached edges
     */
    static fromEdges<E extends EdgeId>(input: CampaignInput<E>): Campaign<E> {
        return new Campaign(
            Object.entries(input).map(([name, trials]) => new ApproachData<E>(name, Object.entries(trials)))
        );
    }

    get size(): number {
        return this.approaches.size;
    }

    /**
     * Approach names in sorted order
     */
    names(): ApproachName[] {
        return [...this.approaches.keys()].sort(compareNames);
    }

    has(name: ApproachName): boolean {
        return this.approaches.has(name);
    }

    get(name: ApproachName): ApproachData<E> {
        const approach = this.approaches.get(name);
        if (!approach) {
            throw new MissingApproachError(name);
        }
        return approach;
    }

    entries(): Array<[ApproachName, ApproachData<E>]> {
        return this.names().map((name): [ApproachName, ApproachData<E>] => [name, this.get(name)]);
    }

    /**
     * Every edge reached by any trial of any approach
     */
    allEdges(): Set<E> {
        const edges = new Set<E>();
        for (const approach of this.approaches.values()) {
            for (const edge of approach.upperBound()) edges.add(edge);
        }
        return edges;
    }

    /**
     * New campaign with the approaches the predicate keeps
     */
    filter(predicate: (name: ApproachName, approach: ApproachData<E>) => boolean): Campaign<E> {
        return new Campaign(this.entries().filter(([name, approach]) => predicate(name, approach)).map(([, a]) => a));
    }
}

/**
 * Turn raw hit counts into a campaign of presence sets (count >= 1)
 */
export function buildCampaign<E extends EdgeId>(raw: RawCampaign<E>): Campaign<E> {
    return new Campaign(
        Object.entries(raw).map(([name, trials]) => new ApproachData<E>(
            name,
            Object.entries(trials).map(([trialId, counts]): [string, Set<E>] => [trialId, toTrialCoverage(counts)])
        ))
    );
}
