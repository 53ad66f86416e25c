import { EdgeId, TrialCoverage, TrialId } from '../models/CoverageModels';
import { DivisionUndefinedError, EmptyInputError, InvalidArgumentError } from '../models/Errors';
import { CollectionReducer, ValueReducer, reduceCollections, reduceValues } from './Reducers';
import { relcov } from './relcov';

/**
 * Coverage of one approach (fuzzer, corpus, test suite) grouped by trial
 */
export class ApproachData<E extends EdgeId = EdgeId> {
    private readonly trials: ReadonlyMap<TrialId, TrialCoverage<E>>;

    /**
     * @param trials trial id -> reached edges; a Map or `Object.entries(...)` of a literal
     */
    constructor(
        public readonly name: string,
        trials: Iterable<readonly [TrialId, Iterable<E>]>
    ) {
        const entries = [...trials];

        if (entries.length === 0) {
            throw new EmptyInputError(`Approach '${name}' has no trials`);
        }

        this.trials = new Map(entries.map(([id, edges]): [TrialId, TrialCoverage<E>] => [id, new Set(edges)]));
        if (this.trials.size !== entries.length) {
            throw new InvalidArgumentError(`Approach '${name}' has duplicate trial ids`);
        }
    }

    get trialCount(): number {
        return this.trials.size;
    }

    trialIds(): TrialId[] {
        return [...this.trials.keys()];
    }

    trial(id: TrialId): TrialCoverage<E> | undefined {
        return this.trials.get(id);
    }

    coverages(): TrialCoverage<E>[] {
        return [...this.trials.values()];
    }

    /**
     * Trials that reached at least one edge
     */
    trialsWithResult(): TrialId[] {
        return this.trialIds().filter(id => (this.trials.get(id)?.size ?? 0) > 0);
    }

    /**
     * Edges reached by any trial
     */
    upperBound(): Set<E> {
        return reduceCollections(this.coverages(), CollectionReducer.UNION);
    }

    /**
     * Edges reached by every trial
     */
    lowerBound(): Set<E> {
        return reduceCollections(this.coverages(), CollectionReducer.INTERSECTION);
    }

    /**
     * relcov of each trial of this approach against a fixed reference set
     */
    trialRelcovs(reference: ReadonlySet<E>): Map<TrialId, number> {
        const result = new Map<TrialId, number>();
        for (const [id, coverage] of this.trials) {
            result.set(id, relcov(coverage, reference));
        }
        return result;
    }

    /**
     * How much of `other`'s reduced edge set the trials of this approach reach.
     *
     * `other`'s trials are folded into one reference set by `collectionReducer`
     * (UNION: everything it can reach, INTERSECTION: what it always reaches),
     * and the per-trial ratios of this approach are folded by `valueReducer`.
     */
    relcovAgainst(
        other: ApproachData<E>,
        valueReducer: ValueReducer = ValueReducer.MEDIAN,
        collectionReducer: CollectionReducer = CollectionReducer.UNION
    ): number {
        const reference = reduceCollections(other.coverages(), collectionReducer);
        if (reference.size === 0) {
            throw new DivisionUndefinedError(
                `relcov against '${other.name}' is undefined: its ${collectionReducer} of trials is empty`,
                other.name
            );
        }
        return reduceValues([...this.trialRelcovs(reference).values()], valueReducer);
    }

    /**
     * Same trial ids with the same edge sets (the name is not compared)
     */
    equals(other: ApproachData<E>): boolean {
        if (this.trials.size !== other.trials.size) return false;
        for (const [id, coverage] of this.trials) {
            const theirs = other.trials.get(id);
            if (!theirs || theirs.size !== coverage.size) return false;
            for (const edge of coverage) {
                if (!theirs.has(edge)) return false;
            }
        }
        return true;
    }
}
