import { EdgeId } from '../models/CoverageModels';
import { EmptyInputError, InvalidArgumentError } from '../models/Errors';

/**
 * How per-trial relcov ratios are folded into one number
 */
export enum ValueReducer {
    MEDIAN = 'median',
    MIN = 'min',
    MAX = 'max',
    MEAN = 'mean',
}

/**
 * How the trials of the reference approach are folded into one edge set
 */
export enum CollectionReducer {
    UNION = 'union',
    INTERSECTION = 'intersection',
}

/**
 * Median of a non-empty list. For an even count this is the mean of the two
 * middle values.
 */
function median(values: readonly number[]): number {
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    if (sorted.length % 2 === 1) {
        return sorted[mid];
    }
    return (sorted[mid - 1] + sorted[mid]) / 2;
}

const VALUE_REDUCERS: Record<ValueReducer, (values: readonly number[]) => number> = {
    [ValueReducer.MEDIAN]: median,
    [ValueReducer.MIN]: (values) => values.reduce((min, v) => Math.min(min, v)),
    [ValueReducer.MAX]: (values) => values.reduce((max, v) => Math.max(max, v)),
    [ValueReducer.MEAN]: (values) => values.reduce((sum, v) => sum + v, 0) / values.length,
};

function union<E extends EdgeId>(sets: readonly ReadonlySet<E>[]): Set<E> {
    const result = new Set<E>();
    for (const set of sets) {
        for (const edge of set) result.add(edge);
    }
    return result;
}

function intersection<E extends EdgeId>(sets: readonly ReadonlySet<E>[]): Set<E> {
    const [first, ...rest] = sets;
    const result = new Set<E>();
    for (const edge of first) {
        if (rest.every(set => set.has(edge))) result.add(edge);
    }
    return result;
}

const COLLECTION_REDUCERS: Record<CollectionReducer, <E extends EdgeId>(sets: readonly ReadonlySet<E>[]) => Set<E>> = {
    [CollectionReducer.UNION]: union,
    [CollectionReducer.INTERSECTION]: intersection,
};

export function reduceValues(values: readonly number[], reducer: ValueReducer): number {
    if (values.length === 0) {
        throw new EmptyInputError(`Cannot apply ${reducer} to an empty list of values`);
    }
    return VALUE_REDUCERS[reducer](values);
}

export function reduceCollections<E extends EdgeId>(
    sets: readonly ReadonlySet<E>[],
    reducer: CollectionReducer
): Set<E> {
    if (sets.length === 0) {
        throw new EmptyInputError(`Cannot apply ${reducer} to an empty list of edge sets`);
    }
    return COLLECTION_REDUCERS[reducer](sets);
}

const VALUE_REDUCER_ALIASES = new Map<string, ValueReducer>([
    ['median', ValueReducer.MEDIAN],
    ['min', ValueReducer.MIN],
    ['max', ValueReducer.MAX],
    ['mean', ValueReducer.MEAN],
    ['average', ValueReducer.MEAN],
]);

const COLLECTION_REDUCER_ALIASES = new Map<string, CollectionReducer>([
    ['union', CollectionReducer.UNION],
    ['intersection', CollectionReducer.INTERSECTION],
]);

export function parseValueReducer(name: string): ValueReducer {
    const reducer = VALUE_REDUCER_ALIASES.get(name.trim().toLowerCase());
    if (!reducer) {
        throw new InvalidArgumentError(
            `Unknown value reducer '${name}'. Supported: ${Object.values(ValueReducer).join(', ')}`
        );
    }
    return reducer;
}

export function parseCollectionReducer(name: string): CollectionReducer {
    const reducer = COLLECTION_REDUCER_ALIASES.get(name.trim().toLowerCase());
    if (!reducer) {
        throw new InvalidArgumentError(
            `Unknown collection reducer '${name}'. Supported: ${Object.values(CollectionReducer).join(', ')}`
        );
    }
    return reducer;
}
