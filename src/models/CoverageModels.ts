/**
 * Opaque identifier of one coverage location (e.g. an instrumentation edge)
 */
export type EdgeId = string | number;

export type ApproachName = string;
export type TrialId = string;

/**
 * Edges reached by one trial. Presence only: hit counts are dropped.
 */
export type TrialCoverage<E extends EdgeId = EdgeId> = ReadonlySet<E>;

/**
 * Raw per-trial hit counts as produced by a coverage reader
 */
export type CoverageCounts<E extends EdgeId = EdgeId> = ReadonlyMap<E, number>;

/**
 * approach -> trial -> edge -> hit count
 */
export type RawCampaign<E extends EdgeId = EdgeId> = Record<ApproachName, Record<TrialId, CoverageCounts<E>>>;

/**
 * approach -> trial -> reached edges (in-memory literal form)
 */
export type CampaignInput<E extends EdgeId = EdgeId> = Record<ApproachName, Record<TrialId, Iterable<E>>>;

export interface UndefinedCell {
    row: ApproachName;
    column: ApproachName;
    reason: string;
}

/**
 * Square (or rectangular, for corpus tables) approach x approach result
 */
export interface ResultTable {
    rows: ApproachName[];
    columns: ApproachName[];
    values: Record<ApproachName, Record<ApproachName, number>>;
    undefinedCells: UndefinedCell[];
}

export type ScoreMap = Record<ApproachName, number>;

export interface ScoreReport {
    scores: ScoreMap;
    /** Approaches whose metric is undefined (rendered as N/A) */
    excluded: ApproachName[];
}

/**
 * Keep only edges hit at least once
 */
export function toTrialCoverage<E extends EdgeId>(counts: CoverageCounts<E>): Set<E> {
    const edges = new Set<E>();
    for (const [edge, count] of counts) {
        if (count >= 1) edges.add(edge);
    }
    return edges;
}

/**
 * Empty record keyed by approach or trial name. No prototype, so a name such
 * as `__proto__` is stored like any other key.
 */
export function nameRecord<V>(): Record<string, V> {
    return Object.create(null);
}

export function compareNames(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
