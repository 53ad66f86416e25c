import { EdgeId } from '../models/CoverageModels';
import { DivisionUndefinedError } from '../models/Errors';

/**
 * Fraction of `reference` that `coverage` also reaches:
 * |coverage ∩ reference| / |reference|
 */
export function relcov<E extends EdgeId>(coverage: ReadonlySet<E>, reference: ReadonlySet<E>): number {
    if (reference.size === 0) {
        throw new DivisionUndefinedError('relcov is undefined for an empty reference edge set');
    }
    let shared = 0;
    for (const edge of reference) {
        if (coverage.has(edge)) shared++;
    }
    return shared / reference.size;
}
