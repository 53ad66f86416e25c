import { ApproachData } from '../ApproachData';
import { Campaign, buildCampaign } from '../Campaign';
import { CollectionReducer, ValueReducer } from '../Reducers';
import {
    DivisionUndefinedError,
    EmptyInputError,
    InvalidArgumentError,
    MissingApproachError,
} from '../../models/Errors';

describe('ApproachData', () => {
    const fuzzer = new ApproachData<number>('fuzzer_a', [['t1', [1, 2]], ['t2', [1, 3]], ['t3', []]]);

    it('exposes trials by id', () => {
        expect(fuzzer.trialCount).toBe(3);
        expect(fuzzer.trialIds()).toEqual(['t1', 't2', 't3']);
        expect(fuzzer.trial('t2')).toEqual(new Set([1, 3]));
        expect(fuzzer.trial('missing')).toBeUndefined();
    });

    it('lists only trials that reached something', () => {
        expect(fuzzer.trialsWithResult()).toEqual(['t1', 't2']);
    });

    it('computes upper and lower bounds', () => {
        expect(fuzzer.upperBound()).toEqual(new Set([1, 2, 3]));
        expect(fuzzer.lowerBound()).toEqual(new Set());
    });

    it('computes per-trial relcov against a reference', () => {
        const relcovs = fuzzer.trialRelcovs(new Set([1, 2]));
        expect(relcovs.get('t1')).toBe(1);
        expect(relcovs.get('t2')).toBe(0.5);
        expect(relcovs.get('t3')).toBe(0);
    });

    it('rejects an approach without trials', () => {
        expect(() => new ApproachData<number>('empty', [])).toThrow("Approach 'empty' has no trials");
    });

    it('rejects duplicate trial ids', () => {
        expect(() => new ApproachData<number>('dup', [['t1', [1]], ['t1', [2]]])).toThrow(InvalidArgumentError);
    });

    it('compares trial contents, not names', () => {
        const same = new ApproachData<number>('other', new Map([['t1', [2, 1]], ['t2', [3, 1]], ['t3', []]]));
        const different = new ApproachData<number>('fuzzer_a', [['t1', [1, 2]], ['t2', [1, 3]], ['t3', [4]]]);
        expect(fuzzer.equals(same)).toBe(true);
        expect(fuzzer.equals(different)).toBe(false);
    });

    describe('relcovAgainst', () => {
        const a = new ApproachData<number>('a', [['t1', [1, 2]], ['t2', [1, 3]]]);
        const b = new ApproachData<number>('b', [['t1', [1, 3]], ['t2', [1, 3]]]);

        it('folds trial ratios with the value reducer', () => {
            // reference: union of b = {1, 3}; a's trials reach 1/2 and 2/2
            expect(a.relcovAgainst(b)).toBe(0.75);
            expect(a.relcovAgainst(b, ValueReducer.MIN)).toBe(0.5);
            expect(a.relcovAgainst(b, ValueReducer.MAX)).toBe(1);
        });

        it('folds the reference with the collection reducer', () => {
            // intersection of a = {1}
            expect(b.relcovAgainst(a, ValueReducer.MEDIAN, CollectionReducer.INTERSECTION)).toBe(1);
            expect(b.relcovAgainst(a, ValueReducer.MEDIAN, CollectionReducer.UNION)).toBeCloseTo(2 / 3);
        });

        it('is not symmetric', () => {
            expect(a.relcovAgainst(b)).not.toBe(b.relcovAgainst(a));
        });

        it('stays at or below 1 against its own union, and reaches 1 with max', () => {
            // union {1, 2, 3, 4}; trials reach 2/4, 1/4 and 4/4
            const self = new ApproachData<number>('self', [['t1', [1, 2]], ['t2', [3]], ['t3', [1, 2, 3, 4]]]);
            const reducers = [ValueReducer.MEDIAN, ValueReducer.MIN, ValueReducer.MEAN, ValueReducer.MAX];

            for (const reducer of reducers) {
                expect(self.relcovAgainst(self, reducer, CollectionReducer.UNION)).toBeLessThanOrEqual(1);
            }
            expect(self.relcovAgainst(self, ValueReducer.MEDIAN)).toBe(0.5);
            expect(self.relcovAgainst(self, ValueReducer.MAX)).toBe(1);
        });

        it('is undefined against an empty reference', () => {
            const nothing = new ApproachData<number>('nothing', [['t1', []]]);
            expect(() => a.relcovAgainst(nothing)).toThrow(DivisionUndefinedError);
        });

        it('is undefined when the intersection is empty', () => {
            const disjoint = new ApproachData<number>('disjoint', [['t1', [1]], ['t2', [2]]]);
            expect(() => a.relcovAgainst(disjoint, ValueReducer.MEDIAN, CollectionReducer.INTERSECTION))
                .toThrow("relcov against 'disjoint' is undefined: its intersection of trials is empty");
        });
    });
});

describe('Campaign', () => {
    const campaign = Campaign.fromEdges({
        zeta: { t1: ['x'] },
        alpha: { t1: ['x', 'y'], t2: ['z'] },
    });

    it('sorts approach names', () => {
        expect(campaign.names()).toEqual(['alpha', 'zeta']);
        expect(campaign.entries().map(([name]) => name)).toEqual(['alpha', 'zeta']);
        expect(campaign.size).toBe(2);
    });

    it('looks up approaches', () => {
        expect(campaign.has('alpha')).toBe(true);
        expect(campaign.get('alpha').trialCount).toBe(2);
        expect(() => campaign.get('beta')).toThrow(MissingApproachError);
    });

    it('collects every edge of the campaign', () => {
        expect(campaign.allEdges()).toEqual(new Set(['x', 'y', 'z']));
    });

    it('filters into a new campaign', () => {
        const filtered = campaign.filter(name => name !== 'zeta');
        expect(filtered.names()).toEqual(['alpha']);
        expect(campaign.names()).toEqual(['alpha', 'zeta']);
    });

    it('rejects an empty campaign', () => {
        expect(() => Campaign.fromEdges({})).toThrow(EmptyInputError);
        expect(() => campaign.filter(() => false)).toThrow('Campaign has no approaches');
    });

    it('rejects an approach without trials', () => {
        expect(() => Campaign.fromEdges({ lonely: {} })).toThrow("Approach 'lonely' has no trials");
    });

    it('rejects duplicate approach names', () => {
        const one = new ApproachData<number>('same', [['t1', [1]]]);
        const two = new ApproachData<number>('same', [['t1', [2]]]);
        expect(() => new Campaign([one, two])).toThrow(InvalidArgumentError);
    });

    it('treats an edge with a zero count as not reached', () => {
        const built = buildCampaign({
            fuzzer: {
                t1: new Map([['e1', 3], ['e2', 0]]),
                t2: new Map<string, number>(),
            },
        });
        expect(built.get('fuzzer').trial('t1')).toEqual(new Set(['e1']));
        expect(built.get('fuzzer').trial('t2')).toEqual(new Set());
    });
});
