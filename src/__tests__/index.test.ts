import path from 'path';
import {
    Campaign,
    CollectionReducer,
    DivisionUndefinedError,
    ValueReducer,
    buildCampaign,
    relcov,
    relcovAgainst,
    relcovTable,
    relscoreAll,
    runAnalysis,
} from '../index';

jest.mock('../utils/logger');

describe('public API', () => {
    const campaign = Campaign.fromEdges({
        fuzzer_a: { t1: ['e1', 'e2'], t2: ['e1', 'e3'] },
        fuzzer_b: { t1: ['e1', 'e3'], t2: ['e1', 'e3'] },
    });

    it('exposes relcov on plain sets', () => {
        expect(relcov(new Set(['e1']), new Set(['e1', 'e2']))).toBe(0.5);
    });

    it('computes relcov between two approaches', () => {
        expect(relcovAgainst(campaign, 'fuzzer_a', 'fuzzer_b')).toBe(0.75);
        expect(relcovAgainst(campaign, 'fuzzer_a', 'fuzzer_b', ValueReducer.MEAN, CollectionReducer.INTERSECTION)).toBe(0.75);
    });

    it('builds the full table', () => {
        const table = relcovTable(campaign);
        expect(table.values.fuzzer_b.fuzzer_a).toBeCloseTo(2 / 3);
        expect(table.values.fuzzer_a.fuzzer_a).toBeCloseTo(2 / 3);
    });

    it('builds campaigns from hit counts', () => {
        const built = buildCampaign({
            afl: { run1: new Map([['e1', 2], ['e2', 0]]) },
            honggfuzz: { run1: new Map([['e2', 1]]) },
        });
        expect(relscoreAll(built)).toEqual({ afl: 1, honggfuzz: 1 });
    });

    it('keeps undefined ratios as errors', () => {
        const idle = Campaign.fromEdges({ idle: { t1: [] }, busy: { t1: ['e1'] } });
        expect(() => relcovAgainst(idle, 'busy', 'idle')).toThrow(DivisionUndefinedError);
        expect(() => relscoreAll(idle)).toThrow(DivisionUndefinedError);
    });

    it('runs a full analysis on a campaign directory', async () => {
        const result = await runAnalysis({
            command: 'relscore',
            campaignDir: path.join(__dirname, '../__fixtures__/sample_campaign'),
        });
        expect(result.approaches).toEqual(['fuzzer_a', 'fuzzer_b', 'fuzzer_c', 'seeds']);
        expect(result.output.split('\n')[0]).toBe('fuzzer_c: 3.00');
    });
});
