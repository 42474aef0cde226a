import {
    FeatureRow,
    Rule,
    STILL_HOLDING_REASON,
    addFeatures,
    computeCagr,
    computeMaxDrawdown,
    computeMetrics,
    computeSharpe,
    conditionAt,
    countEntries,
    describeRule,
    entryReasons,
    entrySignal,
    evaluateRule,
    extractTrades,
    rollingMean,
    rollingMedian,
    rollingStd,
    runBacktest,
} from '../src';
import { crossoverSpec, seriesFrom, zigzagCloses } from './helpers/series';

const spec = crossoverSpec();
const frame = addFeatures(seriesFrom(zigzagCloses()), spec);
const above: Rule = { type: 'crossover', fastMa: 5, slowMa: 10, direction: 'above' };
const below: Rule = { type: 'crossover', fastMa: 5, slowMa: 10, direction: 'below' };

describe('rolling windows', () => {
    it('averages partial windows at the start', () => {
        expect(rollingMean([1, 2, 3, 4], 2)).toEqual([1, 1.5, 2.5, 3.5]);
    });

    it('needs two values for a sample standard deviation', () => {
        const std = rollingStd([1, 2, 3], 2);

        expect(std[0]).toBeNull();
        expect(std[1]).toBeCloseTo(Math.sqrt(0.5), 12);
        expect(std[2]).toBeCloseTo(Math.sqrt(0.5), 12);
    });

    it('takes medians over the values present', () => {
        expect(rollingMedian([null, 3, 1, 2], 3)).toEqual([null, 3, 2, 2]);
    });
});

describe('addFeatures', () => {
    it('adds returns and the columns the rules read', () => {
        const volSpec = crossoverSpec({ exitRules: [{ type: 'vol_filter', window: 2, threshold: 'median_1y', relation: 'above' }] });
        const rows = addFeatures(seriesFrom([100, 110, 99]), volSpec);

        expect(rows.map(row => row.ret)).toEqual([0, expect.closeTo(0.1, 12), expect.closeTo(-0.1, 12)]);
        expect(Object.keys(rows[0].values).sort()).toEqual(['ma_10', 'ma_5', 'rv_2', 'rv_2_med_252']);
        expect(rows[0].values.rv_2).toBeNull();
        expect(rows[0].values.rv_2_med_252).toBeNull();
        expect(rows[1].values.rv_2_med_252).toBe(rows[1].values.rv_2);
    });
});

describe('rule evaluation', () => {
    it('compares moving averages on a single day', () => {
        expect(conditionAt(above, frame, 4)).toBe(false);
        expect(conditionAt(above, frame, 5)).toBe(true);
        expect(conditionAt(below, frame, 34)).toBe(true);
        expect(conditionAt(above, frame, 90)).toBe(false);
    });

    it('never matches on missing values', () => {
        const row: FeatureRow = {
            date: '2023-01-02', open: 1, high: 1, low: 1, close: 1, volume: 1, ret: 0,
            values: { ma_5: null, ma_10: 1 },
        };
        expect(conditionAt(above, [row], 0)).toBe(false);
    });

    it('looks ahead for a match', () => {
        expect(evaluateRule({ ...above, lookaheadDays: 2 }, frame, 3)).toBe(true);
        expect(evaluateRule({ ...above, lookaheadDays: 1 }, frame, 3)).toBe(false);
    });

    it('requires the condition on every day of a duration', () => {
        expect(evaluateRule({ ...above, durationDays: 3 }, frame, 6)).toBe(false);
        expect(evaluateRule({ ...above, durationDays: 3 }, frame, 7)).toBe(true);
    });

    it('applies duration over lookahead when both are set', () => {
        expect(evaluateRule({ ...above, lookaheadDays: 2, durationDays: 3 }, frame, 3)).toBe(false);
    });

    it('checks later sequential rules within their lookahead', () => {
        const sequential = (lookaheadDays?: number) =>
            crossoverSpec({ entryRules: [above, { ...below, lookaheadDays }], entrySequential: true });

        expect(entrySignal(sequential(30), frame, 5)).toBe(true);
        expect(entrySignal(sequential(10), frame, 5)).toBe(false);
        expect(entrySignal(sequential(), frame, 5)).toBe(false);
    });

    it('describes sequential rules on the day they matched', () => {
        const sequential = crossoverSpec({ entryRules: [above, { ...below, lookaheadDays: 30 }], entrySequential: true });

        expect(entryReasons(sequential, frame, 5)).toEqual([
            'Entry: 5-day MA (103.00) crossed above 10-day MA (102.50)',
            'Entry: 5-day MA (126.00) crossed below 10-day MA (126.50)',
        ]);
    });

    it('describes volatility filters in percent', () => {
        const row: FeatureRow = {
            date: '2023-01-02', open: 1, high: 1, low: 1, close: 1, volume: 1, ret: 0,
            values: { rv_20: 0.15, rv_20_med_252: 0.2 },
        };
        const rule: Rule = { type: 'vol_filter', window: 20, threshold: 'median_1y', relation: 'below' };

        expect(describeRule(rule, [row], 0, 'Exit')).toBe('Exit: 20-day RV (15.00%) below 1Y median (20.00%)');
    });
});

describe('runBacktest', () => {
    const { rows } = runBacktest(frame, spec);

    it('goes long on the entry day and flat on the exit day', () => {
        expect([4, 5, 33, 34, 63, 64, 89].map(i => rows[i].position)).toEqual([0, 1, 1, 0, 0, 1, 1]);
    });

    it('earns the next day return after a position change', () => {
        expect(rows[5].strategyReturn).toBe(0);
        expect(rows[6].strategyReturn).toBeCloseTo(106 / 105 - 1, 12);
        expect(rows[62].strategyReturn).toBe(0);
    });

    it('compounds equity from 1', () => {
        expect(rows[0].equity).toBe(1);
        expect(rows[89].equity).toBeCloseTo((124 / 105) * (129 / 104), 10);
    });
});

describe('metrics', () => {
    it('computes the zigzag run', () => {
        const final = (124 / 105) * (129 / 104);
        const metrics = computeMetrics(runBacktest(frame, spec));

        expect(metrics.numTrades).toBe(2);
        expect(metrics.maxDrawdown).toBeCloseTo(-5 / 129, 10);
        expect(metrics.cagr).toBeCloseTo(final ** (252 / 90) - 1, 8);
        expect(metrics.sharpe).toBeGreaterThan(0);
    });

    it('handles degenerate inputs', () => {
        expect(computeCagr([])).toBe(0);
        expect(computeCagr([1, 0])).toBe(0);
        expect(computeSharpe([0.01])).toBe(0);
        expect(computeSharpe([0.01, 0.01])).toBe(0);
        expect(computeMaxDrawdown([])).toBe(0);
    });

    it('annualizes over 252 trading days', () => {
        const equity = Array.from({ length: 252 }, (_, i) => (i === 251 ? 1.1 : 1));
        expect(computeCagr(equity)).toBeCloseTo(0.1, 12);
    });

    it('measures drawdown from the running peak', () => {
        expect(computeMaxDrawdown([1, 1.2, 0.9, 1.3])).toBeCloseTo(-0.25, 12);
    });

    it('counts a position held from the first day as an entry', () => {
        const row = (position: 0 | 1) => ({ date: '2023-01-02', close: 1, position, strategyReturn: 0, equity: 1 });
        expect(countEntries({ rows: [row(1), row(1), row(0), row(1)] })).toBe(2);
    });
});

describe('extractTrades', () => {
    const trades = extractTrades(frame, runBacktest(frame, spec), spec);

    it('logs a closed trade with reasons', () => {
        expect(trades[0]).toEqual({
            entryDate: '2023-01-07',
            entryPrice: 105,
            entryReason: 'Entry: 5-day MA (103.00) crossed above 10-day MA (102.50)',
            exitDate: '2023-02-05',
            exitPrice: 124,
            exitReason: 'Exit: 5-day MA (126.00) crossed below 10-day MA (126.50)',
            pnlPct: expect.closeTo((124 / 105 - 1) * 100, 10),
            holdingDays: 29,
        });
    });

    it('closes a position still open at the end of the period', () => {
        expect(trades).toHaveLength(2);
        expect(trades[1]).toMatchObject({
            entryDate: '2023-03-07',
            entryPrice: 104,
            entryReason: 'Entry: 5-day MA (102.00) crossed above 10-day MA (101.50)',
            exitDate: '2023-04-01',
            exitPrice: 129,
            exitReason: STILL_HOLDING_REASON,
            holdingDays: 25,
        });
        expect(trades[1].pnlPct).toBeCloseTo((129 / 104 - 1) * 100, 10);
    });

    it('is empty when nothing was bought', () => {
        const falling = addFeatures(seriesFrom(Array.from({ length: 30 }, (_, i) => 200 - i)), spec);
        expect(extractTrades(falling, runBacktest(falling, spec), spec)).toEqual([]);
    });
});
