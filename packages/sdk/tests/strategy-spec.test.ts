import { InvalidInputError, parseStrategySpec, toSpecJson } from '../src';

const raw = () => ({
    ticker: ' aapl ',
    start_date: '2020-01-01',
    end_date: '2024-01-01',
    entry_rules: [{ type: 'crossover', fast_ma: '10', slow_ma: 50, direction: 'above', lookahead_days: 3 }],
    exit_rules: [{ type: 'vol_filter', window: 20, threshold: 'median_1y', relation: 'above', duration_days: 2 }],
});

describe('parseStrategySpec', () => {
    it('maps snake_case model output onto a StrategySpec', () => {
        expect(parseStrategySpec(raw())).toEqual({
            ticker: 'AAPL',
            startDate: '2020-01-01',
            endDate: '2024-01-01',
            entryRules: [{ type: 'crossover', fastMa: 10, slowMa: 50, direction: 'above', lookaheadDays: 3 }],
            exitRules: [{ type: 'vol_filter', window: 20, threshold: 'median_1y', relation: 'above', durationDays: 2 }],
            metrics: ['cagr', 'max_drawdown', 'sharpe'],
            entrySequential: false,
        });
    });

    it('defaults vol filter threshold and relation', () => {
        const spec = parseStrategySpec({
            ...raw(),
            exit_rules: [{ type: 'vol_filter', window: 20 }],
            metrics: ['sharpe'],
            entry_sequential: true,
        });

        expect(spec.exitRules).toEqual([{ type: 'vol_filter', window: 20, threshold: 'median_1y', relation: 'below' }]);
        expect(spec.metrics).toEqual(['sharpe']);
        expect(spec.entrySequential).toBe(true);
    });

    it('rejects placeholder dates with a hint', () => {
        expect(() => parseStrategySpec({ ...raw(), start_date: 'YYYY-MM-DD' })).toThrow(InvalidInputError);
        expect(() => parseStrategySpec({ ...raw(), start_date: 'YYYY-MM-DD' })).toThrow(/invalid start_date\. Your prompt is missing dates/);
        expect(() => parseStrategySpec({ ...raw(), end_date: '' })).toThrow(/invalid end_date/);
    });

    it('rejects dates that do not exist', () => {
        expect(() => parseStrategySpec({ ...raw(), end_date: '2023-02-30' })).toThrow(/Invalid date format in spec: end_date/);
    });

    it('requires entry and exit rules', () => {
        expect(() => parseStrategySpec({ ...raw(), exit_rules: [] })).toThrow('At least one exit rule is required.');
        expect(() => parseStrategySpec({ ...raw(), entry_rules: [] })).toThrow('At least one entry rule is required.');
    });

    it('rejects unknown rule types and incomplete crossovers', () => {
        expect(() => parseStrategySpec({ ...raw(), entry_rules: [{ type: 'rsi', period: 14 }] })).toThrow(/does not match schema/);
        expect(() => parseStrategySpec({ ...raw(), entry_rules: [{ type: 'crossover', fast_ma: 10, slow_ma: 50 }] })).toThrow(
            InvalidInputError,
        );
    });

    it('rejects non-objects', () => {
        expect(() => parseStrategySpec('not a spec')).toThrow(InvalidInputError);
        expect(() => parseStrategySpec(null)).toThrow(InvalidInputError);
    });
});

describe('toSpecJson', () => {
    it('writes the model-facing snake_case shape', () => {
        const spec = parseStrategySpec({ ...raw(), entry_sequential: true });

        expect(toSpecJson(spec)).toEqual({
            ticker: 'AAPL',
            start_date: '2020-01-01',
            end_date: '2024-01-01',
            entry_rules: [{ type: 'crossover', fast_ma: 10, slow_ma: 50, direction: 'above', lookahead_days: 3 }],
            exit_rules: [{ type: 'vol_filter', window: 20, threshold: 'median_1y', relation: 'above', duration_days: 2 }],
            metrics: ['cagr', 'max_drawdown', 'sharpe'],
            entry_sequential: true,
        });
    });

    it('leaves entry_sequential out when false', () => {
        expect(toSpecJson(parseStrategySpec(raw()))).not.toHaveProperty('entry_sequential');
    });
});
