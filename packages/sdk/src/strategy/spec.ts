export type Direction = 'above' | 'below';

interface RuleTiming {
    /** Condition may hold on any of the next N trading days (inclusive of today). */
    lookaheadDays?: number;
    /** Condition must have held for N consecutive trading days ending today. */
    durationDays?: number;
}

export interface CrossoverRule extends RuleTiming {
    type: 'crossover';
    fastMa: number;
    slowMa: number;
    /** `above` means the fast MA is above the slow MA. */
    direction: Direction;
}

export interface VolFilterRule extends RuleTiming {
    type: 'vol_filter';
    window: number;
    threshold: 'median_1y';
    relation: Direction;
}

export type Rule = CrossoverRule | VolFilterRule;

export interface StrategySpec {
    ticker: string;
    /** ISO date, YYYY-MM-DD */
    startDate: string;
    /** ISO date, YYYY-MM-DD */
    endDate: string;
    entryRules: Rule[];
    exitRules: Rule[];
    metrics: string[];
    /** Entry rules must trigger in order: first rule today, the rest within their lookahead windows. */
    entrySequential: boolean;
}

export const DEFAULT_METRICS = ['cagr', 'max_drawdown', 'sharpe'];

export const maKey = (window: number): string => `ma_${window}`;
export const rvKey = (window: number): string => `rv_${window}`;
export const rvMedianKey = (window: number): string => `rv_${window}_med_252`;

/** Wire shape used in prompts and model output (snake_case). */
export function toSpecJson(spec: StrategySpec): Record<string, unknown> {
    const ruleJson = (rule: Rule): Record<string, unknown> => {
        const base: Record<string, unknown> = { type: rule.type };
        if (rule.lookaheadDays !== undefined) base.lookahead_days = rule.lookaheadDays;
        if (rule.durationDays !== undefined) base.duration_days = rule.durationDays;
        if (rule.type === 'crossover') {
            return { ...base, fast_ma: rule.fastMa, slow_ma: rule.slowMa, direction: rule.direction };
        }
        return { ...base, window: rule.window, threshold: rule.threshold, relation: rule.relation };
    };

    const json: Record<string, unknown> = {
        ticker: spec.ticker,
        start_date: spec.startDate,
        end_date: spec.endDate,
        entry_rules: spec.entryRules.map(ruleJson),
        exit_rules: spec.exitRules.map(ruleJson),
        metrics: [...spec.metrics],
    };
    if (spec.entrySequential) json.entry_sequential = true;
    return json;
}
