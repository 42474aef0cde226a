import { FeatureFrame, PriceSeries } from '../types';
import { StrategySpec, maKey, rvKey, rvMedianKey } from '../strategy/spec';

const ANNUALIZATION = Math.sqrt(252);
const MEDIAN_WINDOW = 252;

export function requiredMaWindows(spec: StrategySpec): number[] {
    const windows = new Set<number>();
    for (const rule of [...spec.entryRules, ...spec.exitRules]) {
        if (rule.type === 'crossover') {
            windows.add(rule.fastMa);
            windows.add(rule.slowMa);
        }
    }
    return [...windows];
}

export function requiredVolWindows(spec: StrategySpec): number[] {
    const windows = new Set<number>();
    for (const rule of [...spec.entryRules, ...spec.exitRules]) {
        if (rule.type === 'vol_filter') windows.add(rule.window);
    }
    return [...windows];
}

/** Trailing mean over up to `window` values; partial windows at the start are averaged as-is. */
export function rollingMean(values: number[], window: number): number[] {
    const out: number[] = [];
    let sum = 0;
    for (let i = 0; i < values.length; i++) {
        sum += values[i];
        if (i >= window) sum -= values[i - window];
        out.push(sum / Math.min(i + 1, window));
    }
    return out;
}

/** Trailing sample standard deviation; null until two values are available. */
export function rollingStd(values: number[], window: number): (number | null)[] {
    return values.map((_, i) => {
        const slice = values.slice(Math.max(0, i - window + 1), i + 1);
        if (slice.length < 2) return null;
        const mean = slice.reduce((acc, v) => acc + v, 0) / slice.length;
        const variance = slice.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (slice.length - 1);
        return Math.sqrt(variance);
    });
}

/** Trailing median over the non-null values of the window. */
export function rollingMedian(values: (number | null)[], window: number): (number | null)[] {
    return values.map((_, i) => {
        const slice = values
            .slice(Math.max(0, i - window + 1), i + 1)
            .filter((v): v is number => v !== null)
            .sort((a, b) => a - b);
        if (slice.length === 0) return null;
        const mid = Math.floor(slice.length / 2);
        return slice.length % 2 === 1 ? slice[mid] : (slice[mid - 1] + slice[mid]) / 2;
    });
}

/**
 * Adds daily returns plus every indicator the strategy's rules read:
 * `ma_{w}` moving averages and `rv_{w}` annualized realized volatility with its
 * trailing one-year median `rv_{w}_med_252`.
 */
export function addFeatures(series: PriceSeries, spec: StrategySpec): FeatureFrame {
    const closes = series.map(bar => bar.close);
    const returns = closes.map((close, i) => (i === 0 ? 0 : close / closes[i - 1] - 1));

    const columns: Record<string, (number | null)[]> = {};
    for (const window of requiredMaWindows(spec)) {
        columns[maKey(window)] = rollingMean(closes, window);
    }
    for (const window of requiredVolWindows(spec)) {
        const rv = rollingStd(returns, window).map(v => (v === null ? null : v * ANNUALIZATION));
        columns[rvKey(window)] = rv;
        columns[rvMedianKey(window)] = rollingMedian(rv, MEDIAN_WINDOW);
    }

    return series.map((bar, i) => {
        const values: Record<string, number | null> = {};
        for (const [key, column] of Object.entries(columns)) values[key] = column[i];
        return { ...bar, ret: returns[i], values };
    });
}
