import { Metrics, RunOutput } from '../types';

const TRADING_DAYS_PER_YEAR = 252;

export function computeCagr(equity: number[]): number {
    if (equity.length === 0) return 0;
    const start = equity[0];
    const end = equity[equity.length - 1];
    if (start <= 0 || end <= 0) return 0;
    const years = equity.length / TRADING_DAYS_PER_YEAR;
    return (end / start) ** (1 / years) - 1;
}

export function computeMaxDrawdown(equity: number[]): number {
    let peak = Number.NEGATIVE_INFINITY;
    let worst = 0;
    for (const value of equity) {
        peak = Math.max(peak, value);
        worst = Math.min(worst, value / peak - 1);
    }
    return worst;
}

/** Annualized Sharpe of daily returns (sample std, no risk-free rate); 0 when returns are flat. */
export function computeSharpe(returns: number[]): number {
    if (returns.length < 2) return 0;
    const mean = returns.reduce((acc, r) => acc + r, 0) / returns.length;
    const variance = returns.reduce((acc, r) => acc + (r - mean) ** 2, 0) / (returns.length - 1);
    const std = Math.sqrt(variance);
    if (std === 0) return 0;
    return (mean / std) * Math.sqrt(TRADING_DAYS_PER_YEAR);
}

/** Number of flat-to-long transitions, counting a position already open on the first day. */
export function countEntries(run: RunOutput): number {
    return run.rows.reduce((count, row, i) => {
        const before = i === 0 ? 0 : run.rows[i - 1].position;
        return row.position === 1 && before === 0 ? count + 1 : count;
    }, 0);
}

export function computeMetrics(run: RunOutput): Metrics {
    const equity = run.rows.map(row => row.equity);
    return {
        cagr: computeCagr(equity),
        maxDrawdown: computeMaxDrawdown(equity),
        sharpe: computeSharpe(run.rows.map(row => row.strategyReturn)),
        numTrades: countEntries(run),
    };
}
