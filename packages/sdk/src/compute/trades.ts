import { FeatureFrame, RunOutput, Trade } from '../types';
import { StrategySpec } from '../strategy/spec';
import { describeRule, entryReasons, firingExitRule } from '../strategy/rules';

export const STILL_HOLDING_REASON = 'End of backtest period (still holding)';

interface OpenTrade {
    index: number;
    price: number;
    reason: string;
}

function close(open: OpenTrade, frame: FeatureFrame, exitIdx: number, reason: string): Trade {
    const exit = frame[exitIdx];
    return {
        entryDate: frame[open.index].date,
        entryPrice: open.price,
        entryReason: open.reason,
        exitDate: exit.date,
        exitPrice: exit.close,
        exitReason: reason,
        pnlPct: (exit.close / open.price - 1) * 100,
        holdingDays: exitIdx - open.index,
    };
}

/** Trade log with human-readable reasons, following the position changes of the run. */
export function extractTrades(frame: FeatureFrame, run: RunOutput, spec: StrategySpec): Trade[] {
    const trades: Trade[] = [];
    let open: OpenTrade | null = null;

    for (let i = 0; i < run.rows.length; i++) {
        const position = run.rows[i].position;
        if (open === null && position === 1) {
            const reasons = entryReasons(spec, frame, i);
            open = { index: i, price: frame[i].close, reason: reasons.join(' | ') || 'All entry rules satisfied' };
        } else if (open !== null && position === 0) {
            const rule = firingExitRule(spec, frame, i);
            const reason = rule ? describeRule(rule, frame, i, 'Exit') : 'Exit rule triggered';
            trades.push(close(open, frame, i, reason));
            open = null;
        }
    }

    if (open !== null && frame.length > 0) {
        trades.push(close(open, frame, frame.length - 1, STILL_HOLDING_REASON));
    }
    return trades;
}
