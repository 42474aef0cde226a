import { FeatureFrame, RunOutput, RunRow } from '../types';
import { StrategySpec } from '../strategy/spec';
import { entrySignal, exitSignal } from '../strategy/rules';

/**
 * Long-only, close-to-close backtest. Position changes at the close and earns
 * the next day's return: enter when the entry signal holds, exit when any exit rule fires.
 */
export function runBacktest(frame: FeatureFrame, spec: StrategySpec): RunOutput {
    const rows: RunRow[] = [];
    let position: 0 | 1 = 0;
    let previous: 0 | 1 = 0;
    let equity = 1;

    frame.forEach((row, i) => {
        if (position === 0 && entrySignal(spec, frame, i)) position = 1;
        else if (position === 1 && exitSignal(spec, frame, i)) position = 0;

        const strategyReturn = previous * row.ret;
        equity *= 1 + strategyReturn;
        rows.push({ date: row.date, close: row.close, position, strategyReturn, equity });
        previous = position;
    });

    return { rows };
}
