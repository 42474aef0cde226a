import { Metrics } from '../types';
import { StrategySpec, toSpecJson } from '../strategy/spec';

export const TRANSLATOR_SYSTEM = `
You are a trading strategy specification generator.

Read a natural-language description of a single-asset, long-only backtest and
convert it into one JSON object of this shape:

{
  "ticker": "AAPL",
  "start_date": "YYYY-MM-DD",
  "end_date": "YYYY-MM-DD",
  "entry_rules": [
    { "type": "crossover", "fast_ma": 10, "slow_ma": 50, "direction": "above", "lookahead_days": 3 },
    { "type": "vol_filter", "window": 20, "threshold": "median_1y", "relation": "below" }
  ],
  "exit_rules": [
    { "type": "crossover", "fast_ma": 10, "slow_ma": 50, "direction": "below", "duration_days": 2 }
  ],
  "entry_sequential": true,
  "metrics": ["cagr", "max_drawdown", "sharpe"]
}

Rules:
- One ticker only. Long-only, no leverage.
- Only moving-average crossover rules and volatility filters comparing realized
  volatility to its 1-year median.
- Approximate unsupported requests with the supported rules, but never change
  numeric parameters or dates the user gave.
- Dates are ISO 8601 (YYYY-MM-DD).
- Always include at least one entry rule and one exit rule.
- Default metrics are ["cagr", "max_drawdown", "sharpe"].
- Do not add rules the user did not ask for, and do not drop rules they did.

Temporal fields:
- "lookahead_days" when the user says "within the next N days" or similar.
- "duration_days" when the user says "for N consecutive days" or "N days in a row".
- "entry_sequential": true only when entry conditions are described as
  "first A, then B". It never applies to exit rules.

Output a single JSON object with no commentary.
`.trim();

export function translatorUserPrompt(text: string): string {
    return `User strategy description:\n\n"""${text}"""\n`;
}

export const INTERPRETER_SYSTEM = `
You explain how a natural-language strategy description was interpreted into a
structured trading strategy specification.

Summarize the interpretation (ticker, dates, entry rules, exit rules, metrics) and
mention only ambiguities that would make the backtest fail or give wrong results.
Do not ask about features the user did not mention, and do not list standard
defaults. Be brief, friendly and plain.
`.trim();

export function interpreterUserPrompt(text: string, spec: StrategySpec): string {
    return [
        'Original user description:',
        '',
        `"${text}"`,
        '',
        'Parsed strategy specification (JSON):',
        '',
        '```json',
        JSON.stringify(toSpecJson(spec), null, 2),
        '```',
        '',
        '1. **How I interpreted this strategy**: ticker, date range, entry rules, exit rules and metrics.',
        '2. **Critical ambiguities**: only if they would prevent execution; omit the section otherwise.',
    ].join('\n');
}

export const EXPLAINER_SYSTEM = `
You are a trading strategy performance explainer.

Given a single-asset, long-only strategy and its metrics (CAGR, max drawdown,
Sharpe, number of trades), write at most 200 words for a retail trader. Say whether
performance was strong or weak, how risky it was, how often it traded and any
obvious caveats such as very few trades. No code or JSON in the answer.
`.trim();

export function explainerUserPrompt(spec: StrategySpec, metrics: Metrics): string {
    const payload = {
        strategy_spec: toSpecJson(spec),
        metrics: {
            cagr: metrics.cagr,
            max_drawdown: metrics.maxDrawdown,
            sharpe: metrics.sharpe,
            num_trades: metrics.numTrades,
        },
    };
    return `Here is the strategy spec and its performance metrics. Explain the results clearly but briefly.\n\n${JSON.stringify(payload, null, 2)}`;
}
