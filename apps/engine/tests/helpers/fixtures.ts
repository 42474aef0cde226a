import { CallOptions, DateRange, LlmCallOptions, Metrics, PriceSeries, StrategySpec, addFeatures, computeMetrics, defaultValidator, extractTrades, runBacktest } from '@stratflow/sdk';
import { NodePolicies } from '../../src/config';
import { NodeContext } from '../../src/nodes/node';
import { StrategyEngineOptions, createStrategyEngine } from '../../src/pipeline';
import { InMemoryCheckpointStore } from '../../src/repositories/checkpoint.repository';
import { isLlmCallRetryable, isNetworkRetryable } from '../../src/services/retry-policy';
import { SessionLock } from '../../src/services/session-lock';

export const STRATEGY_TEXT = 'Buy TEST when the 5-day MA crosses above the 10-day MA, sell on the cross back down, 2023-01-02 to 2023-04-01';

export function dateAt(i: number): string {
    return new Date(Date.UTC(2023, 0, 2 + i)).toISOString().slice(0, 10);
}

export function seriesFrom(closes: number[]): PriceSeries {
    return closes.map((close, i) => ({ date: dateAt(i), open: close, high: close, low: close, close, volume: 1_000 }));
}

/** 90 days: up 100→129, down 128→99, up 100→129. Two trades on a 5/10 crossover, the second still open at the end. */
export function zigzagSeries(): PriceSeries {
    return seriesFrom(Array.from({ length: 90 }, (_, i) => (i < 30 ? 100 + i : i < 60 ? 158 - i : i + 40)));
}

export function fallingSeries(): PriceSeries {
    return seriesFrom(Array.from({ length: 30 }, (_, i) => 200 - i));
}

export function strategySpec(overrides: Partial<StrategySpec> = {}): StrategySpec {
    return {
        ticker: 'TEST',
        startDate: '2023-01-02',
        endDate: '2023-04-01',
        entryRules: [{ type: 'crossover', fastMa: 5, slowMa: 10, direction: 'above' }],
        exitRules: [{ type: 'crossover', fastMa: 5, slowMa: 10, direction: 'below' }],
        metrics: ['cagr', 'max_drawdown', 'sharpe'],
        entrySequential: false,
        ...overrides,
    };
}

export const INTERPRETATION = 'Buys TEST when the 5-day average crosses above the 10-day average.';
export const EXPLANATION = 'Two trades, both profitable.';

export function fakeCollaborators() {
    return {
        translator: jest.fn(async (_text: string, _model: string, _options?: LlmCallOptions) => strategySpec()),
        interpreter: jest.fn(async (_text: string, _spec: StrategySpec, _model: string, _options?: LlmCallOptions) => INTERPRETATION),
        explainer: jest.fn(async (_spec: StrategySpec, _metrics: Metrics, _model: string, _options?: LlmCallOptions) => EXPLANATION),
        dataSource: jest.fn(async (_ticker: string, _range: DateRange, _options?: CallOptions) => zigzagSeries()),
    };
}

export type FakeCollaborators = ReturnType<typeof fakeCollaborators>;

/** Three attempts, no delay between them. */
export function instantPolicies(maxAttempts = 3): NodePolicies {
    const base = { maxAttempts, baseDelayMs: 0, maxDelayMs: 0 };
    return {
        llm: { ...base, retryable: isLlmCallRetryable },
        network: { ...base, retryable: isNetworkRetryable },
    };
}

export function nodeContext(collaborators: FakeCollaborators = fakeCollaborators()): NodeContext {
    return {
        collaborators: {
            ...collaborators,
            validator: defaultValidator,
            buildFeatures: addFeatures,
            backtester: runBacktest,
            metricsCalc: computeMetrics,
            tradeExtractor: extractTrades,
        },
        policies: instantPolicies(),
        retryHooks: { sleep: async () => undefined },
    };
}

export function testEngine(collaborators: FakeCollaborators = fakeCollaborators(), options: StrategyEngineOptions = {}) {
    const store = options.store ?? new InMemoryCheckpointStore();
    const lock = options.lock ?? new SessionLock();
    const engine = createStrategyEngine(collaborators, {
        policies: instantPolicies(),
        retryHooks: { sleep: async () => undefined },
        checkpointEachStep: true,
        defaultModel: 'test-model',
        ...options,
        store,
        lock,
    });
    return { engine, store, lock, collaborators };
}
