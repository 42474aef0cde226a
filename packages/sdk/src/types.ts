import { UsageSink } from './llm/usage';
import { StrategySpec } from './strategy/spec';

export interface PriceBar {
    /** YYYY-MM-DD */
    date: string;
    open: number;
    high: number;
    low: number;
    close: number;
    volume: number;
}

export type PriceSeries = PriceBar[];

export interface FeatureRow extends PriceBar {
    /** Daily close-to-close return, 0 on the first row. */
    ret: number;
    /** Named features (`ma_10`, `rv_20`, `rv_20_med_252`); null while the window is not yet filled. */
    values: Record<string, number | null>;
}

export type FeatureFrame = FeatureRow[];

export interface RunRow {
    date: string;
    close: number;
    /** 1 when long at the close of this day, 0 when flat. */
    position: 0 | 1;
    strategyReturn: number;
    equity: number;
}

export interface RunOutput {
    rows: RunRow[];
}

export interface Metrics {
    cagr: number;
    maxDrawdown: number;
    sharpe: number;
    numTrades: number;
}

export interface Trade {
    entryDate: string;
    entryPrice: number;
    entryReason: string;
    exitDate: string;
    exitPrice: number;
    exitReason: string;
    /** Percent, e.g. 4.2 for +4.2% */
    pnlPct: number;
    holdingDays: number;
}

export interface ValidationResult {
    ok: boolean;
    errors: string[];
    warnings: string[];
}

export interface DateRange {
    start: string;
    end: string;
}

export interface CallOptions {
    /** Aborted when the attempt times out. */
    signal?: AbortSignal;
}

export interface LlmCallOptions extends CallOptions {
    /** Receives one record per model call, failed calls included. */
    onUsage?: UsageSink;
}

export type Translator = (text: string, model: string, options?: LlmCallOptions) => Promise<StrategySpec>;
export type Interpreter = (text: string, spec: StrategySpec, model: string, options?: LlmCallOptions) => Promise<string>;
export type Explainer = (spec: StrategySpec, metrics: Metrics, model: string, options?: LlmCallOptions) => Promise<string>;
export type DataSource = (ticker: string, range: DateRange, options?: CallOptions) => Promise<PriceSeries>;

export type FeatureBuilder = (series: PriceSeries, spec: StrategySpec) => FeatureFrame;
export type Backtester = (frame: FeatureFrame, spec: StrategySpec) => RunOutput;
export type MetricsCalc = (run: RunOutput) => Metrics;
export type TradeExtractor = (frame: FeatureFrame, run: RunOutput, spec: StrategySpec) => Trade[];

export interface Validator {
    validateStructure(spec: StrategySpec): ValidationResult;
    validateWithData(spec: StrategySpec, frame: FeatureFrame): ValidationResult;
}

/** Everything a strategy pipeline calls out to. */
export interface Collaborators {
    translator: Translator;
    interpreter: Interpreter;
    explainer: Explainer;
    dataSource: DataSource;
    validator: Validator;
    buildFeatures: FeatureBuilder;
    backtester: Backtester;
    metricsCalc: MetricsCalc;
    tradeExtractor: TradeExtractor;
}

export interface ConfirmationInput {
    confirmed: boolean;
    editedInput?: string;
}
