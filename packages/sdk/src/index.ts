export * from './types';
export * from './errors';
export * from './strategy/spec';
export { parseStrategySpec } from './strategy/parse';
export {
    conditionAt,
    evaluateRule,
    entrySignal,
    exitSignal,
    firingExitRule,
    describeRule,
    entryReasons,
} from './strategy/rules';
export { validateStructure, validateWithData, defaultValidator } from './strategy/validator';
export { addFeatures, rollingMean, rollingStd, rollingMedian } from './compute/features';
export { runBacktest } from './compute/backtester';
export { computeMetrics, computeCagr, computeMaxDrawdown, computeSharpe, countEntries } from './compute/metrics';
export { extractTrades, STILL_HOLDING_REASON } from './compute/trades';
export { createTranslator, createInterpreter, createExplainer } from './llm/collaborators';
export type { Completion, CompletionFn, CompletionRequest, LlmClientOptions } from './llm/collaborators';
export { MODEL_PRICING, calculateCost, summarizeUsage, usageRecord } from './llm/usage';
export type { LlmTask, LlmUsageRecord, ModelPrice, TokenUsage, UsageSink, UsageSummary } from './llm/usage';
export { serialize, deserialize, SerializationError, MAX_PAYLOAD_SIZE } from './utils/serialization';
