export type LlmTask = 'translation' | 'interpretation' | 'explanation';

export interface TokenUsage {
    inputTokens: number;
    outputTokens: number;
}

/** USD per 1M tokens. */
export interface ModelPrice {
    input: number;
    output: number;
}

export const MODEL_PRICING: Readonly<Record<string, ModelPrice>> = {
    'gpt-4o-mini': { input: 0.15, output: 0.6 },
    'gpt-4o': { input: 2.5, output: 10 },
    'gpt-4': { input: 30, output: 60 },
    'gpt-4-turbo': { input: 10, output: 30 },
    'gpt-3.5-turbo': { input: 0.5, output: 1.5 },
};

/** Unpriced models cost 0. */
export function calculateCost(
    model: string,
    usage: TokenUsage,
    pricing: Readonly<Record<string, ModelPrice>> = MODEL_PRICING,
): number {
    const price = pricing[model];
    if (!price) return 0;
    return (usage.inputTokens / 1_000_000) * price.input + (usage.outputTokens / 1_000_000) * price.output;
}

/** One model call, successful or not. */
export interface LlmUsageRecord {
    task: LlmTask;
    model: string;
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    costUsd: number;
    latencyMs: number;
    success: boolean;
    error?: string;
    /** ISO timestamp of when the call finished. */
    at: string;
}

export type UsageSink = (record: LlmUsageRecord) => void;

export function usageRecord(
    task: LlmTask,
    model: string,
    usage: TokenUsage | undefined,
    latencyMs: number,
    error: Error | undefined,
    at: Date,
): LlmUsageRecord {
    const inputTokens = usage?.inputTokens ?? 0;
    const outputTokens = usage?.outputTokens ?? 0;
    const record: LlmUsageRecord = {
        task,
        model,
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
        costUsd: calculateCost(model, { inputTokens, outputTokens }),
        latencyMs,
        success: error === undefined,
        at: at.toISOString(),
    };
    if (error !== undefined) record.error = error.message;
    return record;
}

export interface UsageSummary {
    calls: number;
    failures: number;
    totalTokens: number;
    costUsd: number;
    latencyMs: number;
}

export function summarizeUsage(records: readonly LlmUsageRecord[]): UsageSummary {
    return records.reduce<UsageSummary>(
        (sum, r) => ({
            calls: sum.calls + 1,
            failures: sum.failures + (r.success ? 0 : 1),
            totalTokens: sum.totalTokens + r.totalTokens,
            costUsd: sum.costUsd + r.costUsd,
            latencyMs: sum.latencyMs + r.latencyMs,
        }),
        { calls: 0, failures: 0, totalTokens: 0, costUsd: 0, latencyMs: 0 },
    );
}
