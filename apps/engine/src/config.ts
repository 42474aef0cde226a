import 'dotenv/config';
import { RetryPolicy, isLlmCallRetryable, isNetworkRetryable } from './services/retry-policy';

// Central Configuration
export const config = {
    retryMaxAttempts: parseInt(process.env.RETRY_MAX_ATTEMPTS || '3', 10),
    retryDelayUnitMs: parseInt(process.env.RETRY_DELAY_UNIT_MS || '1000', 10),
    retryBaseDelayUnits: parseInt(process.env.RETRY_BASE_DELAY_UNITS || '1', 10),
    retryMaxDelayUnits: parseInt(process.env.RETRY_MAX_DELAY_UNITS || '4', 10),
    llmTimeoutMs: parseInt(process.env.LLM_TIMEOUT_MS || '60000', 10),
    dataTimeoutMs: parseInt(process.env.DATA_TIMEOUT_MS || '30000', 10),
    checkpointTtlMs: parseInt(process.env.CHECKPOINT_TTL_MS || '86400000', 10),
    reaperIntervalMs: parseInt(process.env.REAPER_INTERVAL_MS || '60000', 10),
    checkpointEachStep: (process.env.CHECKPOINT_EACH_STEP || 'true') !== 'false',
    defaultModel: process.env.DEFAULT_MODEL || 'gpt-4o-mini',
    maxCheckpointBytes: parseInt(process.env.MAX_CHECKPOINT_BYTES || String(1024 * 1024), 10),
};

export interface NodePolicies {
    llm: RetryPolicy;
    network: RetryPolicy;
}

export function defaultPolicies(): NodePolicies {
    const base = {
        maxAttempts: config.retryMaxAttempts,
        baseDelayMs: config.retryBaseDelayUnits * config.retryDelayUnitMs,
        maxDelayMs: config.retryMaxDelayUnits * config.retryDelayUnitMs,
    };
    return {
        llm: { ...base, retryable: isLlmCallRetryable, timeoutMs: config.llmTimeoutMs },
        network: { ...base, retryable: isNetworkRetryable, timeoutMs: config.dataTimeoutMs },
    };
}
