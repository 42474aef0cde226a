export { PipelineEngine } from './pipeline-engine';
export type { StartInput, NodeSettledEvent, PipelineEngineOptions, CancelResult } from './pipeline-engine';
export { Router, goto, suspend, terminate } from './router';
export type { Decision, Edge, GotoDecision, GotoOptions } from './router';
export { executeWithRetry, delayAfterAttempt, isLlmCallRetryable, isNetworkRetryable } from './retry-policy';
export type { RetryPolicy, RetryHooks, Result } from './retry-policy';
export { SessionLock } from './session-lock';
export { CheckpointReaper } from './reaper';
