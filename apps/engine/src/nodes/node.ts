import { Collaborators, LlmUsageRecord } from '@stratflow/sdk';
import { NodePolicies } from '../config';
import { Attempt, Result, RetryHooks, executeWithRetry } from '../services/retry-policy';
import { NodeName, PayloadField, PipelinePayload, PipelineState } from '../state/pipeline-state';

export interface IssueDetail {
    code: string;
    message: string;
}

export type Outcome =
    | { kind: 'success' }
    | { kind: 'soft_failure'; warnings: IssueDetail[] }
    | { kind: 'hard_failure'; errors: IssueDetail[]; warnings: IssueDetail[]; cause?: Error };

export type OutcomeKind = Outcome['kind'];

export const success = (): Outcome => ({ kind: 'success' });

export const softFailure = (...warnings: IssueDetail[]): Outcome => ({ kind: 'soft_failure', warnings });

export function hardFailure(errors: IssueDetail[], options: { warnings?: IssueDetail[]; cause?: Error } = {}): Outcome {
    return { kind: 'hard_failure', errors, warnings: options.warnings ?? [], cause: options.cause };
}

/** Error class `code` when it has one, else a generic tag. */
export function issueFrom(err: Error, message: string = err.message): IssueDetail {
    const code: unknown = Reflect.get(err, 'code');
    return { code: typeof code === 'string' ? code : 'NODE_ERROR', message };
}

export interface NodeResult {
    updates: Partial<PipelinePayload>;
    outcome: Outcome;
    /** Attempts made by the node's retried call, when it has one. */
    attempts?: number;
    /** Model calls made while running, one record per attempt. */
    usage?: LlmUsageRecord[];
}

export interface NodeContext {
    collaborators: Collaborators;
    policies: NodePolicies;
    retryHooks?: Pick<RetryHooks, 'sleep' | 'onRetry'>;
}

export enum nodeExecutionStatus {
    RUNNING = 'running',
    SUCCEEDED = 'succeeded',
    SOFT_FAILED = 'soft_failed',
    HARD_FAILED = 'hard_failed',
}

export function settledStatus(outcome: Outcome): nodeExecutionStatus {
    switch (outcome.kind) {
        case 'success':
            return nodeExecutionStatus.SUCCEEDED;
        case 'soft_failure':
            return nodeExecutionStatus.SOFT_FAILED;
        case 'hard_failure':
            return nodeExecutionStatus.HARD_FAILED;
    }
}

/**
 * A single named unit of work. `run` reads the state and returns the fields
 * it owns; it never mutates the state it is given.
 */
export interface PipelineNode {
    readonly name: NodeName;
    readonly writes: readonly PayloadField[];
    /** Fields that must be present before the node can run. */
    readonly requires: readonly PayloadField[];
    run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult>;
}

/** Hard failure for a node whose precondition fields are missing. */
export function missingInputs(node: PipelineNode, state: Readonly<PipelineState>): NodeResult {
    const missing = node.requires.filter(field => state.payload[field] === undefined);
    return {
        updates: {},
        outcome: hardFailure([{ code: 'MISSING_INPUT', message: `${node.name} failed: missing ${missing.join(', ')}` }]),
    };
}

/** Run an external call through the node's retry policy. */
export function callWithRetry<T>(
    ctx: NodeContext,
    policy: keyof NodeContext['policies'],
    label: NodeName,
    operation: Attempt<T>,
): Promise<Result<T>> {
    return executeWithRetry(operation, ctx.policies[policy], { ...ctx.retryHooks, label });
}

/** Collects the usage records of every attempt a node makes. */
export function usageLog(): { records: LlmUsageRecord[]; onUsage: (record: LlmUsageRecord) => void } {
    const records: LlmUsageRecord[] = [];
    return { records, onUsage: record => records.push(record) };
}

export function failureMessage(node: NodeName, err: Error): string {
    return `${node} failed: ${err.message}`;
}
