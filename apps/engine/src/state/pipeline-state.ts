import {
    ConfirmationInput,
    FeatureFrame,
    LlmUsageRecord,
    Metrics,
    PriceSeries,
    RunOutput,
    StrategySpec,
    Trade,
    ValidationResult,
} from '@stratflow/sdk';
import { sessionStatus } from '../db/checkpoint.entity';
import { StateConsistencyError } from '../errors';

export const NODE_ORDER = [
    'translate',
    'interpret',
    'validate',
    'fetch_data',
    'add_features',
    'pre_qa',
    'backtest',
    'metrics',
    'trades',
    'explain',
] as const;

export type NodeName = (typeof NODE_ORDER)[number];

/** One optional field per known output. Each field has exactly one writer (see PAYLOAD_OWNERS). */
export interface PipelinePayload {
    spec?: StrategySpec;
    interpretation?: string;
    validation?: ValidationResult;
    series?: PriceSeries;
    features?: FeatureFrame;
    dataValidation?: ValidationResult;
    run?: RunOutput;
    metrics?: Metrics;
    trades?: Trade[];
    explanation?: string;
}

export type PayloadField = keyof PipelinePayload;

export const PAYLOAD_OWNERS: { readonly [K in PayloadField]-?: NodeName } = {
    spec: 'translate',
    interpretation: 'interpret',
    validation: 'validate',
    series: 'fetch_data',
    features: 'add_features',
    dataValidation: 'pre_qa',
    run: 'backtest',
    metrics: 'metrics',
    trades: 'trades',
    explanation: 'explain',
};

/** Recomputed after a crash rather than checkpointed. */
export const TRANSIENT_FIELDS = ['series', 'features', 'run'] as const;
export type TransientField = (typeof TRANSIENT_FIELDS)[number];

export interface StateIssue {
    node: NodeName | 'engine';
    code: string;
    message: string;
    at: string;
}

export interface PipelineInput {
    text: string;
    model: string;
}

export interface PipelineState {
    readonly sessionId: string;
    /** Last fully completed node. */
    stepCursor: NodeName | null;
    status: sessionStatus;
    input: PipelineInput;
    payload: PipelinePayload;
    errors: StateIssue[];
    warnings: StateIssue[];
    retryCounts: Partial<Record<NodeName, number>>;
    /** Every model call the session paid for, across retries and resets. */
    usage: LlmUsageRecord[];
    pendingInput: ConfirmationInput | null;
    /** The last human input consumed by the router. */
    confirmation: ConfirmationInput | null;
    /** Node the router designated next while running; null once parked or terminal. */
    pendingNode: NodeName | null;
    createdAt: string;
    updatedAt: string;
}

export function isNodeName(value: string): value is NodeName {
    return NODE_ORDER.some(name => name === value);
}

export function isPayloadField(value: string): value is PayloadField {
    return Object.prototype.hasOwnProperty.call(PAYLOAD_OWNERS, value);
}

export function isTerminal(status: sessionStatus): boolean {
    return status === sessionStatus.COMPLETED || status === sessionStatus.FAILED;
}

export function createInitialState(sessionId: string, input: PipelineInput, now: Date = new Date()): PipelineState {
    const at = now.toISOString();
    return {
        sessionId,
        stepCursor: null,
        status: sessionStatus.RUNNING,
        input: { ...input },
        payload: {},
        errors: [],
        warnings: [],
        retryCounts: {},
        usage: [],
        pendingInput: null,
        confirmation: null,
        pendingNode: null,
        createdAt: at,
        updatedAt: at,
    };
}

function assertWritable(state: PipelineState): void {
    if (isTerminal(state.status)) {
        throw new StateConsistencyError(`Session ${state.sessionId} is ${state.status}; terminal state is immutable`);
    }
}

/** Merge a node's updates into the payload after checking that the node owns every field it writes. */
export function applyNodeUpdates(state: PipelineState, node: NodeName, updates: Partial<PipelinePayload>): void {
    assertWritable(state);
    for (const field of Object.keys(updates)) {
        if (!isPayloadField(field)) {
            throw new StateConsistencyError(`Node ${node} wrote unknown field "${field}"`);
        }
        if (PAYLOAD_OWNERS[field] !== node) {
            throw new StateConsistencyError(`Node ${node} wrote "${field}", which is owned by ${PAYLOAD_OWNERS[field]}`);
        }
    }
    state.payload = { ...state.payload, ...updates };
}

export function recordIssue(
    state: PipelineState,
    kind: 'errors' | 'warnings',
    issue: Omit<StateIssue, 'at'>,
    now: Date = new Date(),
): void {
    assertWritable(state);
    state[kind].push({ ...issue, at: now.toISOString() });
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) deepFreeze(child);
    }
    return value;
}

/** Terminal states are handed out deep-frozen. */
export function freezeTerminal(state: PipelineState): Readonly<PipelineState> {
    if (!isTerminal(state.status)) {
        throw new StateConsistencyError(`Session ${state.sessionId} is ${state.status}, not terminal`);
    }
    return deepFreeze(state);
}
