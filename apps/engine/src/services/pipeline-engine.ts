import { ConfirmationInput, summarizeUsage, toError } from '@stratflow/sdk';
import { v7 as uuid } from 'uuid';
import { config } from '../config';
import { sessionStatus } from '../db/checkpoint.entity';
import { ConcurrencyConflictError, SessionCancelledError, SessionNotFoundError, StateConsistencyError } from '../errors';
import {
    NodeContext,
    NodeResult,
    Outcome,
    failureMessage,
    hardFailure,
    issueFrom,
    nodeExecutionStatus,
    settledStatus,
} from '../nodes/node';
import { NodeRegistry } from '../nodes/registry';
import { CheckpointStore } from '../repositories/checkpoint.repository';
import {
    NodeName,
    PAYLOAD_OWNERS,
    PipelineState,
    TRANSIENT_FIELDS,
    TransientField,
    applyNodeUpdates,
    createInitialState,
    freezeTerminal,
    isTerminal,
    recordIssue,
} from '../state/pipeline-state';
import { Decision, GotoDecision, Router, goto, terminate } from './router';
import { SessionLock } from './session-lock';

const TAG = '[engine]';

export interface StartInput {
    text: string;
    model?: string;
    sessionId?: string;
    /** Pre-confirm the interpretation so the run does not park. */
    confirmed?: boolean;
}

export interface NodeSettledEvent {
    sessionId: string;
    node: NodeName;
    status: nodeExecutionStatus;
    attempts: number;
    outcome: Outcome;
}

export interface PipelineEngineOptions {
    /** Checkpoint after every routed step, not only at suspend/terminate. Needed for `recover`. */
    checkpointEachStep?: boolean;
    defaultModel?: string;
    onNodeSettled?: (event: NodeSettledEvent) => void;
    now?: () => Date;
}

export type CancelResult =
    | { kind: 'cancelled'; state: PipelineState }
    | { kind: 'requested' };

const isTransientField = (field: string): field is TransientField => TRANSIENT_FIELDS.some(name => name === field);

/**
 * Drives node → router → node for one session at a time per key. Suspends
 * and terminal states are checkpointed; a session can be resumed with human
 * input, recovered after a crash, or cancelled between nodes.
 */
export class PipelineEngine {
    private readonly cancelRequests = new Set<string>();
    private readonly checkpointEachStep: boolean;
    private readonly defaultModel: string;
    private readonly now: () => Date;

    constructor(
        private readonly registry: NodeRegistry,
        private readonly router: Router,
        private readonly store: CheckpointStore,
        private readonly lock: SessionLock,
        private readonly context: NodeContext,
        private readonly options: PipelineEngineOptions = {},
    ) {
        this.checkpointEachStep = options.checkpointEachStep ?? config.checkpointEachStep;
        this.defaultModel = options.defaultModel ?? config.defaultModel;
        this.now = options.now ?? (() => new Date());

        for (const name of router.nodes) {
            if (!registry.has(name)) throw new Error(`Router references unregistered node "${name}"`);
        }
    }

    async start(input: StartInput): Promise<{ sessionId: string; state: PipelineState }> {
        const sessionId = input.sessionId ?? uuid();
        const token = this.acquire(sessionId);

        try {
            if (await this.store.exists(sessionId)) {
                throw new StateConsistencyError(`Session ${sessionId} already exists`);
            }
            const state = createInitialState(sessionId, { text: input.text, model: input.model ?? this.defaultModel }, this.now());
            if (input.confirmed) state.pendingInput = { confirmed: true };

            const first = this.router.nodes[0];
            if (first === undefined) throw new Error('Pipeline has no nodes');

            console.log(`${TAG} session ${sessionId} started (model: ${state.input.model})`);
            return { sessionId, state: await this.drive(state, goto(first)) };
        } finally {
            this.exit(sessionId, token);
        }
    }

    async resume(sessionId: string, input: ConfirmationInput): Promise<PipelineState> {
        const token = this.acquire(sessionId);

        try {
            const state = await this.store.load(sessionId);
            if (!state) throw new SessionNotFoundError(sessionId);
            if (state.status !== sessionStatus.AWAITING_INPUT) {
                throw new StateConsistencyError(`Cannot resume session ${sessionId}: status is ${state.status}`);
            }
            const parkedAt = state.stepCursor;
            if (parkedAt === null) {
                throw new StateConsistencyError(`Session ${sessionId} is parked without a completed node`);
            }

            state.pendingInput = input.editedInput === undefined
                ? { confirmed: input.confirmed }
                : { confirmed: input.confirmed, editedInput: input.editedInput };
            state.status = sessionStatus.RUNNING;
            console.log(`${TAG} session ${sessionId} resumed at ${parkedAt} (confirmed: ${input.confirmed})`);

            // The edge owning the pause decides where to go with the input.
            return await this.drive(state, this.router.next(parkedAt, state, { kind: 'success' }));
        } finally {
            this.exit(sessionId, token);
        }
    }

    /**
     * Replays a session whose last checkpoint is still running (the process
     * died mid-run). Producers of recomputed fields run again first.
     */
    async recover(sessionId: string): Promise<PipelineState> {
        const token = this.acquire(sessionId);

        try {
            const state = await this.store.load(sessionId);
            if (!state) throw new SessionNotFoundError(sessionId);
            if (state.status !== sessionStatus.RUNNING) {
                throw new StateConsistencyError(`Cannot recover session ${sessionId}: status is ${state.status}`);
            }
            const next = state.pendingNode;
            if (next === null) {
                throw new StateConsistencyError(`Session ${sessionId} has no pending node to recover`);
            }

            console.log(`${TAG} session ${sessionId} recovering at ${next} (cursor: ${state.stepCursor ?? 'none'})`);
            return await this.drive(state, goto(next), true);
        } finally {
            this.exit(sessionId, token);
        }
    }

    /** Parked sessions fail now; running sessions stop at the next node boundary. */
    async cancel(sessionId: string): Promise<CancelResult> {
        const token = this.lock.tryAcquire(sessionId);
        if (token === null) {
            this.cancelRequests.add(sessionId);
            console.log(`${TAG} session ${sessionId} cancellation requested`);
            return { kind: 'requested' };
        }

        try {
            const state = await this.store.load(sessionId);
            if (!state) throw new SessionNotFoundError(sessionId);
            if (isTerminal(state.status)) {
                throw new StateConsistencyError(`Cannot cancel session ${sessionId}: status is ${state.status}`);
            }
            return { kind: 'cancelled', state: await this.abort(state) };
        } finally {
            // A request raised against this call while it held the lock is settled here either way.
            this.cancelRequests.delete(sessionId);
            this.lock.release(sessionId, token);
        }
    }

    getState(sessionId: string): Promise<PipelineState | null> {
        return this.store.load(sessionId);
    }

    async cleanup(sessionId: string): Promise<void> {
        if (this.lock.isHeld(sessionId)) throw new ConcurrencyConflictError(sessionId);
        await this.store.delete(sessionId);
        console.log(`${TAG} session ${sessionId} cleaned up`);
    }

    private acquire(sessionId: string): string {
        const token = this.lock.tryAcquire(sessionId);
        if (token === null) throw new ConcurrencyConflictError(sessionId);
        return token;
    }

    private exit(sessionId: string, token: string): void {
        this.cancelRequests.delete(sessionId);
        this.lock.release(sessionId, token);
    }

    private async drive(state: PipelineState, first: Decision, hydrate = false): Promise<PipelineState> {
        let decision = first;

        try {
            if (hydrate && decision.kind === 'goto') {
                decision = (await this.hydrate(state, decision.node)) ?? decision;
            }

            for (;;) {
                // Every node boundary, including the one before a park or a finish.
                if (this.cancelRequests.has(state.sessionId)) return await this.abort(state);
                if (decision.kind === 'suspend') return await this.park(state, decision.reason);
                if (decision.kind === 'terminate') return await this.finish(state, decision.status);

                this.takeEdge(state, decision);

                state.pendingNode = decision.node;
                state.updatedAt = this.now().toISOString();
                if (this.checkpointEachStep) await this.store.save(state.sessionId, state);

                const result = await this.execute(decision.node, state);
                this.settle(state, decision.node, result);
                decision = this.router.next(decision.node, state, result.outcome);
            }
        } catch (err) {
            if (err instanceof StateConsistencyError && !isTerminal(state.status)) {
                await this.failOnInvariant(state, err);
            }
            throw err;
        }
    }

    private async execute(name: NodeName, state: PipelineState): Promise<NodeResult> {
        const node = this.registry.get(name);
        console.log(`${TAG} session ${state.sessionId} ${name} ${nodeExecutionStatus.RUNNING}`);

        let result: NodeResult;
        try {
            result = await node.run(state, this.context);
        } catch (caught) {
            const err = toError(caught);
            result = { updates: {}, outcome: hardFailure([issueFrom(err, failureMessage(name, err))], { cause: err }) };
        }

        const status = settledStatus(result.outcome);
        const attempts = result.attempts ?? 1;
        console.log(`${TAG} session ${state.sessionId} ${name} ${status}${attempts > 1 ? ` after ${attempts} attempts` : ''}`);
        this.options.onNodeSettled?.({ sessionId: state.sessionId, node: name, status, attempts, outcome: result.outcome });
        return result;
    }

    private settle(state: PipelineState, name: NodeName, result: NodeResult): void {
        applyNodeUpdates(state, name, result.updates);
        state.retryCounts[name] = result.attempts ?? 1;
        if (result.usage) state.usage.push(...result.usage);

        const { outcome } = result;
        const now = this.now();
        if (outcome.kind === 'soft_failure') {
            for (const warning of outcome.warnings) recordIssue(state, 'warnings', { node: name, ...warning }, now);
        }
        if (outcome.kind === 'hard_failure') {
            for (const error of outcome.errors) recordIssue(state, 'errors', { node: name, ...error }, now);
            for (const warning of outcome.warnings) recordIssue(state, 'warnings', { node: name, ...warning }, now);
        } else {
            state.stepCursor = name;
        }
        state.updatedAt = now.toISOString();
    }

    private takeEdge(state: PipelineState, decision: GotoDecision): void {
        if (!decision.consumesInput) return;

        const input = state.pendingInput;
        if (input === null) {
            throw new StateConsistencyError(`Edge to ${decision.node} consumes input but none is pending`);
        }
        state.confirmation = input;
        state.pendingInput = null;

        if (decision.reset) {
            if (input.editedInput !== undefined) state.input = { ...state.input, text: input.editedInput };
            state.payload = {};
            state.retryCounts = {};
            state.stepCursor = null;
            console.log(`${TAG} session ${state.sessionId} reset to ${decision.node} with edited input`);
        }
    }

    /** Re-run producers of recomputed fields the target node needs, without touching issues or retry counts. */
    private async hydrate(state: PipelineState, target: NodeName): Promise<Decision | null> {
        const needed = new Set<NodeName>();
        const visit = (name: NodeName): void => {
            for (const field of this.registry.get(name).requires) {
                if (!isTransientField(field) || state.payload[field] !== undefined) continue;
                const producer = PAYLOAD_OWNERS[field];
                if (needed.has(producer)) continue;
                needed.add(producer);
                visit(producer);
            }
        };
        visit(target);

        for (const name of this.router.nodes.filter(node => needed.has(node))) {
            console.log(`${TAG} session ${state.sessionId} recomputing ${name}`);
            const result = await this.execute(name, state);
            if (result.outcome.kind === 'hard_failure') {
                this.settle(state, name, result);
                return terminate(sessionStatus.FAILED);
            }
            applyNodeUpdates(state, name, result.updates);
        }
        return null;
    }

    private async park(state: PipelineState, reason: string): Promise<PipelineState> {
        // A rejection without an edit is consumed here and the session parks again.
        if (state.pendingInput !== null) state.confirmation = state.pendingInput;
        state.pendingInput = null;
        state.pendingNode = null;
        state.status = sessionStatus.AWAITING_INPUT;
        state.updatedAt = this.now().toISOString();
        await this.store.save(state.sessionId, state);
        console.log(`${TAG} session ${state.sessionId} suspended at ${state.stepCursor}: ${reason}`);
        return state;
    }

    private async finish(state: PipelineState, status: sessionStatus.COMPLETED | sessionStatus.FAILED): Promise<PipelineState> {
        state.status = status;
        state.pendingNode = null;
        state.updatedAt = this.now().toISOString();
        await this.store.save(state.sessionId, state);

        const llm = summarizeUsage(state.usage);
        const summary = `${state.errors.length} errors, ${state.warnings.length} warnings, ${llm.calls} model calls ($${llm.costUsd.toFixed(6)})`;
        if (status === sessionStatus.FAILED) console.error(`${TAG} session ${state.sessionId} failed (${summary})`);
        else console.log(`${TAG} session ${state.sessionId} completed (${summary})`);
        return freezeTerminal(state);
    }

    private async abort(state: PipelineState): Promise<PipelineState> {
        const err = new SessionCancelledError(state.sessionId);
        recordIssue(state, 'errors', { node: 'engine', code: err.code, message: err.message }, this.now());
        this.cancelRequests.delete(state.sessionId);
        return this.finish(state, sessionStatus.FAILED);
    }

    private async failOnInvariant(state: PipelineState, err: StateConsistencyError): Promise<void> {
        recordIssue(state, 'errors', { node: 'engine', code: err.code, message: err.message }, this.now());
        state.status = sessionStatus.FAILED;
        state.pendingNode = null;
        try {
            await this.store.save(state.sessionId, state);
        } catch (saveErr) {
            console.error(`${TAG} session ${state.sessionId} could not checkpoint failure:`, saveErr);
        }
        console.error(`${TAG} session ${state.sessionId} invariant violated: ${err.message}`);
    }
}
