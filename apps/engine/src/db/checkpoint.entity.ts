import type { PipelinePayload, PipelineState, TransientField } from '../state/pipeline-state';

/**
 * Lifecycle states for pipeline sessions.
 * Sessions progress: RUNNING → AWAITING_INPUT → RUNNING → COMPLETED/FAILED
 */
export enum sessionStatus {
    RUNNING = 'running',
    AWAITING_INPUT = 'awaiting_input',
    FAILED = 'failed',
    COMPLETED = 'completed',
}

export type PersistedPayload = Omit<PipelinePayload, TransientField>;

/**
 * Represents a persisted checkpoint.
 * Computed datasets are left out and recomputed on recovery.
 */
export interface CheckpointRecord extends Omit<PipelineState, 'payload'> {
    payload: PersistedPayload;
}
