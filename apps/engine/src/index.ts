export * from './services';
export * from './errors';
export { config, defaultPolicies } from './config';
export type { NodePolicies } from './config';
export { sessionStatus } from './db/checkpoint.entity';
export type { CheckpointRecord, PersistedPayload } from './db/checkpoint.entity';
export { InMemoryCheckpointStore, toCheckpointRecord } from './repositories/checkpoint.repository';
export type { CheckpointStore, InMemoryCheckpointStoreOptions } from './repositories/checkpoint.repository';
export {
    NODE_ORDER,
    PAYLOAD_OWNERS,
    TRANSIENT_FIELDS,
    applyNodeUpdates,
    createInitialState,
    freezeTerminal,
    isTerminal,
    recordIssue,
} from './state/pipeline-state';
export type { NodeName, PayloadField, PipelinePayload, PipelineState, StateIssue } from './state/pipeline-state';
export { NodeRegistry } from './nodes/registry';
export { nodeExecutionStatus, success, softFailure, hardFailure } from './nodes/node';
export type { Outcome, NodeResult, NodeContext, PipelineNode, IssueDetail } from './nodes/node';
export { DEFAULT_INTERPRETATION } from './nodes/interpret.node';
export { unavailableExplanation } from './nodes/explain.node';
export { AWAITING_CONFIRMATION, buildStrategyEdges, createStrategyPipeline, createStrategyEngine } from './pipeline';
export type { StrategyCollaborators, StrategyEngineOptions } from './pipeline';
