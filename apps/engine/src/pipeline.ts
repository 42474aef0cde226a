import {
    Collaborators,
    addFeatures,
    computeMetrics,
    defaultValidator,
    extractTrades,
    runBacktest,
} from '@stratflow/sdk';
import { NodePolicies, defaultPolicies } from './config';
import { sessionStatus } from './db/checkpoint.entity';
import { AddFeaturesNode } from './nodes/add-features.node';
import { BacktestNode } from './nodes/backtest.node';
import { ExplainNode } from './nodes/explain.node';
import { FetchDataNode } from './nodes/fetch-data.node';
import { InterpretNode } from './nodes/interpret.node';
import { MetricsNode } from './nodes/metrics.node';
import { NodeContext, Outcome } from './nodes/node';
import { PreQaNode } from './nodes/pre-qa.node';
import { NodeRegistry } from './nodes/registry';
import { TradesNode } from './nodes/trades.node';
import { TranslateNode } from './nodes/translate.node';
import { ValidateNode } from './nodes/validate.node';
import { CheckpointStore, InMemoryCheckpointStore } from './repositories/checkpoint.repository';
import { PipelineEngine, PipelineEngineOptions } from './services/pipeline-engine';
import { Edge, Router, goto, suspend, terminate } from './services/router';
import { SessionLock } from './services/session-lock';
import { NODE_ORDER, NodeName, PipelineState } from './state/pipeline-state';

export const AWAITING_CONFIRMATION = 'awaiting human confirmation';

const hardFailed = (_state: Readonly<PipelineState>, outcome: Outcome): boolean => outcome.kind === 'hard_failure';
const always = (): boolean => true;
const failed = () => terminate(sessionStatus.FAILED);

function linear(from: NodeName, to: NodeName): Edge[] {
    return [
        { from, label: `${from} failed`, when: hardFailed, decide: failed },
        { from, label: `${from} -> ${to}`, when: always, decide: () => goto(to) },
    ];
}

/** The ordered edge table of the strategy workflow. */
export function buildStrategyEdges(): Edge[] {
    return [
        ...linear('translate', 'interpret'),

        { from: 'interpret', label: 'interpret failed', when: hardFailed, decide: failed },
        {
            from: 'interpret',
            label: 'confirmed',
            when: state => state.pendingInput?.confirmed === true,
            decide: () => goto('validate', { consumesInput: true }),
        },
        {
            from: 'interpret',
            label: 'rejected with edit',
            when: state =>
                state.pendingInput !== null &&
                !state.pendingInput.confirmed &&
                (state.pendingInput.editedInput ?? '').trim().length > 0,
            decide: () => goto('translate', { consumesInput: true, reset: true }),
        },
        { from: 'interpret', label: 'awaiting confirmation', when: always, decide: () => suspend(AWAITING_CONFIRMATION) },

        {
            from: 'validate',
            label: 'invalid spec',
            when: (state, outcome) => outcome.kind === 'hard_failure' || state.errors.some(issue => issue.node === 'validate'),
            decide: failed,
        },
        { from: 'validate', label: 'validate -> fetch_data', when: always, decide: () => goto('fetch_data') },

        ...linear('fetch_data', 'add_features'),
        ...linear('add_features', 'pre_qa'),
        // Soft failures (zero-trade warnings) still run the backtest.
        ...linear('pre_qa', 'backtest'),
        ...linear('backtest', 'metrics'),
        ...linear('metrics', 'trades'),
        ...linear('trades', 'explain'),

        { from: 'explain', label: 'done', when: always, decide: () => terminate(sessionStatus.COMPLETED) },
    ];
}

export function createStrategyPipeline(): { registry: NodeRegistry; router: Router } {
    const registry = new NodeRegistry();
    for (const node of [
        new TranslateNode(),
        new InterpretNode(),
        new ValidateNode(),
        new FetchDataNode(),
        new AddFeaturesNode(),
        new PreQaNode(),
        new BacktestNode(),
        new MetricsNode(),
        new TradesNode(),
        new ExplainNode(),
    ]) {
        registry.register(node);
    }
    return { registry, router: new Router(buildStrategyEdges(), NODE_ORDER) };
}

/** The LLM calls and the data source have to be supplied; the computation collaborators default to the sdk ones. */
export type StrategyCollaborators =
    Pick<Collaborators, 'translator' | 'interpreter' | 'explainer' | 'dataSource'> & Partial<Collaborators>;

export interface StrategyEngineOptions extends PipelineEngineOptions {
    store?: CheckpointStore;
    lock?: SessionLock;
    policies?: NodePolicies;
    retryHooks?: NodeContext['retryHooks'];
}

export function createStrategyEngine(collaborators: StrategyCollaborators, options: StrategyEngineOptions = {}): PipelineEngine {
    const { store, lock, policies, retryHooks, ...engineOptions } = options;
    const { registry, router } = createStrategyPipeline();
    const context: NodeContext = {
        collaborators: {
            validator: defaultValidator,
            buildFeatures: addFeatures,
            backtester: runBacktest,
            metricsCalc: computeMetrics,
            tradeExtractor: extractTrades,
            ...collaborators,
        },
        policies: policies ?? defaultPolicies(),
        retryHooks,
    };
    return new PipelineEngine(
        registry,
        router,
        store ?? new InMemoryCheckpointStore(),
        lock ?? new SessionLock(),
        context,
        engineOptions,
    );
}
