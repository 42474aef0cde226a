import { sessionStatus } from '../db/checkpoint.entity';
import { StateConsistencyError } from '../errors';
import { Outcome } from '../nodes/node';
import { NodeName, PipelineState } from '../state/pipeline-state';

export interface GotoOptions {
    /** The edge takes the pending human input (moves it to `confirmation`). */
    consumesInput?: boolean;
    /** Fresh re-entry: edited text replaces the input, payload and retry counts are cleared. */
    reset?: boolean;
}

export type GotoDecision = { kind: 'goto'; node: NodeName } & GotoOptions;

export type Decision =
    | GotoDecision
    | { kind: 'suspend'; reason: string }
    | { kind: 'terminate'; status: sessionStatus.COMPLETED | sessionStatus.FAILED };

export const goto = (node: NodeName, options: GotoOptions = {}): GotoDecision => ({ kind: 'goto', node, ...options });
export const suspend = (reason: string): Decision => ({ kind: 'suspend', reason });
export const terminate = (status: sessionStatus.COMPLETED | sessionStatus.FAILED): Decision => ({ kind: 'terminate', status });

/** One conditional edge. Predicates must be pure: same inputs, same answer. */
export interface Edge {
    from: NodeName;
    label: string;
    when: (state: Readonly<PipelineState>, outcome: Outcome) => boolean;
    decide: (state: Readonly<PipelineState>) => Decision;
}

/**
 * Static ordered table of conditional edges. For a given node the edges are
 * tried in declaration order and the first matching predicate wins.
 */
export class Router {
    private readonly table = new Map<NodeName, Edge[]>();

    constructor(edges: Edge[], readonly nodes: readonly NodeName[]) {
        for (const edge of edges) {
            const list = this.table.get(edge.from) ?? [];
            list.push(edge);
            this.table.set(edge.from, list);
        }
    }

    next(node: NodeName, state: Readonly<PipelineState>, outcome: Outcome): Decision {
        return this.explain(node, state, outcome).decision;
    }

    /** Like `next`, but also names the edge that matched. */
    explain(node: NodeName, state: Readonly<PipelineState>, outcome: Outcome): { label: string; decision: Decision } {
        const edge = this.edgesFrom(node).find(candidate => candidate.when(state, outcome));
        if (!edge) {
            throw new StateConsistencyError(`No edge from ${node} matches outcome ${outcome.kind}`);
        }
        return { label: edge.label, decision: edge.decide(state) };
    }

    edgesFrom(node: NodeName): readonly Edge[] {
        return this.table.get(node) ?? [];
    }
}
