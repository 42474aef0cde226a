import { PipelineState } from '../state/pipeline-state';
import { NodeContext, NodeResult, PipelineNode, missingInputs, success } from './node';

export class BacktestNode implements PipelineNode {
    readonly name = 'backtest';
    readonly writes = ['run'] as const;
    readonly requires = ['spec', 'features'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec, features } = state.payload;
        if (spec === undefined || features === undefined) return missingInputs(this, state);

        return { updates: { run: ctx.collaborators.backtester(features, spec) }, outcome: success() };
    }
}
