import { PipelineState } from '../state/pipeline-state';
import { NodeContext, NodeResult, PipelineNode, missingInputs, success } from './node';

const TAG = '[node:metrics]';

export class MetricsNode implements PipelineNode {
    readonly name = 'metrics';
    readonly writes = ['metrics'] as const;
    readonly requires = ['run'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { run } = state.payload;
        if (run === undefined) return missingInputs(this, state);

        const metrics = ctx.collaborators.metricsCalc(run);
        console.log(`${TAG} cagr=${metrics.cagr.toFixed(4)} maxDrawdown=${metrics.maxDrawdown.toFixed(4)} sharpe=${metrics.sharpe.toFixed(2)} trades=${metrics.numTrades}`);
        return { updates: { metrics }, outcome: success() };
    }
}
