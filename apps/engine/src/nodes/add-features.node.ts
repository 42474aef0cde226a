import { PipelineState } from '../state/pipeline-state';
import { NodeContext, NodeResult, PipelineNode, missingInputs, success } from './node';

export class AddFeaturesNode implements PipelineNode {
    readonly name = 'add_features';
    readonly writes = ['features'] as const;
    readonly requires = ['spec', 'series'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec, series } = state.payload;
        if (spec === undefined || series === undefined) return missingInputs(this, state);

        return { updates: { features: ctx.collaborators.buildFeatures(series, spec) }, outcome: success() };
    }
}
