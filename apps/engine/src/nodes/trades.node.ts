import { toError } from '@stratflow/sdk';
import { PipelineState } from '../state/pipeline-state';
import { NodeContext, NodeResult, PipelineNode, failureMessage, issueFrom, missingInputs, softFailure, success } from './node';

const TAG = '[node:trades]';

/** Trade log for display. Non-critical: an extraction failure leaves an empty list. */
export class TradesNode implements PipelineNode {
    readonly name = 'trades';
    readonly writes = ['trades'] as const;
    readonly requires = ['spec', 'features', 'run'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec, features, run } = state.payload;
        if (spec === undefined || features === undefined || run === undefined) return missingInputs(this, state);

        try {
            const trades = ctx.collaborators.tradeExtractor(features, run, spec);
            console.log(`${TAG} extracted ${trades.length} trades`);
            return { updates: { trades }, outcome: success() };
        } catch (caught) {
            const err = toError(caught);
            console.warn(`${TAG} ${err.message}`);
            return { updates: { trades: [] }, outcome: softFailure(issueFrom(err, failureMessage(this.name, err))) };
        }
    }
}
