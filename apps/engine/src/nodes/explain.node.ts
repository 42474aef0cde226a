import { PipelineState } from '../state/pipeline-state';
import {
    NodeContext,
    NodeResult,
    PipelineNode,
    callWithRetry,
    failureMessage,
    issueFrom,
    missingInputs,
    softFailure,
    success,
    usageLog,
} from './node';

const TAG = '[node:explain]';

export const unavailableExplanation = (reason: string): string => `(Explanation unavailable: ${reason})`;

export class ExplainNode implements PipelineNode {
    readonly name = 'explain';
    readonly writes = ['explanation'] as const;
    readonly requires = ['spec', 'metrics'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec, metrics } = state.payload;
        if (spec === undefined || metrics === undefined) return missingInputs(this, state);

        const { model } = state.input;
        const { records: usage, onUsage } = usageLog();
        const result = await callWithRetry(ctx, 'llm', this.name, signal => ctx.collaborators.explainer(spec, metrics, model, { signal, onUsage }));

        if (!result.ok) {
            console.warn(`${TAG} ${result.error.message}`);
            return {
                updates: { explanation: unavailableExplanation(result.error.message) },
                outcome: softFailure(issueFrom(result.error, failureMessage(this.name, result.error))),
                attempts: result.attempts,
                usage,
            };
        }
        return { updates: { explanation: result.value }, outcome: success(), attempts: result.attempts, usage };
    }
}
