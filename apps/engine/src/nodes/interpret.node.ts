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

const TAG = '[node:interpret]';

export const DEFAULT_INTERPRETATION =
    'An interpretation could not be generated. Please review the parsed strategy before confirming.';

/** Explains how the description was read. Failure is non-critical: a default text stands in. */
export class InterpretNode implements PipelineNode {
    readonly name = 'interpret';
    readonly writes = ['interpretation'] as const;
    readonly requires = ['spec'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec } = state.payload;
        if (spec === undefined) return missingInputs(this, state);

        const { text, model } = state.input;
        const { records: usage, onUsage } = usageLog();
        const result = await callWithRetry(ctx, 'llm', this.name, signal => ctx.collaborators.interpreter(text, spec, model, { signal, onUsage }));

        if (!result.ok) {
            console.warn(`${TAG} ${result.error.message}, using default interpretation`);
            return {
                updates: { interpretation: DEFAULT_INTERPRETATION },
                outcome: softFailure(issueFrom(result.error, failureMessage(this.name, result.error))),
                attempts: result.attempts,
                usage,
            };
        }
        return { updates: { interpretation: result.value }, outcome: success(), attempts: result.attempts, usage };
    }
}
