import { PipelineState } from '../state/pipeline-state';
import { NodeContext, NodeResult, PipelineNode, callWithRetry, failureMessage, hardFailure, issueFrom, success, usageLog } from './node';

const TAG = '[node:translate]';

/** Natural-language description to StrategySpec. Nothing downstream can run without it. */
export class TranslateNode implements PipelineNode {
    readonly name = 'translate';
    readonly writes = ['spec'] as const;
    readonly requires = [] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { text, model } = state.input;
        const { records: usage, onUsage } = usageLog();
        const result = await callWithRetry(ctx, 'llm', this.name, signal => ctx.collaborators.translator(text, model, { signal, onUsage }));

        if (!result.ok) {
            console.error(`${TAG} ${result.error.message}`);
            return {
                updates: {},
                outcome: hardFailure([issueFrom(result.error, failureMessage(this.name, result.error))], { cause: result.error }),
                attempts: result.attempts,
                usage,
            };
        }

        const spec = result.value;
        console.log(`${TAG} ${spec.ticker} ${spec.startDate}..${spec.endDate}`);
        return { updates: { spec }, outcome: success(), attempts: result.attempts, usage };
    }
}
