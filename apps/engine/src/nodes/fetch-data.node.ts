import { InvalidInputError } from '@stratflow/sdk';
import { PipelineState } from '../state/pipeline-state';
import {
    NodeContext,
    NodeResult,
    PipelineNode,
    callWithRetry,
    failureMessage,
    hardFailure,
    issueFrom,
    missingInputs,
    success,
} from './node';

const TAG = '[node:fetch_data]';

export class FetchDataNode implements PipelineNode {
    readonly name = 'fetch_data';
    readonly writes = ['series'] as const;
    readonly requires = ['spec'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec } = state.payload;
        if (spec === undefined) return missingInputs(this, state);

        const range = { start: spec.startDate, end: spec.endDate };
        const result = await callWithRetry(ctx, 'network', this.name, signal => ctx.collaborators.dataSource(spec.ticker, range, { signal }));

        if (!result.ok) {
            console.error(`${TAG} ${result.error.message}`);
            return {
                updates: {},
                outcome: hardFailure([issueFrom(result.error, failureMessage(this.name, result.error))], { cause: result.error }),
                attempts: result.attempts,
            };
        }

        if (result.value.length === 0) {
            const err = new InvalidInputError(`No price data returned for ${spec.ticker}.`);
            return {
                updates: {},
                outcome: hardFailure([issueFrom(err, failureMessage(this.name, err))], { cause: err }),
                attempts: result.attempts,
            };
        }

        console.log(`${TAG} ${result.value.length} rows for ${spec.ticker}`);
        return { updates: { series: result.value }, outcome: success(), attempts: result.attempts };
    }
}
