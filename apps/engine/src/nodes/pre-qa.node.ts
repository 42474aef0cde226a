import { ValidationError } from '@stratflow/sdk';
import { PipelineState } from '../state/pipeline-state';
import { IssueDetail, NodeContext, NodeResult, PipelineNode, hardFailure, missingInputs, softFailure, success } from './node';

const TAG = '[node:pre_qa]';

const asIssues = (messages: string[]): IssueDetail[] => messages.map(message => ({ code: 'VALIDATION', message }));

/** Data-dependent QA. A strategy that would never trade is a warning, not a failure. */
export class PreQaNode implements PipelineNode {
    readonly name = 'pre_qa';
    readonly writes = ['dataValidation'] as const;
    readonly requires = ['spec', 'features'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec, features } = state.payload;
        if (spec === undefined || features === undefined) return missingInputs(this, state);

        const dataValidation = ctx.collaborators.validator.validateWithData(spec, features);
        if (dataValidation.errors.length > 0) {
            console.error(`${TAG} ${dataValidation.errors.join('; ')}`);
            return {
                updates: { dataValidation },
                outcome: hardFailure(asIssues(dataValidation.errors), {
                    warnings: asIssues(dataValidation.warnings),
                    cause: new ValidationError('critical', dataValidation.errors),
                }),
            };
        }
        if (dataValidation.warnings.length > 0) {
            return { updates: { dataValidation }, outcome: softFailure(...asIssues(dataValidation.warnings)) };
        }
        return { updates: { dataValidation }, outcome: success() };
    }
}
