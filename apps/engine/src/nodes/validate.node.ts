import { ValidationError } from '@stratflow/sdk';
import { PipelineState } from '../state/pipeline-state';
import { IssueDetail, NodeContext, NodeResult, PipelineNode, hardFailure, missingInputs, softFailure, success } from './node';

const TAG = '[node:validate]';

const asIssues = (messages: string[]): IssueDetail[] => messages.map(message => ({ code: 'VALIDATION', message }));

/** Structural checks of the StrategySpec. Critical findings end the session; warnings are carried along. */
export class ValidateNode implements PipelineNode {
    readonly name = 'validate';
    readonly writes = ['validation'] as const;
    readonly requires = ['spec'] as const;

    async run(state: Readonly<PipelineState>, ctx: NodeContext): Promise<NodeResult> {
        const { spec } = state.payload;
        if (spec === undefined) return missingInputs(this, state);

        const validation = ctx.collaborators.validator.validateStructure(spec);
        if (validation.errors.length > 0) {
            console.error(`${TAG} ${validation.errors.length} errors`);
            return {
                updates: { validation },
                outcome: hardFailure(asIssues(validation.errors), {
                    warnings: asIssues(validation.warnings),
                    cause: new ValidationError('critical', validation.errors),
                }),
            };
        }
        if (validation.warnings.length > 0) {
            console.warn(`${TAG} ${validation.warnings.length} warnings`);
            return { updates: { validation }, outcome: softFailure(...asIssues(validation.warnings)) };
        }
        return { updates: { validation }, outcome: success() };
    }
}
