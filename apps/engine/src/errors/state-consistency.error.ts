import { PipelineError } from '@stratflow/sdk';

/** A programming-level invariant was violated (single-writer, terminal write, resume of a non-parked session). */
export class StateConsistencyError extends PipelineError {
    constructor(message: string) {
        super(message, 'STATE_CONSISTENCY');
        this.name = 'StateConsistencyError';
    }
}
