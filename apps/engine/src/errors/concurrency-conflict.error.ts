import { PipelineError } from '@stratflow/sdk';

export class ConcurrencyConflictError extends PipelineError {
    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} is already being executed`, 'CONCURRENCY_CONFLICT');
        this.name = 'ConcurrencyConflictError';
    }
}
