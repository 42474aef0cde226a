import { PipelineError } from '@stratflow/sdk';

export class SessionCancelledError extends PipelineError {
    constructor(public readonly sessionId: string) {
        super(`Session ${sessionId} was cancelled`, 'CANCELLED');
        this.name = 'SessionCancelledError';
    }
}
