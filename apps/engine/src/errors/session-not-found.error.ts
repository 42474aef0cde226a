import { PipelineError } from '@stratflow/sdk';

export class SessionNotFoundError extends PipelineError {
    constructor(public readonly sessionId: string) {
        super(`No checkpoint found for session ${sessionId}`, 'SESSION_NOT_FOUND');
        this.name = 'SessionNotFoundError';
    }
}
