/**
 * Error taxonomy shared by the engine and its collaborators.
 * Every class carries a stable `code` that ends up in the state's issue log.
 */
export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = 'PipelineError';
    }
}

/** Network, rate-limit or timeout failure. Retryable. */
export class TransientIOError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'TRANSIENT_IO', options);
        this.name = 'TransientIOError';
    }
}

/** The caller has to correct the input (bad ticker, unparseable model output). Never retried. */
export class InvalidInputError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'INVALID_INPUT', options);
        this.name = 'InvalidInputError';
    }
}

export class AuthenticationError extends PipelineError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, 'AUTHENTICATION', options);
        this.name = 'AuthenticationError';
    }
}

export type ValidationSeverity = 'critical' | 'warning';

export class ValidationError extends PipelineError {
    constructor(
        public readonly severity: ValidationSeverity,
        public readonly messages: string[],
    ) {
        super(messages.join('; ') || `${severity} validation issue`, 'VALIDATION');
        this.name = 'ValidationError';
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
