export { StateConsistencyError } from './state-consistency.error';
export { ConcurrencyConflictError } from './concurrency-conflict.error';
export { SessionNotFoundError } from './session-not-found.error';
export { SessionCancelledError } from './session-cancelled.error';
