import { AuthenticationError, InvalidInputError, PipelineError, TransientIOError, ValidationError, toError } from '@stratflow/sdk';
import { calculateBackOff } from '../utils/backoff';

const TAG = '[retry]';

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    retryable: (err: Error) => boolean;
    /** Per-attempt timeout; an attempt that exceeds it fails with TransientIOError. */
    timeoutMs?: number;
}

export type Result<T> =
    | { ok: true; value: T; attempts: number }
    | { ok: false; error: Error; attempts: number };

export interface RetryHooks {
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (attempt: number, delayMs: number, err: Error) => void;
    label?: string;
}

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** Delay before attempt n+1, given n failed attempts. */
export function delayAfterAttempt(attempt: number, policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
    return calculateBackOff(attempt, policy.baseDelayMs, 2, policy.maxDelayMs);
}

/** An attempt's operation; `signal` aborts when the attempt times out so the call can stop its own work. */
export type Attempt<T> = (signal: AbortSignal) => Promise<T>;

async function withTimeout<T>(operation: Attempt<T>, timeoutMs: number | undefined, label: string): Promise<T> {
    const controller = new AbortController();
    if (timeoutMs === undefined || timeoutMs <= 0) return operation(controller.signal);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const err = new TransientIOError(`${label} timed out after ${timeoutMs}ms`);
            controller.abort(err);
            reject(err);
        }, timeoutMs);
        timer.unref();
    });
    try {
        return await Promise.race([operation(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export async function executeWithRetry<T>(
    operation: Attempt<T>,
    policy: RetryPolicy,
    hooks: RetryHooks = {},
): Promise<Result<T>> {
    const label = hooks.label ?? 'operation';
    const wait = hooks.sleep ?? sleep;
    const maxAttempts = Math.max(1, policy.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        try {
            const value = await withTimeout(operation, policy.timeoutMs, label);
            return { ok: true, value, attempts: attempt };
        } catch (caught) {
            const err = toError(caught);
            if (attempt >= maxAttempts || !policy.retryable(err)) {
                if (attempt > 1) console.warn(`${TAG} ${label} failed after ${attempt} attempts: ${err.message}`);
                return { ok: false, error: err, attempts: attempt };
            }

            const delay = delayAfterAttempt(attempt, policy);
            console.warn(`${TAG} ${label} failed (attempt ${attempt}/${maxAttempts}): ${err.message}. Retrying in ${delay}ms`);
            hooks.onRetry?.(attempt, delay, err);
            await wait(delay);
        }
    }
}

const TRANSIENT_PATTERNS = ['rate limit', '429', 'timeout', 'timed out', 'network', 'econnrefused', 'econnreset', 'etimedout', 'socket hang up'];
const SERVER_PATTERNS = ['server error', '500', '502', '503', '504', 'overloaded', 'unavailable'];
const CONNECTION_PATTERNS = ['enotfound', 'eai_again', 'epipe', 'connection'];

function isNeverRetryable(err: Error): boolean {
    if (err instanceof InvalidInputError || err instanceof AuthenticationError || err instanceof ValidationError) return true;
    const msg = err.message.toLowerCase();
    return msg.includes('authentication') || msg.includes('401') || msg.includes('403');
}

const matchesAny = (msg: string, patterns: string[]): boolean => patterns.some(p => msg.includes(p));

/** LLM calls: transient transport failures plus provider-side 5xx errors. */
export function isLlmCallRetryable(err: Error): boolean {
    if (err instanceof TransientIOError) return true;
    if (isNeverRetryable(err) || err instanceof PipelineError) return false;
    const msg = err.message.toLowerCase();
    return matchesAny(msg, TRANSIENT_PATTERNS) || matchesAny(msg, SERVER_PATTERNS);
}

/** Data fetches: transient transport failures and connection-level errors. Bad tickers or ranges are not retried. */
export function isNetworkRetryable(err: Error): boolean {
    if (err instanceof TransientIOError) return true;
    if (isNeverRetryable(err) || err instanceof PipelineError) return false;
    const msg = err.message.toLowerCase();
    return matchesAny(msg, TRANSIENT_PATTERNS) || matchesAny(msg, CONNECTION_PATTERNS);
}
