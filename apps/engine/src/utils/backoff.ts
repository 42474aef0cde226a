// Exponential backoff: base-2 gives 1 → 2 → 4 units (capped at maxInterval).
// attempt is 1-indexed; attempt=1 waits initialIntervalMs, attempt=2 waits 2x that, etc.
export function calculateBackOff(
    attempt: number,
    initialIntervalMs: number = 1000,
    backoffMultiplier: number = 2.0,
    maxInterval: number = 4000,
    jitterRatio: number = 0,
): number {
    let delay = initialIntervalMs * Math.pow(backoffMultiplier, attempt - 1);
    delay = Math.min(delay, maxInterval);
    if (jitterRatio <= 0) return delay;
    const jitter = delay * jitterRatio;
    const randomJitter = Math.random() * jitter * 2 - jitter;
    return Math.floor(delay + randomJitter);
}
