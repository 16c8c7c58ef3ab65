export type BackoffPolicy = {
    minDelayMs: number;
    maxDelayMs: number;
    multiplier: number;
    jitterRatio: number;
};

/**
 * Delay before reconnect attempt `attempt` (0-based): min * multiplier^attempt,
 * capped at max, then spread by +/- jitterRatio.
 */
export function backoff(attempt: number, policy: BackoffPolicy, random: () => number = Math.random): number {
    const base = Math.min(policy.maxDelayMs, policy.minDelayMs * Math.pow(policy.multiplier, Math.max(0, attempt)));
    const jitter = base * policy.jitterRatio * (random() * 2 - 1);
    return Math.max(0, Math.floor(base + jitter));
}
