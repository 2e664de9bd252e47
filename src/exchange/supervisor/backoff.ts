export interface BackoffPolicy {
    baseMs: number;
    maxMs: number;
    /** Failures allowed before the connection goes fatal; 0 = unlimited. */
    maxRetries: number;
    /** Seed for the deterministic jitter, usually the connection id. */
    jitterSeed?: string;
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
    baseMs: 500,
    maxMs: 30_000,
    maxRetries: 10,
};

/**
 * Delay before retry number `attempt` (1-based): base·2^(attempt-1) capped at maxMs,
 * plus up to 20% jitter that never pushes it past the cap. Non-decreasing in `attempt`.
 */
export function computeBackoffDelay(policy: BackoffPolicy, attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    const base = Math.min(policy.maxMs, policy.baseMs * Math.pow(2, n - 1));
    const jitter = Math.floor(base * 0.2 * stableJitterFactor(policy.jitterSeed ?? 'ingest', n));
    return Math.min(policy.maxMs, base + jitter);
}

export function isRetryBudgetExhausted(policy: BackoffPolicy, failures: number): boolean {
    return policy.maxRetries > 0 && failures > policy.maxRetries;
}

export function normalizeBackoffPolicy(policy: Partial<BackoffPolicy> = {}): BackoffPolicy {
    const baseMs = Math.max(1, Math.floor(policy.baseMs ?? DEFAULT_BACKOFF.baseMs));
    return {
        baseMs,
        maxMs: Math.max(baseMs, Math.floor(policy.maxMs ?? DEFAULT_BACKOFF.maxMs)),
        maxRetries: Math.max(0, Math.floor(policy.maxRetries ?? DEFAULT_BACKOFF.maxRetries)),
        jitterSeed: policy.jitterSeed,
    };
}

export function stableJitterFactor(seed: string, failures: number): number {
    const input = `${seed}:${failures}`;
    let hash = 0;
    for (let i = 0; i < input.length; i += 1) {
        hash = (hash * 31 + input.charCodeAt(i)) >>> 0;
    }
    return (hash % 1000) / 1000;
}
