import { describe, expect, it } from 'vitest';
import {
  computeBackoffDelay,
  DEFAULT_BACKOFF,
  isRetryBudgetExhausted,
  normalizeBackoffPolicy,
  stableJitterFactor,
} from '../src/exchange/supervisor/backoff';

describe('reconnect backoff', () => {
  const policy = { baseMs: 500, maxMs: 30_000, maxRetries: 10, jitterSeed: 'bitget:futures' };

  it('doubles from the base and stays within 20% jitter', () => {
    for (let attempt = 1; attempt <= 5; attempt += 1) {
      const raw = 500 * 2 ** (attempt - 1);
      const delay = computeBackoffDelay(policy, attempt);
      expect(delay).toBeGreaterThanOrEqual(raw);
      expect(delay).toBeLessThanOrEqual(Math.floor(raw * 1.2));
    }
  });

  it('is non-decreasing and never exceeds the cap', () => {
    let previous = 0;
    for (let attempt = 1; attempt <= 20; attempt += 1) {
      const delay = computeBackoffDelay(policy, attempt);
      expect(delay).toBeGreaterThanOrEqual(previous);
      expect(delay).toBeLessThanOrEqual(policy.maxMs);
      previous = delay;
    }
    expect(computeBackoffDelay(policy, 12)).toBe(30_000);
  });

  it('is deterministic for the same seed', () => {
    expect(computeBackoffDelay(policy, 3)).toBe(computeBackoffDelay({ ...policy }, 3));
    const factor = stableJitterFactor('kucoin:spot', 2);
    expect(factor).toBe(stableJitterFactor('kucoin:spot', 2));
    expect(factor).toBeGreaterThanOrEqual(0);
    expect(factor).toBeLessThan(1);
  });

  it('treats attempt below 1 as the first attempt', () => {
    expect(computeBackoffDelay(policy, 0)).toBe(computeBackoffDelay(policy, 1));
  });

  it('exhausts the budget only past maxRetries, never when maxRetries is 0', () => {
    expect(isRetryBudgetExhausted({ ...policy, maxRetries: 3 }, 3)).toBe(false);
    expect(isRetryBudgetExhausted({ ...policy, maxRetries: 3 }, 4)).toBe(true);
    expect(isRetryBudgetExhausted({ ...policy, maxRetries: 0 }, 1_000)).toBe(false);
  });

  it('normalizes partial and out-of-range policies', () => {
    expect(normalizeBackoffPolicy()).toEqual({ ...DEFAULT_BACKOFF, jitterSeed: undefined });
    expect(normalizeBackoffPolicy({ baseMs: 0, maxMs: -5, maxRetries: -1 })).toEqual({
      baseMs: 1,
      maxMs: 1,
      maxRetries: 0,
      jitterSeed: undefined,
    });
    expect(normalizeBackoffPolicy({ baseMs: 2_000, maxMs: 1_000 }).maxMs).toBe(2_000);
  });
});
