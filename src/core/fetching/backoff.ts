// src/core/fetching/backoff.ts

import type { IRetryPolicy } from '../../@types/index.ts';

/**
 * Delay to wait before `attempt` (1-based). The first attempt runs immediately; from the
 * second on the delay doubles, starting at `baseDelayMs`, clamped to `[minDelayMs, maxDelayMs]`.
 *
 * With the default policy the waits before attempts 2..5 are 1s, 2s, 4s and 8s.
 */
export function computeBackoffDelay(attempt: number, policy: IRetryPolicy): number {
    if (attempt <= 1) {
        return 0;
    }
    const exponential = policy.baseDelayMs * 2 ** (attempt - 2);
    return Math.min(policy.maxDelayMs, Math.max(policy.minDelayMs, exponential));
}
