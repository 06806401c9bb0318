/**
 * Exponential backoff with jitter, shared by every stage executor.
 */

import { RetryPolicy } from '../types';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterMin: 0.5,
  jitterMax: 1.5,
};

/**
 * Delay before the retry that follows failed attempt number `attempt`
 * (0-based): min(maxDelay, base * 2^attempt), scaled by a random factor in
 * [jitterMin, jitterMax).
 */
export function computeBackoff(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, attempt));
  const capped = Math.min(policy.maxDelayMs, exponential);
  const factor = policy.jitterMin + random() * (policy.jitterMax - policy.jitterMin);
  return Math.round(capped * factor);
}
