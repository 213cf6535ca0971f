export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Delay before the next attempt after `attempt` failed attempts:
 * baseDelay * 2^(attempt - 1), capped at maxDelay. `attempt` counts from 1,
 * so the first retry waits baseDelay (base * 2^n with n counting retries from 0).
 */
export function computeRetryDelayMs(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** exponent);
}
