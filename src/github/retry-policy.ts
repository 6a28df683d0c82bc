/**
 * Per-request retry state machine.
 *
 *   attempting(n) --success------> succeeded
 *   attempting(n) --rate-limited--> rate-limited(n, wait) --waited--> attempting(n)
 *   attempting(n) --error---------> backoff(n, 2^(n-1) * base) --waited--> attempting(n + 1)
 *   attempting(maxAttempts) --error--> failed
 *
 * Rate-limit waits never consume an attempt. Pure: the HTTP client drives the
 * transitions and owns the actual sleeping.
 */

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  /** Extra seconds waited past the advertised rate-limit reset */
  rateLimitPaddingSeconds: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  rateLimitPaddingSeconds: 60,
};

export type RetryState =
  | { kind: 'attempting'; attempt: number }
  | { kind: 'backoff'; attempt: number; delayMs: number }
  | { kind: 'rate-limited'; attempt: number; delayMs: number }
  | { kind: 'succeeded' }
  | { kind: 'failed'; attempt: number; error: Error };

export type RetryEvent =
  | { type: 'success' }
  | { type: 'rate-limited'; delayMs: number }
  | { type: 'error'; error: Error }
  | { type: 'waited' };

export const INITIAL_RETRY_STATE: RetryState = { kind: 'attempting', attempt: 1 };

export function backoffDelayMs(attempt: number, policy: RetryPolicy = DEFAULT_RETRY_POLICY): number {
  return policy.baseDelayMs * Math.pow(2, attempt - 1);
}

/**
 * Wait before retrying a rate-limited request: `reset - now + padding` seconds, never negative.
 */
export function rateLimitDelayMs(
  resetEpochSeconds: number,
  nowMs: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): number {
  const nowSeconds = Math.floor(nowMs / 1000);
  return Math.max(0, resetEpochSeconds - nowSeconds + policy.rateLimitPaddingSeconds) * 1000;
}

export function nextRetryState(
  state: RetryState,
  event: RetryEvent,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY
): RetryState {
  switch (state.kind) {
    case 'attempting':
      if (event.type === 'success') {
        return { kind: 'succeeded' };
      }
      if (event.type === 'rate-limited') {
        return { kind: 'rate-limited', attempt: state.attempt, delayMs: event.delayMs };
      }
      if (event.type === 'error') {
        if (state.attempt >= policy.maxAttempts) {
          return { kind: 'failed', attempt: state.attempt, error: event.error };
        }
        return { kind: 'backoff', attempt: state.attempt, delayMs: backoffDelayMs(state.attempt, policy) };
      }
      return state;

    case 'backoff':
      return event.type === 'waited' ? { kind: 'attempting', attempt: state.attempt + 1 } : state;

    case 'rate-limited':
      return event.type === 'waited' ? { kind: 'attempting', attempt: state.attempt } : state;

    case 'succeeded':
    case 'failed':
      return state;
  }
}

export function isTerminal(state: RetryState): state is Extract<RetryState, { kind: 'succeeded' | 'failed' }> {
  return state.kind === 'succeeded' || state.kind === 'failed';
}
