import { describe, it, expect } from 'vitest';
import {
  DEFAULT_RETRY_POLICY,
  INITIAL_RETRY_STATE,
  RetryState,
  backoffDelayMs,
  isTerminal,
  nextRetryState,
  rateLimitDelayMs,
} from './retry-policy';

describe('retry policy', () => {
  describe('backoffDelayMs', () => {
    it('doubles from the base delay', () => {
      expect(backoffDelayMs(1)).toBe(1000);
      expect(backoffDelayMs(2)).toBe(2000);
      expect(backoffDelayMs(3)).toBe(4000);
    });
  });

  describe('rateLimitDelayMs', () => {
    it('waits until reset plus 60 seconds', () => {
      const now = 1_700_000_000_000;
      expect(rateLimitDelayMs(1_700_000_030, now)).toBe(90_000);
    });

    it('never returns a negative wait', () => {
      const now = 1_700_000_000_000;
      expect(rateLimitDelayMs(1_699_990_000, now)).toBe(0);
    });

    it('uses whole seconds of the current time', () => {
      expect(rateLimitDelayMs(100, 99_999)).toBe(61_000);
    });
  });

  describe('nextRetryState', () => {
    it('succeeds on the first attempt', () => {
      expect(nextRetryState(INITIAL_RETRY_STATE, { type: 'success' })).toEqual({ kind: 'succeeded' });
    });

    it('walks attempting → backoff → attempting until the ceiling, then fails', () => {
      const error = new Error('boom');
      const visited: RetryState[] = [];
      let state: RetryState = INITIAL_RETRY_STATE;

      while (!isTerminal(state)) {
        visited.push(state);
        state =
          state.kind === 'attempting'
            ? nextRetryState(state, { type: 'error', error })
            : nextRetryState(state, { type: 'waited' });
      }

      expect(visited).toEqual([
        { kind: 'attempting', attempt: 1 },
        { kind: 'backoff', attempt: 1, delayMs: 1000 },
        { kind: 'attempting', attempt: 2 },
        { kind: 'backoff', attempt: 2, delayMs: 2000 },
        { kind: 'attempting', attempt: 3 },
      ]);
      expect(state).toEqual({ kind: 'failed', attempt: 3, error });
    });

    it('does not spend an attempt on a rate-limit wait', () => {
      const limited = nextRetryState({ kind: 'attempting', attempt: 2 }, { type: 'rate-limited', delayMs: 90_000 });
      expect(limited).toEqual({ kind: 'rate-limited', attempt: 2, delayMs: 90_000 });

      expect(nextRetryState(limited, { type: 'waited' })).toEqual({ kind: 'attempting', attempt: 2 });
    });

    it('honours a custom attempt ceiling', () => {
      const policy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 1 };
      const error = new Error('nope');

      expect(nextRetryState(INITIAL_RETRY_STATE, { type: 'error', error }, policy)).toEqual({
        kind: 'failed',
        attempt: 1,
        error,
      });
    });

    it('ignores events that do not apply to the current state', () => {
      const backoff: RetryState = { kind: 'backoff', attempt: 1, delayMs: 1000 };
      expect(nextRetryState(backoff, { type: 'success' })).toBe(backoff);
      expect(nextRetryState({ kind: 'succeeded' }, { type: 'waited' })).toEqual({ kind: 'succeeded' });
    });
  });
});
