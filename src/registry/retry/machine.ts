/**
 * Retry/backoff state machine
 *
 *   INIT -> ATTEMPT -> SUCCESS | NEED_AUTH_RETRY | NEED_REDIRECT | NEED_BACKOFF | EXHAUSTED | AUTH_FAILED
 *
 * `nextStep` is a pure transition function over the outcome of the last
 * attempt; the engine owns all I/O.
 */

import { OutcomeKind, RetryPolicy, RetryState } from '../../types';

export type Step =
  | { kind: 'SUCCESS' }
  | { kind: 'NEED_AUTH_RETRY' }
  | { kind: 'NEED_REDIRECT' }
  | { kind: 'NEED_BACKOFF'; delayMs: number }
  | { kind: 'EXHAUSTED'; lastResort: boolean }
  | { kind: 'AUTH_FAILED' };

export interface StepContext {
  policy: RetryPolicy;
  // False when the request body is a stream that cannot be sent twice
  replayable: boolean;
  // Spend the final unit of budget on a minimal request to the primary host
  // after rate limits or transport errors
  lastResort: boolean;
  // Already in last-resort mode
  inLastResort: boolean;
  random: () => number;
}

export function initialState(): RetryState {
  return {
    attempt: 0,
    authRetried: false,
    hostsTried: new Set(),
    backoffCount: 0,
    lastDelayMs: 0,
  };
}

/**
 * Delay before the (n+1)th retry: base * 2^n plus jitter below base * 2^n,
 * capped. Successive delays never decrease.
 */
export function backoffDelay(policy: RetryPolicy, backoffCount: number, random: () => number): number {
  const exponential = policy.baseDelayMs * Math.pow(2, backoffCount);
  const ratio = Math.min(1, Math.max(0, policy.jitterRatio));
  const jitter = Math.min(Math.max(random(), 0), 0.999999) * ratio * exponential;
  return Math.min(policy.maxDelayMs, Math.floor(exponential + jitter));
}

export function nextStep(state: RetryState, outcome: OutcomeKind, ctx: StepContext): Step {
  const remaining = ctx.policy.maxAttempts - state.attempt;

  switch (outcome) {
    case 'success':
      return { kind: 'SUCCESS' };

    case 'redirect':
      return { kind: 'NEED_REDIRECT' };

    case 'unauthorized':
      if (state.authRetried || !ctx.replayable || remaining <= 0) {
        return { kind: 'AUTH_FAILED' };
      }
      return { kind: 'NEED_AUTH_RETRY' };

    case 'rate-limited':
    case 'transport-error':
      if (!ctx.replayable || remaining <= 0 || ctx.inLastResort) {
        return { kind: 'EXHAUSTED', lastResort: false };
      }
      if (ctx.lastResort && remaining === 1) {
        return { kind: 'EXHAUSTED', lastResort: true };
      }
      return { kind: 'NEED_BACKOFF', delayMs: backoffDelay(ctx.policy, state.backoffCount, ctx.random) };
  }
}
