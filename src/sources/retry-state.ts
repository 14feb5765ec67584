import type { RetryConfig } from '../types/index.js';

/**
 * Per-query retry state.
 *
 * attempting ──success──▶ succeeded
 *     │ 429                 │ other failure
 *     ▼                     ▼
 * rate-limited          backing-off        (either one ──resume──▶ attempting)
 *     └──── retries > maxRetries ────▶ exhausted
 *
 * `retries` counts failed attempts so far; `lastDelayMs` is the previous wait,
 * which the next wait never undercuts.
 */
export type RetryState =
    | { kind: 'attempting'; retries: number; backoffMs: number; lastDelayMs: number }
    | { kind: 'rate-limited'; retries: number; delayMs: number; backoffMs: number }
    | { kind: 'backing-off'; retries: number; delayMs: number; backoffMs: number }
    | { kind: 'exhausted'; retries: number }
    | { kind: 'succeeded'; retries: number };

export type AttemptingState = Extract<RetryState, { kind: 'attempting' }>;
export type WaitingState = Extract<RetryState, { kind: 'rate-limited' | 'backing-off' }>;
export type SettledState = Exclude<RetryState, AttemptingState>;

export type AttemptEvent =
    | { type: 'success' }
    | { type: 'rate-limited'; retryAfterMs: number | null }
    | { type: 'failure' };

export type FailureEvent = Exclude<AttemptEvent, { type: 'success' }>;
export type FailedState = Exclude<SettledState, { kind: 'succeeded' }>;

export function initialRetryState(policy: RetryConfig): AttemptingState {
    return { kind: 'attempting', retries: 0, backoffMs: policy.backoffBaseMs, lastDelayMs: 0 };
}

/**
 * Apply the outcome of one attempt.
 */
export function transition(state: AttemptingState, event: FailureEvent, policy: RetryConfig): FailedState;
export function transition(state: AttemptingState, event: AttemptEvent, policy: RetryConfig): SettledState;
export function transition(state: AttemptingState, event: AttemptEvent, policy: RetryConfig): SettledState {
    if (event.type === 'success') {
        return { kind: 'succeeded', retries: state.retries };
    }

    const retries = state.retries + 1;
    if (retries > policy.maxRetries) {
        return { kind: 'exhausted', retries };
    }

    const hinted = event.type === 'rate-limited' ? event.retryAfterMs : null;
    const delayMs = Math.max(hinted ?? state.backoffMs, state.lastDelayMs);
    const backoffMs = Math.min(policy.maxBackoffMs, Math.max(state.backoffMs, delayMs) * 2);

    if (event.type === 'rate-limited') {
        return { kind: 'rate-limited', retries, delayMs, backoffMs };
    }
    return { kind: 'backing-off', retries, delayMs, backoffMs };
}

/**
 * Called once the wait is over.
 */
export function resume(state: WaitingState): AttemptingState {
    return { kind: 'attempting', retries: state.retries, backoffMs: state.backoffMs, lastDelayMs: state.delayMs };
}
