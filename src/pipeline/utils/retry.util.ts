export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

export type RetryState =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'waiting'; attempt: number; delayMs: number; reason: string }
  | { phase: 'succeeded'; attempt: number }
  | { phase: 'failed'; attempt: number; reason: string };

export type RetryEvent =
  | { type: 'succeeded' }
  | { type: 'failed'; retryable: boolean; reason: string }
  | { type: 'wait_elapsed' };

export type AttemptVerdict =
  | { ok: true }
  | { ok: false; retryable: boolean; reason: string };

export function computeBackoffMs(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  const exponential = Math.min(
    policy.maxDelayMs,
    policy.baseDelayMs * 2 ** Math.max(0, attempt - 1),
  );
  const jitter = exponential * policy.jitterRatio * (random() * 2 - 1);
  return Math.max(0, Math.round(exponential + jitter));
}

/**
 * Attempting -> Waiting(backoff) -> Attempting | Failed.
 * `attempt` counts from 1, so a policy with `maxRetries = 2` allows
 * three attempts in total.
 */
export function nextRetryState(
  state: RetryState,
  event: RetryEvent,
  policy: RetryPolicy,
  random: () => number = Math.random,
): RetryState {
  switch (state.phase) {
    case 'attempting':
      if (event.type === 'succeeded') {
        return { phase: 'succeeded', attempt: state.attempt };
      }
      if (event.type !== 'failed') {
        return state;
      }
      if (!event.retryable || state.attempt > policy.maxRetries) {
        return {
          phase: 'failed',
          attempt: state.attempt,
          reason: event.reason,
        };
      }
      return {
        phase: 'waiting',
        attempt: state.attempt,
        delayMs: computeBackoffMs(policy, state.attempt, random),
        reason: event.reason,
      };
    case 'waiting':
      return event.type === 'wait_elapsed'
        ? { phase: 'attempting', attempt: state.attempt + 1 }
        : state;
    case 'succeeded':
    case 'failed':
      return state;
  }
}

export interface RetryRunOptions {
  policy: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onWait?: (state: Extract<RetryState, { phase: 'waiting' }>) => void;
}

export interface RetryRun<T> {
  value: T;
  attempts: number;
  final: Extract<RetryState, { phase: 'succeeded' | 'failed' }>;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Drives `attemptFn` through the retry state machine. `attemptFn` encodes
 * failures in its return value; `judge` decides whether that value is a
 * success, a retryable failure or a terminal one. The last value is always
 * returned so callers can inspect why the run ended.
 */
export async function runWithRetry<T>(
  attemptFn: (attempt: number) => Promise<T>,
  judge: (value: T) => AttemptVerdict,
  options: RetryRunOptions,
): Promise<RetryRun<T>> {
  const wait = options.sleep ?? sleep;
  let state: RetryState = { phase: 'attempting', attempt: 1 };

  for (;;) {
    const value = await attemptFn(state.attempt);
    const verdict = judge(value);
    state = nextRetryState(
      state,
      verdict.ok
        ? { type: 'succeeded' }
        : {
            type: 'failed',
            retryable: verdict.retryable,
            reason: verdict.reason,
          },
      options.policy,
      options.random,
    );

    if (state.phase === 'waiting') {
      options.onWait?.(state);
      await wait(state.delayMs);
      state = nextRetryState(state, { type: 'wait_elapsed' }, options.policy);
      continue;
    }
    if (state.phase === 'succeeded' || state.phase === 'failed') {
      return { value, attempts: state.attempt, final: state };
    }
  }
}
