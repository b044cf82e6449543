/**
 * Bounded, fixed-interval polling.
 *
 * Every wait in the runner goes through `pollUntil`: the check runs once
 * immediately, then once per interval until it reports done, throws, the
 * deadline passes or the caller aborts. No jitter, no backoff.
 */

import { TimeoutError } from "../errors";

/** Outcome of one poll attempt */
export type PollResult<T> = { done: true; value: T } | { done: false };

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  /** What is being waited for, used in the timeout message */
  description?: string;
}

/** Attempt result for a finished poll */
export function pollDone<T>(value: T): PollResult<T> {
  return { done: true, value };
}

/** Attempt result for a poll that should run again */
export const POLL_PENDING: PollResult<never> = { done: false };

/**
 * Resolve after `ms`, or reject with the signal's reason once it aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Poll `check` until it reports done.
 *
 * The sleep before the last attempt is clipped to the deadline, so the final
 * check happens exactly when the wait expires. Errors thrown by `check`
 * propagate unchanged.
 *
 * @throws TimeoutError when the deadline passes with the check still pending
 */
export async function pollUntil<T>(
  check: (attempt: number) => Promise<PollResult<T>>,
  options: PollOptions
): Promise<T> {
  const { intervalMs, timeoutMs, signal, description = "condition" } = options;
  const deadline = Date.now() + timeoutMs;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();

    const result = await check(attempt);
    if (result.done) {
      return result.value;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      break;
    }
    await sleep(Math.min(intervalMs, remaining), signal);
  }

  throw new TimeoutError(
    `Timed out after ${formatSeconds(timeoutMs)} waiting for ${description}`,
    timeoutMs
  );
}

function formatSeconds(ms: number): string {
  return `${ms / 1000}s`;
}
