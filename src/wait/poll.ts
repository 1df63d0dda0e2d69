import { setTimeout as sleep } from 'node:timers/promises';
import { InterruptedError } from '../errors.js';

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) throw new InterruptedError('Wait was interrupted');
}

/** Readiness waits other than a fixed delay need a deadline in the future. */
export function requirePositiveTimeout(timeoutMs: number): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
}

/** Sleep for `ms`, rejecting with `InterruptedError` as soon as `signal` aborts. */
export async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  try {
    await sleep(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new InterruptedError('Wait was interrupted', { cause: err });
    throw err;
  }
}

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Settle with the outcome of `check`, or with `false` once `ms` have passed.
 * Rejects with `InterruptedError` as soon as `signal` aborts. A check that
 * loses the race is left to finish on its own.
 */
function raceCheck(check: Promise<boolean>, ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve, reject) => {
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
    const onAbort = (): void => {
      cleanup();
      reject(new InterruptedError('Wait was interrupted'));
    };
    const timer = setTimeout(() => {
      cleanup();
      resolve(false);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
    check.then(
      (met) => {
        cleanup();
        resolve(met);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

/**
 * Run `check` until it returns `true` (resolves `true`) or the deadline passes
 * (resolves `false`). Always checks at least once, and neither a pending check
 * nor a sleep runs past the deadline or an abort.
 */
export async function pollUntil(check: () => Promise<boolean>, opts: PollOptions): Promise<boolean> {
  const deadline = Date.now() + opts.timeoutMs;
  for (;;) {
    throwIfAborted(opts.signal);
    if (await raceCheck(check(), Math.max(0, deadline - Date.now()), opts.signal)) return true;
    const remaining = deadline - Date.now();
    if (remaining <= 0) return false;
    await pause(Math.min(opts.intervalMs, remaining), opts.signal);
  }
}
