import { JobCanceledError } from '../errors/jobErrors.js';

/**
 * Sleep function signature used wherever a wait must be interruptible.
 * Implementations reject with JobCanceledError once the signal aborts.
 */
export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait for `ms` milliseconds, or until `signal` aborts (whichever comes first).
 * Rejects immediately if the signal is already aborted.
 */
export const delay: SleepFn = (ms, signal) => {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new JobCanceledError(undefined, 'Wait aborted'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new JobCanceledError(undefined, 'Wait aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
