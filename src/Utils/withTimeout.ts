import { TimeoutError } from './errors';

/**
 * Settle with `promise`, or reject with a TimeoutError after `timeoutMs`.
 * The timer is always cleared so nothing keeps the event loop alive afterwards.
 */
export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, description: string): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timeout = setTimeout(
      () => reject(new TimeoutError(`${description} did not complete within ${timeoutMs}ms`)),
      timeoutMs
    );
    promise.then(
      (value) => {
        clearTimeout(timeout);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeout);
        reject(error);
      }
    );
  });
