import { TimeoutError } from '../errors.js';

/**
 * Runs `task` with a deadline.
 *
 * The task receives an AbortSignal that fires when the deadline passes, so
 * adapters can pass it on to `fetch` or the SDK they call. The returned
 * promise rejects with a TimeoutError at the deadline whether or not the
 * task honors the signal. The timer is cleared however the task settles,
 * including when it throws synchronously.
 */
export function withTimeout<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    // A task that throws before returning a promise still settles here.
    Promise.resolve()
      .then(() => task(controller.signal))
      .then(result => {
        clearTimeout(timer);
        resolve(result);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}
