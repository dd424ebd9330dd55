import { SessionCancelledError, TimeoutError, throwIfCancelled, timeout } from './errors.js';

/**
 * Run `fn` with its own AbortSignal that fires when the parent signal aborts
 * or when `ms` elapses. On expiry the call is aborted and the promise rejects
 * with TimeoutError.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  options: { signal?: AbortSignal; message?: string } = {}
): Promise<T> {
  const parent = options.signal;
  throwIfCancelled(parent);

  const controller = new AbortController();
  const onAbort = () => controller.abort(new SessionCancelledError());
  parent?.addEventListener('abort', onAbort, { once: true });

  try {
    return await timeout(fn(controller.signal), ms, options.message);
  } catch (error) {
    if (error instanceof TimeoutError) {
      controller.abort(error);
    }
    throw error;
  } finally {
    parent?.removeEventListener('abort', onAbort);
  }
}

/**
 * Resolve after `ms`, or reject with SessionCancelledError if the signal aborts first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SessionCancelledError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new SessionCancelledError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
