import { TimeoutError, TurnCancelledError } from './errors.js';

/**
 * Race a promise against a timer. The timer is always cleared, so a
 * settled promise never keeps the event loop alive.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  createError: () => Error = () => new TimeoutError(`Operation timed out after ${timeoutMs}ms`, timeoutMs)
): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  const timerPromise = new Promise<never>((_, reject) => {
    timeout = setTimeout(() => {
      reject(createError());
    }, timeoutMs);
  });
  try {
    return await Promise.race([promise, timerPromise]);
  } finally {
    if (timeout !== undefined) clearTimeout(timeout);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new TurnCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new TurnCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

/**
 * A signal that aborts as soon as any of the given signals does.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): AbortSignal {
  const controller = new AbortController();
  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }
  return controller.signal;
}
