/**
 * Fan-out / fan-in helper.
 *
 * Every task runs concurrently with its own timeout budget. Failures are
 * collected, never propagated, so one slow or broken task cannot cancel
 * or delay its siblings. Outcomes come back in task order regardless of
 * completion order.
 *
 * Each task receives a signal that aborts when its own timeout fires, so
 * the work behind it (a child process, a request) can be torn down.
 */

import { withTimeout } from './timeout.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';

export type TaskOutcome<T> =
  | { status: 'fulfilled'; index: number; value: T; durationMs: number }
  | { status: 'rejected'; index: number; reason: unknown; timedOut: boolean; durationMs: number };

export interface TaskGroupOptions<T> {
  /** Per-task budget. Omit for no timeout. */
  timeoutMs?: number;
  createTimeoutError?: (index: number) => Error;
  /** Receives values from tasks that resolved after their timeout fired. */
  onLate?: (value: T, index: number) => void;
}

export async function runTaskGroup<T>(
  tasks: ReadonlyArray<(signal: AbortSignal) => Promise<T>>,
  options: TaskGroupOptions<T> = {}
): Promise<TaskOutcome<T>[]> {
  const { timeoutMs, createTimeoutError, onLate } = options;

  const wrapped = tasks.map(async (task, index): Promise<TaskOutcome<T>> => {
    const started = Date.now();
    let timedOut = false;
    const controller = new AbortController();
    const attempt = Promise.resolve().then(() => task(controller.signal));

    try {
      const value = timeoutMs === undefined
        ? await attempt
        : await withTimeout(attempt, timeoutMs, () => {
            timedOut = true;
            const error = createTimeoutError
              ? createTimeoutError(index)
              : new Error(`Task ${index} timed out after ${timeoutMs}ms`);
            queueMicrotask(() => controller.abort(error));
            return error;
          });
      return { status: 'fulfilled', index, value, durationMs: Date.now() - started };
    } catch (reason) {
      if (timedOut && onLate) {
        void attempt.then(
          value => onLate(value, index),
          (lateError: unknown) => logger.debug(`Task ${index} failed after its timeout: ${errorMessage(lateError)}`)
        );
      }
      return { status: 'rejected', index, reason, timedOut, durationMs: Date.now() - started };
    }
  });

  return Promise.all(wrapped);
}
