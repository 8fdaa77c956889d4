/**
 * @fileoverview Deadlines for calls the loop waits on.
 *
 * @module research-loop/runtime/deadline
 * @version 0.1.0
 */

export interface DeadlineOptions {
  readonly timeoutMs: number;

  /** Aborting rejects the call with the signal's reason */
  readonly signal?: AbortSignal | undefined;

  /** Error the call rejects with when the deadline passes */
  readonly onTimeout: () => Error;
}

/**
 * Runs `operation` with a signal that aborts when the deadline passes or
 * `options.signal` aborts. Either event rejects the returned promise at once,
 * whether or not the operation honours its signal.
 *
 * @example
 * ```typescript
 * const decision = await withDeadline(
 *   signal => planner.decide({ view, tools, signal }),
 *   { timeoutMs: 60_000, signal: runSignal, onTimeout: () => new BackendUnavailableError('Planner timed out') },
 * );
 * ```
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: DeadlineOptions,
): Promise<T> {
  const controller = new AbortController();
  const stopped = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
  });
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  const timer = setTimeout(() => controller.abort(options.onTimeout()), options.timeoutMs);

  if (options.signal?.aborted === true) {
    forwardAbort();
  } else {
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  try {
    return await Promise.race([stopped, operation(controller.signal)]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}
