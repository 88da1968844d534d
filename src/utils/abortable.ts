/**
 * Cancellation helpers built on AbortSignal
 * Every wait in the supervisor goes through these so shutdown can interrupt it
 */

import { TimeoutError } from "../types";

/**
 * Rejection raised when a wait is interrupted by its signal
 */
export class AbortedError extends Error {
  constructor(message: string = "Operation aborted") {
    super(message);
    this.name = "AbortedError";
  }
}

export function isAbortedError(error: unknown): error is AbortedError {
  return error instanceof AbortedError;
}

/**
 * Resolves after `ms` milliseconds, or rejects with AbortedError as soon as `signal` aborts.
 *
 * @example
 * ```typescript
 * await sleep(backoff, scope.signal); // interrupted by scope.abort()
 * ```
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortedError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `operation` with a child signal that aborts when `parent` aborts or
 * when `timeoutMs` elapses. A timeout rejects with TimeoutError, a parent abort
 * with AbortedError, whatever the operation itself does with the signal.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
  timeoutMessage?: string
): Promise<T> {
  if (parent?.aborted) {
    return Promise.reject(new AbortedError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      return true;
    };

    const onParentAbort = (): void => {
      if (finish()) {
        controller.abort();
        reject(new AbortedError());
      }
    };

    const timer = setTimeout(() => {
      if (finish()) {
        controller.abort();
        reject(
          new TimeoutError(timeoutMessage || `Operation timed out after ${timeoutMs}ms`, {
            timeoutMs
          })
        );
      }
    }, timeoutMs);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    operation(controller.signal).then(
      (value) => {
        if (finish()) resolve(value);
      },
      (error: unknown) => {
        if (finish()) reject(error);
      }
    );
  });
}
