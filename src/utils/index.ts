/**
 * Utility functions and helpers for the connection supervisor
 */

/**
 * Logger creation utilities
 */
export { createPinoLogger } from "./logger";

/**
 * Memory-safe bounded queues with overflow strategies
 * Prevents unbounded memory growth
 */
export {
  BoundedQueue,
  BoundedPriorityQueue,
  QueueOverflowError,
  QueueAbortedError,
  type OverflowStrategy
} from "./bounded-queue";

/**
 * Exponential backoff with optional jitter
 */
export {
  RetryPolicy,
  RetryStrategySchema,
  type RetryStrategy,
  type RandomSource
} from "./retry-policy";

/**
 * Cancellable sleeps and timeouts built on AbortSignal
 */
export { AbortedError, isAbortedError, sleep, withTimeout } from "./abortable";

/**
 * Non-overlapping background loops
 */
export { PeriodicTask } from "./periodic-task";
