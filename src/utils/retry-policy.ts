/**
 * RetryPolicy - Exponential backoff with an upper bound and symmetric jitter
 */

import { z } from "zod";
import { RETRY } from "../constants";

/**
 * Backoff configuration
 */
export interface RetryStrategy {
  /** Delay before the first retry (k = 0) in milliseconds */
  initialDelay: number;
  /** Cap applied before jitter */
  maxDelay: number;
  /** Growth factor between consecutive attempts */
  multiplier: number;
  /** Spread every delay by up to ±jitterRatio */
  jitter: boolean;
  jitterRatio?: number;
}

/**
 * Zod schema for retry strategy validation
 */
export const RetryStrategySchema = z.object({
  initialDelay: z.number().min(0).max(3_600_000),
  maxDelay: z.number().min(0).max(86_400_000),
  multiplier: z.number().min(1).max(10),
  jitter: z.boolean(),
  jitterRatio: z.number().min(0).max(1).optional()
});

/** Uniform source in [0, 1), injectable for deterministic tests */
export type RandomSource = () => number;

/**
 * RetryPolicy - Computes recovery delays
 *
 * `backoff(k) = min(initialDelay * multiplier^k, maxDelay)`, then, with jitter on,
 * multiplied by a uniform factor in `[1 - jitterRatio, 1 + jitterRatio)`.
 * A jittered delay therefore never exceeds `maxDelay * (1 + jitterRatio)`.
 *
 * @example
 * ```typescript
 * const policy = RetryPolicy.exponential(1000, 30000, 2, false);
 * policy.calculateDelay(0); // 1000
 * policy.calculateDelay(3); // 8000
 * policy.calculateDelay(6); // 30000 (capped)
 * ```
 */
export class RetryPolicy {
  private readonly strategy: RetryStrategy;
  private readonly random: RandomSource;

  /**
   * @throws {z.ZodError} If strategy is invalid
   * @throws {Error} If maxDelay is lower than initialDelay
   */
  constructor(strategy: RetryStrategy, random: RandomSource = Math.random) {
    this.strategy = RetryStrategySchema.parse(strategy);
    this.random = random;

    if (this.strategy.maxDelay < this.strategy.initialDelay) {
      throw new Error("maxDelay must be greater than or equal to initialDelay");
    }
  }

  /**
   * Delay before attempt `k` (0-based), capped, without jitter
   */
  public baseDelay(attempt: number): number {
    if (attempt < 0) {
      throw new Error("Attempt number must be >= 0");
    }
    const { initialDelay, multiplier, maxDelay } = this.strategy;
    return Math.min(initialDelay * Math.pow(multiplier, attempt), maxDelay);
  }

  /**
   * Delay before attempt `k` (0-based) with jitter applied when enabled
   */
  public calculateDelay(attempt: number): number {
    const delay = this.baseDelay(attempt);
    if (!this.strategy.jitter) {
      return delay;
    }
    const ratio = this.strategy.jitterRatio ?? RETRY.JITTER_RATIO;
    const factor = 1 - ratio + this.random() * 2 * ratio;
    return Math.max(0, Math.floor(delay * factor));
  }

  /**
   * Creates an exponential policy
   */
  static exponential(
    initialDelay: number,
    maxDelay: number,
    multiplier: number = RETRY.BACKOFF_MULTIPLIER,
    jitter: boolean = true,
    random?: RandomSource
  ): RetryPolicy {
    return new RetryPolicy({ initialDelay, maxDelay, multiplier, jitter }, random);
  }
}
