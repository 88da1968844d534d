/**
 * Bounded queues with overflow strategies
 * Prevents unbounded memory growth when producers outpace consumers
 * (alert bursts, diagnostics history, recovery request storms)
 */

/**
 * Strategy for handling queue overflow when at max capacity
 */
export type OverflowStrategy =
  | "drop-oldest" // Remove oldest item to make room (ring buffer)
  | "drop-newest" // Reject new item, keep existing (non-blocking producer)
  | "reject"; // Throw error, let caller handle (fail-fast)

/**
 * A FIFO queue with a maximum size and configurable overflow behavior
 *
 * @template T The type of items stored in the queue
 *
 * @example
 * ```typescript
 * // Alert queue: producers never block, overflow is counted
 * const alerts = new BoundedQueue<HealthAlert>(1000, 'drop-newest');
 * if (!alerts.push(alert)) {
 *   logger.warn('Alert queue full', { dropped: alerts.getDroppedCount() });
 * }
 *
 * // History ring: keeps the most recent 500 events
 * const timeline = new BoundedQueue<TimelineEvent>(500, 'drop-oldest');
 * ```
 */
export class BoundedQueue<T> {
  private queue: T[] = [];
  private dropped = 0;

  /**
   * @param maxSize Maximum number of items the queue can hold
   * @param strategy How to handle overflow when queue is full
   * @throws {Error} If maxSize is less than 1
   */
  constructor(
    private readonly maxSize: number,
    private readonly strategy: OverflowStrategy = "drop-oldest"
  ) {
    if (maxSize < 1) {
      throw new Error("BoundedQueue maxSize must be at least 1");
    }
  }

  /**
   * Add an item to the end of the queue
   *
   * Behavior when queue is full depends on strategy:
   * - 'drop-oldest': Removes oldest item, adds new item, returns true
   * - 'drop-newest': Rejects new item, returns false
   * - 'reject': Throws QueueOverflowError
   *
   * Every discarded item, old or new, is counted in {@link getDroppedCount}.
   */
  public push(item: T): boolean {
    if (this.queue.length >= this.maxSize) {
      return this.handleOverflow(item);
    }

    this.queue.push(item);
    return true;
  }

  public shift(): T | undefined {
    return this.queue.shift();
  }

  public peek(): T | undefined {
    return this.queue[0];
  }

  /**
   * Removes and returns every item, oldest first
   */
  public drain(): T[] {
    const items = this.queue;
    this.queue = [];
    return items;
  }

  /**
   * Drops leading items while `predicate` holds. Used for retention pruning
   * where items are appended in time order.
   *
   * @returns Number of items removed
   */
  public dropWhile(predicate: (item: T) => boolean): number {
    let count = 0;
    while (count < this.queue.length && predicate(this.queue[count])) {
      count++;
    }
    if (count > 0) {
      this.queue.splice(0, count);
    }
    return count;
  }

  public clear(): void {
    this.queue = [];
  }

  public size(): number {
    return this.queue.length;
  }

  public isFull(): boolean {
    return this.queue.length >= this.maxSize;
  }

  public isEmpty(): boolean {
    return this.queue.length === 0;
  }

  public getMaxSize(): number {
    return this.maxSize;
  }

  public getStrategy(): OverflowStrategy {
    return this.strategy;
  }

  public getDroppedCount(): number {
    return this.dropped;
  }

  /**
   * Returns a copy of all items (oldest to newest)
   */
  public toArray(): T[] {
    return [...this.queue];
  }

  private handleOverflow(item: T): boolean {
    switch (this.strategy) {
      case "drop-oldest":
        this.queue.shift();
        this.queue.push(item);
        this.dropped++;
        return true;

      case "drop-newest":
        this.dropped++;
        return false;

      case "reject":
        throw new QueueOverflowError(
          `Queue is full (max size: ${this.maxSize}). Cannot add more items.`
        );

      default: {
        const exhaustive: never = this.strategy;
        throw new Error(`Unknown overflow strategy: ${String(exhaustive)}`);
      }
    }
  }
}

interface Waiter<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  detach: () => void;
}

/**
 * A bounded multi-level queue feeding a pool of asynchronous consumers.
 *
 * Items are taken highest level first and FIFO within a level. `offer` never
 * blocks: when the queue is full it returns false and the caller decides what
 * to do with the item. A pending `take` receives the next offered item directly.
 *
 * @template T Item type
 * @template P Priority level names, highest first in the constructor
 *
 * @example
 * ```typescript
 * const queue = new BoundedPriorityQueue<Job, 'high' | 'low'>(100, ['high', 'low']);
 * queue.offer(job, 'low');
 *
 * // Consumer loop
 * while (!signal.aborted) {
 *   const next = await queue.take(signal);
 *   await run(next);
 * }
 * ```
 */
export class BoundedPriorityQueue<T, P extends string> {
  private readonly lanes = new Map<P, T[]>();
  private waiters: Waiter<T>[] = [];
  private count = 0;

  /**
   * @param capacity Maximum number of queued items across all levels
   * @param levels Priority levels, highest first
   * @throws {Error} If capacity is less than 1 or no level is given
   */
  constructor(
    private readonly capacity: number,
    private readonly levels: readonly P[]
  ) {
    if (capacity < 1) {
      throw new Error("BoundedPriorityQueue capacity must be at least 1");
    }
    if (levels.length === 0) {
      throw new Error("BoundedPriorityQueue needs at least one priority level");
    }
    for (const level of levels) {
      this.lanes.set(level, []);
    }
  }

  /**
   * Enqueues an item without blocking.
   *
   * @returns false when the queue is full and the item was not accepted
   */
  public offer(item: T, priority: P): boolean {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return true;
    }

    const lane = this.lanes.get(priority);
    if (!lane) {
      throw new Error(`Unknown priority level: ${priority}`);
    }
    if (this.count >= this.capacity) {
      return false;
    }

    lane.push(item);
    this.count++;
    return true;
  }

  /**
   * Removes and returns the highest-priority item, if any
   */
  public poll(): T | undefined {
    for (const level of this.levels) {
      const lane = this.lanes.get(level);
      if (lane && lane.length > 0) {
        this.count--;
        return lane.shift();
      }
    }
    return undefined;
  }

  /**
   * Resolves with the next item, waiting until one is offered.
   *
   * @throws {QueueAbortedError} When `signal` aborts before an item arrives
   */
  public take(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new QueueAbortedError("Queue take aborted"));
    }
    if (this.count > 0) {
      for (const level of this.levels) {
        const lane = this.lanes.get(level);
        if (lane && lane.length > 0) {
          this.count--;
          const [item] = lane.splice(0, 1);
          return Promise.resolve(item);
        }
      }
    }

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new QueueAbortedError("Queue take aborted"));
      };
      const waiter: Waiter<T> = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort)
      };
      this.waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  /**
   * Removes queued items matching `predicate`
   *
   * @returns The removed items
   */
  public removeWhere(predicate: (item: T) => boolean): T[] {
    const removed: T[] = [];
    for (const [level, lane] of this.lanes) {
      const kept: T[] = [];
      for (const item of lane) {
        (predicate(item) ? removed : kept).push(item);
      }
      this.lanes.set(level, kept);
    }
    this.count -= removed.length;
    return removed;
  }

  /**
   * Empties the queue and rejects every pending taker
   *
   * @returns The items that were still queued
   */
  public close(): T[] {
    const remaining: T[] = [];
    for (const level of this.levels) {
      remaining.push(...(this.lanes.get(level) ?? []));
      this.lanes.set(level, []);
    }
    this.count = 0;

    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new QueueAbortedError("Queue closed"));
    }
    return remaining;
  }

  public size(): number {
    return this.count;
  }

  public isFull(): boolean {
    return this.count >= this.capacity;
  }

  public getCapacity(): number {
    return this.capacity;
  }

  /** Number of consumers currently parked in `take` */
  public waitingConsumers(): number {
    return this.waiters.length;
  }
}

/**
 * Error thrown when attempting to add to a full queue with 'reject' strategy
 */
export class QueueOverflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueueOverflowError";

    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueueOverflowError);
    }
  }
}

/**
 * Error a pending `take` rejects with when its signal aborts or the queue closes
 */
export class QueueAbortedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "QueueAbortedError";
  }
}
