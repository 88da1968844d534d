/**
 * Tests for BoundedQueue and BoundedPriorityQueue
 */

import { describe, it, expect, beforeEach } from "vitest";
import {
  BoundedPriorityQueue,
  BoundedQueue,
  QueueAbortedError,
  QueueOverflowError
} from "./bounded-queue";

describe("BoundedQueue", () => {
  describe("constructor", () => {
    it("should default to drop-oldest", () => {
      const queue = new BoundedQueue<number>(10);
      expect(queue.getMaxSize()).toBe(10);
      expect(queue.getStrategy()).toBe("drop-oldest");
      expect(queue.isEmpty()).toBe(true);
    });

    it("should throw if maxSize is less than 1", () => {
      expect(() => new BoundedQueue<number>(0)).toThrow("maxSize must be at least 1");
    });
  });

  describe("basic operations", () => {
    let queue: BoundedQueue<string>;

    beforeEach(() => {
      queue = new BoundedQueue<string>(5);
    });

    it("should keep FIFO order", () => {
      queue.push("registered");
      queue.push("ping");
      queue.push("pong");

      expect(queue.peek()).toBe("registered");
      expect(queue.shift()).toBe("registered");
      expect(queue.shift()).toBe("ping");
      expect(queue.size()).toBe(1);
    });

    it("should drain every item oldest first", () => {
      queue.push("a");
      queue.push("b");

      expect(queue.drain()).toEqual(["a", "b"]);
      expect(queue.isEmpty()).toBe(true);
    });

    it("should return a copy from toArray", () => {
      queue.push("a");
      const items = queue.toArray();
      items.push("b");
      expect(queue.size()).toBe(1);
    });
  });

  describe("dropWhile", () => {
    it("should remove leading items matching the predicate only", () => {
      const queue = new BoundedQueue<{ at: number }>(10);
      [100, 200, 300, 150].forEach((at) => queue.push({ at }));

      const removed = queue.dropWhile((item) => item.at < 250);

      expect(removed).toBe(2);
      expect(queue.toArray()).toEqual([{ at: 300 }, { at: 150 }]);
    });

    it("should return 0 when nothing matches", () => {
      const queue = new BoundedQueue<number>(3);
      queue.push(5);
      expect(queue.dropWhile((n) => n > 10)).toBe(0);
      expect(queue.size()).toBe(1);
    });
  });

  describe("drop-oldest strategy", () => {
    it("should evict the oldest item and count the drop", () => {
      const queue = new BoundedQueue<number>(3, "drop-oldest");
      [1, 2, 3, 4, 5].forEach((n) => queue.push(n));

      expect(queue.toArray()).toEqual([3, 4, 5]);
      expect(queue.getDroppedCount()).toBe(2);
    });
  });

  describe("drop-newest strategy", () => {
    it("should refuse new items when full and count them", () => {
      const queue = new BoundedQueue<number>(2, "drop-newest");
      expect(queue.push(1)).toBe(true);
      expect(queue.push(2)).toBe(true);
      expect(queue.push(3)).toBe(false);

      expect(queue.toArray()).toEqual([1, 2]);
      expect(queue.getDroppedCount()).toBe(1);
    });

    it("should accept again once room is made", () => {
      const queue = new BoundedQueue<number>(2, "drop-newest");
      queue.push(1);
      queue.push(2);
      queue.shift();

      expect(queue.push(3)).toBe(true);
      expect(queue.toArray()).toEqual([2, 3]);
    });
  });

  describe("reject strategy", () => {
    it("should throw QueueOverflowError and leave the queue untouched", () => {
      const queue = new BoundedQueue<number>(1, "reject");
      queue.push(1);

      expect(() => queue.push(2)).toThrow(QueueOverflowError);
      expect(() => queue.push(2)).toThrow(/Queue is full/);
      expect(queue.toArray()).toEqual([1]);
    });
  });
});

describe("BoundedPriorityQueue", () => {
  type Level = "critical" | "high" | "normal" | "low";
  const LEVELS: readonly Level[] = ["critical", "high", "normal", "low"];

  let queue: BoundedPriorityQueue<string, Level>;

  beforeEach(() => {
    queue = new BoundedPriorityQueue<string, Level>(4, LEVELS);
  });

  it("should validate its arguments", () => {
    expect(() => new BoundedPriorityQueue<string, Level>(0, LEVELS)).toThrow(
      "capacity must be at least 1"
    );
    expect(() => new BoundedPriorityQueue<string, Level>(1, [])).toThrow(
      "at least one priority level"
    );
  });

  it("should serve the highest level first and FIFO within a level", () => {
    queue.offer("low-1", "low");
    queue.offer("normal-1", "normal");
    queue.offer("critical-1", "critical");
    queue.offer("normal-2", "normal");

    expect(queue.poll()).toBe("critical-1");
    expect(queue.poll()).toBe("normal-1");
    expect(queue.poll()).toBe("normal-2");
    expect(queue.poll()).toBe("low-1");
    expect(queue.poll()).toBeUndefined();
  });

  it("should refuse exactly the item that exceeds capacity", () => {
    const accepted = ["a", "b", "c", "d", "e"].map((item) => queue.offer(item, "normal"));

    expect(accepted).toEqual([true, true, true, true, false]);
    expect(queue.size()).toBe(4);
    expect(queue.isFull()).toBe(true);
  });

  it("should throw on an unknown level", () => {
    const loose = new BoundedPriorityQueue<string, string>(2, ["high", "low"]);
    expect(() => loose.offer("x", "urgent")).toThrow("Unknown priority level: urgent");
  });

  it("should resolve take immediately when items are queued", async () => {
    queue.offer("high-1", "high");
    queue.offer("critical-1", "critical");

    await expect(queue.take()).resolves.toBe("critical-1");
    expect(queue.size()).toBe(1);
  });

  it("should hand an offered item straight to a waiting consumer", async () => {
    const pending = queue.take();
    expect(queue.waitingConsumers()).toBe(1);

    expect(queue.offer("normal-1", "normal")).toBe(true);

    await expect(pending).resolves.toBe("normal-1");
    expect(queue.size()).toBe(0);
    expect(queue.waitingConsumers()).toBe(0);
  });

  it("should reject a pending take when its signal aborts", async () => {
    const controller = new AbortController();
    const pending = queue.take(controller.signal);

    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(QueueAbortedError);
    expect(queue.waitingConsumers()).toBe(0);
  });

  it("should reject take when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(queue.take(controller.signal)).rejects.toBeInstanceOf(QueueAbortedError);
  });

  it("should remove matching items from every level", () => {
    queue.offer("conn-1:a", "high");
    queue.offer("conn-2:a", "normal");
    queue.offer("conn-1:b", "low");

    const removed = queue.removeWhere((item) => item.startsWith("conn-1"));

    expect(removed.sort()).toEqual(["conn-1:a", "conn-1:b"]);
    expect(queue.size()).toBe(1);
    expect(queue.poll()).toBe("conn-2:a");
  });

  it("should return remaining items and reject waiters on close", async () => {
    queue.offer("low-1", "low");
    queue.offer("high-1", "high");
    expect(queue.close()).toEqual(["high-1", "low-1"]);
    expect(queue.size()).toBe(0);

    const pending = queue.take();
    queue.close();
    await expect(pending).rejects.toThrow("Queue closed");
  });
});
