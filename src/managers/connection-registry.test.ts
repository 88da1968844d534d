/**
 * Tests for ConnectionRegistry
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { Mock } from "vitest";
import { ConnectionRegistry } from "./connection-registry";
import type { ConnectionAttributes, Logger } from "../types";

const attributes = (repository = "docs", sessionId = "session-1"): ConnectionAttributes => ({
  repository,
  sessionId,
  protocolVersion: "2"
});

interface FakeTransport {
  isOpen: boolean;
  ping: Mock<(timeoutMs: number) => Promise<number>>;
  close: Mock<(code?: number, reason?: string) => void>;
}

const createTransport = (latency = 12): FakeTransport => {
  const transport: FakeTransport = {
    isOpen: true,
    ping: vi.fn(async (_timeoutMs: number) => latency),
    close: vi.fn((_code?: number, _reason?: string) => {
      transport.isOpen = false;
    })
  };
  return transport;
};

describe("ConnectionRegistry", () => {
  let registry: ConnectionRegistry;
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    };
    registry = new ConnectionRegistry(
      { maxConnections: 3, staleConnectionTimeout: 60000, staleCleanupInterval: 10000 },
      mockLogger
    );
  });

  afterEach(async () => {
    await registry.closeAll();
  });

  describe("add", () => {
    it("should admit connections below capacity", () => {
      const accepted = vi.fn();
      registry.on("connection:accepted", accepted);

      expect(registry.add("conn-1", createTransport(), attributes())).toBe(true);

      expect(registry.size).toBe(1);
      expect(registry.has("conn-1")).toBe(true);
      expect(accepted).toHaveBeenCalledWith(
        expect.objectContaining({ id: "conn-1", repository: "docs", sessionId: "session-1" })
      );
    });

    it("should never exceed maxConnections", () => {
      const rejected = vi.fn();
      registry.on("connection:rejected", rejected);

      const results = ["a", "b", "c", "d", "e"].map((id) =>
        registry.add(id, createTransport(), attributes())
      );

      expect(results).toEqual([true, true, true, false, false]);
      expect(registry.size).toBe(3);
      expect(registry.canAccept()).toBe(false);
      expect(registry.availableCapacity()).toBe(0);
      expect(rejected).toHaveBeenCalledTimes(2);
      expect(rejected).toHaveBeenCalledWith("d", "pool_full");
      expect(registry.getMetrics().rejectionReasons).toEqual({ pool_full: 2 });
    });

    it("should reject a duplicate id without replacing the entry", () => {
      const first = createTransport();
      registry.add("conn-1", first, attributes("docs"));

      expect(registry.add("conn-1", createTransport(), attributes("api"))).toBe(false);
      expect(registry.get("conn-1")?.repository).toBe("docs");
      expect(registry.getMetrics().rejectionReasons).toEqual({ duplicate_id: 1 });
    });

    it("should reject invalid ids and attributes", () => {
      expect(registry.add("", createTransport(), attributes())).toBe(false);
      expect(registry.add("conn 1", createTransport(), attributes())).toBe(false);
      expect(registry.add("conn-1", createTransport(), attributes(""))).toBe(false);

      expect(registry.size).toBe(0);
      expect(registry.getMetrics().rejectionReasons).toEqual({ invalid_attributes: 3 });
    });

    it("should reject after closeAll", async () => {
      await registry.closeAll();

      expect(registry.add("conn-1", createTransport(), attributes())).toBe(false);
      expect(registry.getMetrics().rejectionReasons).toEqual({ shutting_down: 1 });
    });
  });

  describe("remove and evict", () => {
    it("should remove without closing the transport", () => {
      const transport = createTransport();
      const removed = vi.fn();
      registry.on("connection:removed", removed);
      registry.add("conn-1", transport, attributes());

      expect(registry.remove("conn-1")).toBe(true);
      expect(registry.remove("conn-1")).toBe(false);

      expect(transport.close).not.toHaveBeenCalled();
      expect(removed).toHaveBeenCalledTimes(1);
      expect(removed).toHaveBeenCalledWith(expect.objectContaining({ id: "conn-1" }), "unregistered");
    });

    it("should close the transport on evict", () => {
      const transport = createTransport();
      registry.add("conn-1", transport, attributes());

      expect(registry.evict("conn-1", "heartbeat_timeout")).toBe(true);

      expect(transport.close).toHaveBeenCalledWith(1001, "heartbeat_timeout");
      expect(registry.has("conn-1")).toBe(false);
    });

    it("should still remove when closing the transport throws", () => {
      const transport = createTransport();
      transport.close.mockImplementation(() => {
        throw new Error("already destroyed");
      });
      registry.add("conn-1", transport, attributes());

      expect(registry.evict("conn-1", "stale")).toBe(true);
      expect(registry.has("conn-1")).toBe(false);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        "ConnectionRegistry: transport close failed during eviction",
        expect.objectContaining({ connectionId: "conn-1", error: "already destroyed" })
      );
    });

    it("should free capacity after removal", () => {
      ["a", "b", "c"].forEach((id) => registry.add(id, createTransport(), attributes()));
      registry.remove("b");

      expect(registry.add("d", createTransport(), attributes())).toBe(true);
      expect(registry.size).toBe(3);
    });
  });

  describe("lookups", () => {
    beforeEach(() => {
      registry.add("a", createTransport(), attributes("docs", "s-1"));
      registry.add("b", createTransport(), attributes("api", "s-1"));
      registry.add("c", createTransport(), attributes("docs", "s-2"));
    });

    it("should find connections by repository in admission order", () => {
      expect(registry.getByRepository("docs").map((info) => info.id)).toEqual(["a", "c"]);
      expect(registry.getByRepository("missing")).toEqual([]);
    });

    it("should find connections by session", () => {
      expect(registry.getBySession("s-1").map((info) => info.id)).toEqual(["a", "b"]);
    });

    it("should drop index entries on removal", () => {
      registry.remove("a");
      expect(registry.getByRepository("docs").map((info) => info.id)).toEqual(["c"]);
      expect(registry.getBySession("s-1").map((info) => info.id)).toEqual(["b"]);
    });

    it("should return copies", () => {
      const info = registry.get("a");
      if (info) {
        info.repository = "mutated";
      }
      expect(registry.get("a")?.repository).toBe("docs");
    });
  });

  describe("traffic", () => {
    it("should count messages and bytes per direction", () => {
      registry.add("conn-1", createTransport(), attributes());

      registry.recordTraffic("conn-1", "outbound", 100);
      registry.recordTraffic("conn-1", "outbound", 50);
      registry.recordTraffic("conn-1", "inbound", 20);

      expect(registry.get("conn-1")).toMatchObject({
        messagesSent: 2,
        bytesSent: 150,
        messagesReceived: 1,
        bytesReceived: 20
      });
      expect(registry.recordTraffic("missing", "inbound", 1)).toBe(false);
    });

    it("should add nothing to the byte counters for an invalid size", () => {
      registry.add("conn-1", createTransport(), attributes());

      registry.recordTraffic("conn-1", "inbound", Number.NaN);
      registry.recordTraffic("conn-1", "outbound", -10);

      expect(registry.get("conn-1")).toMatchObject({
        messagesSent: 1,
        bytesSent: 0,
        messagesReceived: 1,
        bytesReceived: 0
      });
    });
  });

  describe("ping", () => {
    it("should probe through the transport", async () => {
      const transport = createTransport(25);
      registry.add("conn-1", transport, attributes());

      await expect(registry.ping("conn-1", 1000)).resolves.toBe(25);
      expect(transport.ping).toHaveBeenCalledWith(1000);
    });

    it("should reject for unknown connections", async () => {
      await expect(registry.ping("missing", 1000)).rejects.toMatchObject({ code: "NOT_FOUND" });
    });

    it("should reject for closed transports", async () => {
      const transport = createTransport();
      transport.isOpen = false;
      registry.add("conn-1", transport, attributes());

      await expect(registry.ping("conn-1", 1000)).rejects.toThrow("Connection conn-1 is not open");
      expect(transport.ping).not.toHaveBeenCalled();
    });
  });

  describe("stale cleanup", () => {
    it("should evict connections idle longer than the limit", async () => {
      const idle = createTransport();
      const busy = createTransport();
      registry.add("idle", idle, attributes());
      registry.add("busy", busy, attributes());

      await vi.advanceTimersByTimeAsync(50000);
      registry.touch("busy");
      await vi.advanceTimersByTimeAsync(20000);

      expect(registry.cleanupStale(60000)).toBe(1);
      expect(idle.close).toHaveBeenCalledWith(1001, "stale");
      expect(registry.has("busy")).toBe(true);
      expect(registry.getMetrics().lastCleanup).toBeInstanceOf(Date);
    });

    it("should sweep periodically once started", async () => {
      const removed = vi.fn();
      registry.on("connection:removed", removed);
      registry.add("conn-1", createTransport(), attributes());
      registry.start();

      // Idle for 60s is not yet stale; the sweep at 70s evicts
      await vi.advanceTimersByTimeAsync(60000);
      expect(removed).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(10000);
      expect(removed).toHaveBeenCalledWith(expect.objectContaining({ id: "conn-1" }), "stale");
    });
  });

  describe("metrics", () => {
    it("should track peak concurrency and average lifetime", async () => {
      registry.add("a", createTransport(), attributes());
      registry.add("b", createTransport(), attributes());
      await vi.advanceTimersByTimeAsync(1000);
      registry.remove("a");
      await vi.advanceTimersByTimeAsync(1000);
      registry.remove("b");

      const metrics = registry.getMetrics();
      expect(metrics.maxConcurrentConnections).toBe(2);
      expect(metrics.connectionsClosed).toBe(2);
      expect(metrics.activeConnections).toBe(0);
      // 1000 first, then 0.9 * 1000 + 0.1 * 2000
      expect(metrics.averageLifetimeMs).toBeCloseTo(1100);
    });

    it("should report utilization and distribution", () => {
      registry.add("a", createTransport(), attributes("docs", "s-1"));
      registry.add("b", createTransport(), attributes("api", "s-1"));

      const stats = registry.getStats();
      expect(stats.activeConnections).toBe(2);
      expect(stats.availableCapacity).toBe(1);
      expect(stats.utilizationPercent).toBeCloseTo(66.667, 2);
      expect(stats.byRepository).toEqual({ docs: 1, api: 1 });
      expect(stats.bySession).toEqual({ "s-1": 2 });
      expect(stats.byProtocolVersion).toEqual({ "2": 2 });
    });

    it("should keep connections on reset", () => {
      registry.add("a", createTransport(), attributes());
      registry.reset();

      const metrics = registry.getMetrics();
      expect(metrics.connectionsAccepted).toBe(0);
      expect(metrics.activeConnections).toBe(1);
    });
  });

  describe("closeAll", () => {
    it("should close every transport", async () => {
      const transports = [createTransport(), createTransport()];
      transports.forEach((transport, i) => registry.add(`conn-${i}`, transport, attributes()));

      await expect(registry.closeAll()).resolves.toBe(2);

      for (const transport of transports) {
        expect(transport.close).toHaveBeenCalledWith(1001, "shutdown");
      }
      expect(registry.size).toBe(0);
    });
  });
});
