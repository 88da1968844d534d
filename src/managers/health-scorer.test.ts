/**
 * Tests for HealthScorer
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { HealthScorer, classifyScore, computeHealthScore, latencyPenalty } from "./health-scorer";
import type { HealthScorerOptions } from "./health-scorer";
import type { Logger } from "../types";

const success = (connectionId: string, latencyMs: number) => ({
  connectionId,
  success: true,
  latencyMs,
  timestamp: Date.now()
});

const failure = (connectionId: string) => ({
  connectionId,
  success: false,
  error: new Error("probe timed out"),
  timestamp: Date.now()
});

describe("computeHealthScore", () => {
  it("should subtract failure and latency penalties from the success rate", () => {
    expect(computeHealthScore(10, 10, 0, 20)).toBe(1);
    expect(computeHealthScore(9, 10, 0, 300)).toBeCloseTo(0.8);
    expect(computeHealthScore(5, 10, 2, 600)).toBeCloseTo(0.1);
  });

  it("should cap the failure penalty at 0.5", () => {
    expect(computeHealthScore(10, 10, 20, 0)).toBeCloseTo(0.5);
  });

  it("should clamp to [0, 1]", () => {
    expect(computeHealthScore(0, 10, 5, 2000)).toBe(0);
    expect(computeHealthScore(0, 0, 0, 0)).toBe(0);
  });

  it("should tier the latency penalty", () => {
    expect([150, 201, 501, 1001].map(latencyPenalty)).toEqual([0, 0.1, 0.2, 0.3]);
  });
});

describe("classifyScore", () => {
  it("should map scores onto states", () => {
    expect(classifyScore(0.8, 0.8, 0.5)).toBe("healthy");
    expect(classifyScore(0.5, 0.8, 0.5)).toBe("warning");
    expect(classifyScore(0.49, 0.8, 0.5)).toBe("unhealthy");
    expect(classifyScore(0, 0.8, 0.5)).toBe("critical");
  });
});

describe("HealthScorer", () => {
  let scorer: HealthScorer;
  let mockLogger: Logger;
  let options: HealthScorerOptions;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    };
    options = {
      healthThreshold: 0.8,
      unhealthyThreshold: 0.5,
      maxSampleSize: 3,
      aggregateInterval: 30000,
      alertCooldown: 300000,
      highLatencyThreshold: 500,
      failureThreshold: 3,
      maxAlerts: 100
    };
    scorer = new HealthScorer(options, mockLogger);
  });

  afterEach(async () => {
    await scorer.close();
  });

  it("should start new connections healthy with score 1", () => {
    scorer.register("conn-1");

    expect(scorer.getHealth("conn-1")).toMatchObject({
      healthScore: 1,
      state: "healthy",
      totalPings: 0
    });
  });

  it("should ignore results for untracked connections", () => {
    expect(scorer.recordProbeResult(success("missing", 10))).toBeUndefined();
  });

  it("should drop to unhealthy with exactly one alert after a success and a failure", () => {
    const changed = vi.fn();
    scorer.on("health:changed", changed);
    scorer.register("conn-1");

    scorer.recordProbeResult(success("conn-1", 20));
    const health = scorer.recordProbeResult(failure("conn-1"));

    expect(health?.healthScore).toBeCloseTo(0.4);
    expect(health?.state).toBe("unhealthy");

    const alerts = scorer.drainAlerts();
    expect(alerts).toHaveLength(1);
    expect(alerts[0]).toMatchObject({
      type: "health_state_changed",
      severity: "error",
      connectionId: "conn-1",
      message: "Connection health changed from healthy to unhealthy"
    });
    expect(changed).toHaveBeenCalledTimes(1);
    expect(changed).toHaveBeenCalledWith("conn-1", "healthy", "unhealthy", expect.closeTo(0.4, 5));
  });

  it("should keep the score within [0, 1] for any outcome sequence", () => {
    scorer.register("conn-1");
    const pattern = [true, false, false, true, false, false, false, true, true, false];

    for (let round = 0; round < 5; round++) {
      for (const ok of pattern) {
        const health = scorer.recordProbeResult(
          ok ? success("conn-1", round * 400) : failure("conn-1")
        );
        expect(health?.healthScore).toBeGreaterThanOrEqual(0);
        expect(health?.healthScore).toBeLessThanOrEqual(1);
      }
    }
  });

  it("should raise connection_down once the failure threshold is reached", () => {
    scorer.register("conn-1");

    scorer.recordProbeResult(failure("conn-1"));
    scorer.recordProbeResult(failure("conn-1"));
    scorer.recordProbeResult(failure("conn-1"));

    const alerts = scorer.drainAlerts();
    expect(alerts.map((alert) => alert.type)).toEqual(["health_state_changed", "connection_down"]);
    expect(alerts[1]).toMatchObject({
      severity: "critical",
      metadata: { consecutiveFailures: 3, error: "probe timed out" }
    });
    expect(scorer.getHealth("conn-1")).toMatchObject({
      healthScore: 0,
      state: "critical",
      consecutiveFailures: 3,
      errorCount: 3
    });
  });

  it("should reset consecutive failures on success", () => {
    scorer.register("conn-1");
    scorer.recordProbeResult(failure("conn-1"));
    scorer.recordProbeResult(failure("conn-1"));
    scorer.recordProbeResult(success("conn-1", 10));

    expect(scorer.getHealth("conn-1")?.consecutiveFailures).toBe(0);
  });

  it("should throttle high latency alerts per connection", async () => {
    scorer.register("conn-1");

    scorer.recordProbeResult(success("conn-1", 600));
    scorer.recordProbeResult(success("conn-1", 700));
    expect(scorer.drainAlerts().map((alert) => alert.type)).toEqual(["high_latency"]);

    await vi.advanceTimersByTimeAsync(300000);
    scorer.recordProbeResult(success("conn-1", 800));
    expect(scorer.drainAlerts().map((alert) => alert.type)).toEqual(["high_latency"]);
  });

  it("should track latency statistics with a moving average", () => {
    scorer.register("conn-1");

    [100, 200, 50, 400].forEach((latency) => scorer.recordProbeResult(success("conn-1", latency)));

    const health = scorer.getHealth("conn-1");
    // 100 -> 110 -> 104 -> 133.6
    expect(health?.averageLatency).toBeCloseTo(133.6);
    expect(health?.minLatency).toBe(50);
    expect(health?.maxLatency).toBe(400);
    expect(health?.lastLatency).toBe(400);
    expect(health?.samples).toEqual([200, 50, 400]);
  });

  it("should count transport errors without changing the score", () => {
    scorer.register("conn-1");
    scorer.recordError("conn-1");

    expect(scorer.getHealth("conn-1")).toMatchObject({ errorCount: 1, healthScore: 1 });
  });

  it("should raise a connection_timeout alert on reportTimeout", () => {
    scorer.reportTimeout("conn-1", 95000);

    expect(scorer.drainAlerts()).toEqual([
      expect.objectContaining({
        type: "connection_timeout",
        severity: "critical",
        connectionId: "conn-1",
        message: "No probe acknowledgment for 95000ms"
      })
    ]);
  });

  describe("alert queue", () => {
    it("should drop alerts once full and deliver each alert once", () => {
      scorer = new HealthScorer({ ...options, maxAlerts: 2 }, mockLogger);

      expect(scorer.raiseAlert({ type: "high_latency", severity: "warning", message: "a" })).toBeDefined();
      expect(scorer.raiseAlert({ type: "high_latency", severity: "warning", message: "b" })).toBeDefined();
      expect(scorer.raiseAlert({ type: "high_latency", severity: "warning", message: "c" })).toBeUndefined();

      expect(scorer.droppedAlerts()).toBe(1);
      expect(scorer.pendingAlerts()).toBe(2);
      expect(scorer.drainAlerts().map((alert) => alert.message)).toEqual(["a", "b"]);
      expect(scorer.drainAlerts()).toEqual([]);
    });

    it("should give every alert a unique id", () => {
      const first = scorer.raiseAlert({ type: "recovery_complete", severity: "info", message: "x" });
      const second = scorer.raiseAlert({ type: "recovery_complete", severity: "info", message: "x" });

      expect(first?.id).toBeTruthy();
      expect(first?.id).not.toBe(second?.id);
    });
  });

  describe("aggregate", () => {
    it("should summarise the fleet", () => {
      scorer.register("a");
      scorer.register("b");
      scorer.recordProbeResult(success("a", 40));
      scorer.recordProbeResult(failure("b"));

      const aggregate = scorer.computeAggregate();

      expect(aggregate).toMatchObject({
        totalConnections: 2,
        healthyConnections: 1,
        unhealthyConnections: 1,
        averageHealthScore: 0.5,
        averageLatency: 20,
        totalErrors: 1,
        overallStatus: "unhealthy"
      });
    });

    it("should keep the previous snapshot when nothing is tracked", () => {
      scorer.register("a");
      const first = scorer.computeAggregate();
      scorer.unregister("a");

      const second = scorer.computeAggregate();
      expect(second.totalConnections).toBe(1);
      expect(second.lastUpdated.getTime()).toBe(first.lastUpdated.getTime());
    });

    it("should recompute on the aggregate interval once started", async () => {
      const onAggregate = vi.fn();
      scorer.on("health:aggregate", onAggregate);
      scorer.register("a");

      scorer.start();
      await vi.advanceTimersByTimeAsync(30000);

      expect(onAggregate).toHaveBeenCalledTimes(1);
      expect(onAggregate).toHaveBeenCalledWith(
        expect.objectContaining({ totalConnections: 1, overallStatus: "healthy" })
      );
    });
  });
});
