/**
 * Tests for MetricsAggregator
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { MetricsAggregator } from "./metrics-aggregator";
import type { Logger } from "../types";
import { AuthenticationError, ConnectionError, TimeoutError, ValidationError } from "../types";

describe("MetricsAggregator", () => {
  let metrics: MetricsAggregator;
  let mockLogger: Logger;

  beforeEach(() => {
    mockLogger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn()
    };
    metrics = new MetricsAggregator(mockLogger);
  });

  describe("connections", () => {
    it("should count accepted, rejected and closed connections", () => {
      metrics.recordConnectionAccepted();
      metrics.recordConnectionAccepted();
      metrics.recordConnectionRejected("pool_full");
      metrics.recordConnectionClosed(1000);
      metrics.recordConnectionClosed(3000);

      expect(metrics.getSummary().connections).toEqual({
        totalConnections: 3,
        acceptedConnections: 2,
        rejectedConnections: 1,
        closedConnections: 2,
        activeConnections: 0,
        maxConcurrentConnections: 2,
        // 1000, then 0.9 * 1000 + 0.1 * 3000
        averageConnectionTime: 1200,
        rejectionReasons: { pool_full: 1 }
      });
    });

    it("should never report a negative active count", () => {
      metrics.recordConnectionClosed(10);
      expect(metrics.getSummary().connections.activeConnections).toBe(0);
    });
  });

  describe("messages", () => {
    it("should count messages, bytes and types per direction", () => {
      metrics.recordMessage("inbound", "subscribe", 100);
      metrics.recordMessage("outbound", "event", 300);
      metrics.recordMessage("outbound", "event", 200);

      expect(metrics.getSummary().messages).toEqual({
        messagesSent: 2,
        messagesReceived: 1,
        bytesSent: 500,
        bytesReceived: 100,
        averageMessageSize: 200,
        messageTypes: { subscribe: 1, event: 2 }
      });
    });

    it("should count messages with an invalid size as zero bytes", () => {
      metrics.recordMessage("inbound", "text", 40);
      metrics.recordMessage("inbound", "text", Number.NaN);
      metrics.recordMessage("outbound", "text", -5);
      metrics.recordMessage("outbound", "text", Number.POSITIVE_INFINITY);

      expect(metrics.getSummary().messages).toMatchObject({
        messagesSent: 2,
        messagesReceived: 2,
        bytesSent: 0,
        bytesReceived: 40,
        averageMessageSize: 10
      });
      expect(mockLogger.debug).toHaveBeenCalledTimes(3);
    });

    it("should derive rates from uptime", async () => {
      await vi.advanceTimersByTimeAsync(2000);
      metrics.recordMessage("outbound", "event", 400);
      metrics.recordMessage("outbound", "event", 600);

      const { performance, uptime } = metrics.getSummary();
      expect(uptime).toBe(2000);
      expect(performance.messagesPerSecond).toBe(1);
      expect(performance.bytesPerSecond).toBe(500);
    });
  });

  describe("errors", () => {
    it("should categorize supervisor errors by code", () => {
      metrics.recordError(new ConnectionError("reset"));
      metrics.recordError(new TimeoutError("probe"));
      metrics.recordError(new TimeoutError("probe"));
      metrics.recordError(new ValidationError("bad frame"));
      metrics.recordError(new AuthenticationError("denied"));

      const { errors } = metrics.getSummary();
      expect(errors).toMatchObject({
        totalErrors: 5,
        connectionErrors: 1,
        timeoutErrors: 2,
        messageErrors: 1,
        authenticationErrors: 1,
        errorsByType: { CONNECTION_ERROR: 1, TIMEOUT_ERROR: 2, VALIDATION_ERROR: 1, AUTH_ERROR: 1 },
        lastError: "denied"
      });
      expect(errors.lastErrorTime).toBeInstanceOf(Date);
    });

    it("should count plain errors by name only", () => {
      metrics.recordError(new RangeError("out of range"));

      expect(metrics.getSummary().errors).toMatchObject({
        totalErrors: 1,
        connectionErrors: 0,
        errorsByType: { RangeError: 1 }
      });
    });
  });

  describe("latency", () => {
    it("should track a moving average with min and max", () => {
      [20, 40, 10].forEach((ms) => metrics.recordLatency(ms));

      const { performance } = metrics.getSummary();
      // 20 -> 22 -> 20.8
      expect(performance.averageLatency).toBeCloseTo(20.8);
      expect(performance.minLatency).toBe(10);
      expect(performance.maxLatency).toBe(40);
      expect(performance.latencySamples).toBe(3);
    });

    it("should place samples in inclusive histogram buckets", () => {
      [0.5, 1, 5, 7, 500, 9999, 10000, 10001, 60000].forEach((ms) => metrics.recordLatency(ms));

      const histogram = metrics.getSummary().performance.latencyHistogram;
      expect(histogram.map((bucket) => bucket.label)).toEqual([
        "<=1ms",
        "<=5ms",
        "<=10ms",
        "<=50ms",
        "<=100ms",
        "<=500ms",
        "<=1000ms",
        "<=5000ms",
        "<=10000ms",
        ">10000ms"
      ]);
      expect(histogram.map((bucket) => bucket.count)).toEqual([2, 1, 1, 0, 0, 1, 0, 0, 2, 2]);
    });

    it("should ignore invalid samples", () => {
      metrics.recordLatency(-1);
      metrics.recordLatency(Number.NaN);

      expect(metrics.getSummary().performance.latencySamples).toBe(0);
      expect(mockLogger.debug).toHaveBeenCalledTimes(2);
    });
  });

  describe("snapshots", () => {
    it("should not change after they are taken", () => {
      metrics.recordConnectionRejected("pool_full");
      metrics.recordMessage("inbound", "subscribe", 10);
      metrics.recordLatency(3);
      const snapshot = metrics.getSummary();

      metrics.recordConnectionRejected("pool_full");
      metrics.recordMessage("inbound", "subscribe", 10);
      metrics.recordLatency(3);

      expect(snapshot.connections.rejectionReasons).toEqual({ pool_full: 1 });
      expect(snapshot.messages.messageTypes).toEqual({ subscribe: 1 });
      expect(snapshot.performance.latencyHistogram[1].count).toBe(1);
    });

    it("should not let callers mutate internal state", () => {
      const snapshot = metrics.getSummary();
      snapshot.errors.errorsByType.Injected = 5;
      snapshot.performance.latencyHistogram[0].count = 99;

      const fresh = metrics.getSummary();
      expect(fresh.errors.errorsByType).toEqual({});
      expect(fresh.performance.latencyHistogram[0].count).toBe(0);
    });
  });

  it("should clear everything on reset", async () => {
    metrics.recordConnectionAccepted();
    metrics.recordError(new ConnectionError("reset"));
    metrics.recordLatency(5);
    await vi.advanceTimersByTimeAsync(5000);

    metrics.reset();

    const summary = metrics.getSummary();
    expect(summary.connections.totalConnections).toBe(0);
    expect(summary.errors.totalErrors).toBe(0);
    expect(summary.performance.latencySamples).toBe(0);
    expect(summary.uptime).toBe(0);
  });
});
