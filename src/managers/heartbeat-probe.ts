/**
 * HeartbeatProbe - Periodic liveness probing of registered connections
 *
 * Two independent loops run while the probe is started:
 * - the ping loop probes every tracked connection concurrently each `pingInterval`
 *   and feeds the outcome to the HealthScorer;
 * - the timeout sweep evicts any connection whose last acknowledgment is older
 *   than `pongTimeout`, whatever its failure counter says.
 */

import { EventEmitter } from "eventemitter3";
import type { Logger, SupervisorEvents } from "../types";
import { TimeoutError } from "../types";
import { PeriodicTask } from "../utils/periodic-task";
import type { ConnectionRegistry } from "./connection-registry";
import type { HealthScorer } from "./health-scorer";

export interface HeartbeatProbeOptions {
  pingInterval: number;
  pongTimeout: number;
  probeTimeout: number;
  cleanupInterval: number;
  failureThreshold: number;
}

interface HeartbeatRecord {
  connectionId: string;
  lastPingSentAt?: number;
  lastAckAt: number;
  inFlight: boolean;
}

export interface HeartbeatMetrics {
  trackedConnections: number;
  pingsSent: number;
  pongsReceived: number;
  probeFailures: number;
  timeouts: number;
  evictions: number;
  skippedInFlight: number;
  healthyConnections: number;
  unhealthyConnections: number;
  averageLatency: number;
  minLatency: number;
  maxLatency: number;
  lastCheck?: Date;
}

export class HeartbeatProbe extends EventEmitter<SupervisorEvents> {
  private readonly logger: Logger;
  private readonly options: HeartbeatProbeOptions;
  private readonly registry: ConnectionRegistry;
  private readonly scorer: HealthScorer;
  private readonly records = new Map<string, HeartbeatRecord>();
  private readonly pingTask: PeriodicTask;
  private readonly sweepTask: PeriodicTask;

  private pingsSent = 0;
  private pongsReceived = 0;
  private probeFailures = 0;
  private timeouts = 0;
  private evictions = 0;
  private skippedInFlight = 0;
  private latencyTotal = 0;
  private minLatency = 0;
  private maxLatency = 0;
  private lastCheck?: number;

  constructor(
    options: HeartbeatProbeOptions,
    registry: ConnectionRegistry,
    scorer: HealthScorer,
    logger: Logger
  ) {
    super();
    this.options = { ...options };
    this.registry = registry;
    this.scorer = scorer;
    this.logger = logger;
    this.pingTask = new PeriodicTask(
      "HeartbeatProbe ping loop",
      options.pingInterval,
      () => this.probeAll(),
      logger
    );
    this.sweepTask = new PeriodicTask(
      "HeartbeatProbe timeout sweep",
      options.cleanupInterval,
      () => {
        this.sweepTimedOut();
      },
      logger
    );
  }

  /**
   * Starts tracking a connection. Registration counts as the first acknowledgment.
   */
  public track(connectionId: string): void {
    if (this.records.has(connectionId)) {
      return;
    }
    this.records.set(connectionId, {
      connectionId,
      lastAckAt: Date.now(),
      inFlight: false
    });
  }

  public untrack(connectionId: string): boolean {
    return this.records.delete(connectionId);
  }

  public isTracked(connectionId: string): boolean {
    return this.records.has(connectionId);
  }

  /**
   * Probes every tracked connection concurrently. A connection whose previous
   * probe is still in flight is skipped this round.
   */
  public async probeAll(): Promise<void> {
    const ids = Array.from(this.records.keys());
    this.lastCheck = Date.now();
    if (ids.length === 0) {
      return;
    }

    await Promise.allSettled(ids.map((id) => this.probe(id)));
    this.logger.debug("HeartbeatProbe: probe round complete", { probed: ids.length });
  }

  /**
   * Probes one connection and applies the outcome
   *
   * @returns true if the connection acknowledged within probeTimeout
   */
  public async probe(connectionId: string): Promise<boolean> {
    const record = this.records.get(connectionId);
    if (!record) {
      return false;
    }
    if (record.inFlight) {
      this.skippedInFlight++;
      return false;
    }

    record.inFlight = true;
    record.lastPingSentAt = Date.now();
    this.pingsSent++;

    try {
      const latency = await this.registry.ping(connectionId, this.options.probeTimeout);
      if (this.records.get(connectionId) === record) {
        this.onAck(record, latency);
      }
      return true;
    } catch (error) {
      if (this.records.get(connectionId) === record) {
        this.onFailure(record, error instanceof Error ? error : new Error(String(error)));
      }
      return false;
    } finally {
      record.inFlight = false;
    }
  }

  /**
   * Evicts every connection silent for longer than pongTimeout
   *
   * @returns Number of evicted connections
   */
  public sweepTimedOut(): number {
    const now = Date.now();
    const expired: HeartbeatRecord[] = [];
    for (const record of this.records.values()) {
      if (now - record.lastAckAt > this.options.pongTimeout) {
        expired.push(record);
      }
    }
    for (const record of expired) {
      this.expire(record, now);
    }
    return expired.length;
  }

  public getMetrics(): HeartbeatMetrics {
    let healthy = 0;
    let unhealthy = 0;
    for (const id of this.records.keys()) {
      const health = this.scorer.getHealth(id);
      if (!health) continue;
      if (health.consecutiveFailures >= this.options.failureThreshold) {
        unhealthy++;
      } else {
        healthy++;
      }
    }

    return {
      trackedConnections: this.records.size,
      pingsSent: this.pingsSent,
      pongsReceived: this.pongsReceived,
      probeFailures: this.probeFailures,
      timeouts: this.timeouts,
      evictions: this.evictions,
      skippedInFlight: this.skippedInFlight,
      healthyConnections: healthy,
      unhealthyConnections: unhealthy,
      averageLatency: this.pongsReceived > 0 ? this.latencyTotal / this.pongsReceived : 0,
      minLatency: this.minLatency,
      maxLatency: this.maxLatency,
      lastCheck: this.lastCheck !== undefined ? new Date(this.lastCheck) : undefined
    };
  }

  public get isRunning(): boolean {
    return this.pingTask.isRunning;
  }

  public start(): void {
    this.pingTask.start();
    this.sweepTask.start();
    this.logger.info("HeartbeatProbe: started", {
      pingInterval: this.options.pingInterval,
      pongTimeout: this.options.pongTimeout
    });
  }

  /**
   * Stops both loops and waits for in-flight rounds to settle
   */
  public async close(): Promise<void> {
    await Promise.all([this.pingTask.stop(), this.sweepTask.stop()]);
    this.records.clear();
  }

  private onAck(record: HeartbeatRecord, latency: number): void {
    const now = Date.now();
    record.lastAckAt = now;
    this.pongsReceived++;
    this.latencyTotal += latency;
    this.minLatency = this.pongsReceived === 1 ? latency : Math.min(this.minLatency, latency);
    this.maxLatency = Math.max(this.maxLatency, latency);

    this.registry.touch(record.connectionId);
    this.scorer.recordProbeResult({
      connectionId: record.connectionId,
      success: true,
      latencyMs: latency,
      timestamp: now
    });
    this.emit("heartbeat:ack", record.connectionId, latency);
  }

  private onFailure(record: HeartbeatRecord, error: Error): void {
    const now = Date.now();
    this.probeFailures++;
    if (error instanceof TimeoutError) {
      this.timeouts++;
    }

    const health = this.scorer.recordProbeResult({
      connectionId: record.connectionId,
      success: false,
      error,
      timestamp: now
    });

    this.logger.debug("HeartbeatProbe: probe failed", {
      connectionId: record.connectionId,
      consecutiveFailures: health?.consecutiveFailures,
      error: error.message
    });

    // Repeats on every failure past the threshold; recovery ignores a connection it already queued
    if (health && health.consecutiveFailures >= this.options.failureThreshold) {
      if (health.consecutiveFailures === this.options.failureThreshold) {
        this.logger.warn("HeartbeatProbe: connection marked unhealthy", {
          connectionId: record.connectionId,
          consecutiveFailures: health.consecutiveFailures
        });
      }
      this.emit("heartbeat:unhealthy", record.connectionId, health.consecutiveFailures);
    }

    if (now - record.lastAckAt > this.options.pongTimeout) {
      this.expire(record, now);
    }
  }

  private expire(record: HeartbeatRecord, now: number): void {
    if (this.records.get(record.connectionId) !== record) {
      return;
    }
    const silenceMs = now - record.lastAckAt;
    this.records.delete(record.connectionId);
    this.evictions++;

    this.logger.warn("HeartbeatProbe: evicting silent connection", {
      connectionId: record.connectionId,
      silenceMs,
      pongTimeout: this.options.pongTimeout
    });
    this.emit("heartbeat:timeout", record.connectionId, silenceMs);
    this.registry.evict(record.connectionId, "heartbeat_timeout");
  }
}
