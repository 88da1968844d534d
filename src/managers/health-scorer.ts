/**
 * HealthScorer - Per-connection health scores, fleet aggregate and alerting
 *
 * Scores are recomputed from probe outcomes:
 *
 *   successRate    = successfulPings / max(totalPings, 1)
 *   failurePenalty = min(consecutiveFailures * 0.1, 0.5)
 *   latencyPenalty = 0.3 above 1000ms, 0.2 above 500ms, 0.1 above 200ms (moving average)
 *   score          = clamp(successRate - failurePenalty - latencyPenalty, 0, 1)
 */

import { EventEmitter } from "eventemitter3";
import { v4 as uuidv4 } from "uuid";
import type {
  AggregateHealth,
  AlertSeverity,
  AlertType,
  ConnectionHealth,
  HealthAlert,
  HealthState,
  Logger,
  ProbeResult,
  SupervisorEvents
} from "../types";
import { THRESHOLDS } from "../constants";
import { BoundedQueue } from "../utils/bounded-queue";
import { PeriodicTask } from "../utils/periodic-task";

export interface HealthScorerOptions {
  healthThreshold: number;
  unhealthyThreshold: number;
  maxSampleSize: number;
  aggregateInterval: number;
  alertCooldown: number;
  highLatencyThreshold: number;
  failureThreshold: number;
  maxAlerts: number;
}

interface HealthRecord {
  connectionId: string;
  score: number;
  state: HealthState;
  consecutiveFailures: number;
  totalPings: number;
  successfulPings: number;
  errorCount: number;
  averageLatency: number;
  minLatency: number;
  maxLatency: number;
  lastLatency: number;
  samples: BoundedQueue<number>;
  createdAt: number;
  lastCheckAt?: number;
  lastSuccessAt?: number;
  lastAlertAt: Map<AlertType, number>;
}

export interface AlertInput {
  type: AlertType;
  severity: AlertSeverity;
  message: string;
  connectionId?: string;
  metadata?: Record<string, unknown>;
}

const STATE_SEVERITY: Record<HealthState, AlertSeverity> = {
  healthy: "info",
  warning: "warning",
  unhealthy: "error",
  critical: "critical"
};

/**
 * Latency penalty for a moving-average latency in ms
 */
export function latencyPenalty(averageLatency: number): number {
  if (averageLatency > 1000) return 0.3;
  if (averageLatency > 500) return 0.2;
  if (averageLatency > 200) return 0.1;
  return 0;
}

/**
 * Health score in [0, 1] from probe counters and average latency
 */
export function computeHealthScore(
  successfulPings: number,
  totalPings: number,
  consecutiveFailures: number,
  averageLatency: number
): number {
  const successRate = successfulPings / Math.max(totalPings, 1);
  const failurePenalty = Math.min(consecutiveFailures * 0.1, 0.5);
  const score = successRate - failurePenalty - latencyPenalty(averageLatency);
  return Math.min(1, Math.max(0, score));
}

/**
 * Maps a score onto a discrete state
 */
export function classifyScore(
  score: number,
  healthThreshold: number,
  unhealthyThreshold: number
): HealthState {
  if (score >= healthThreshold) return "healthy";
  if (score >= unhealthyThreshold) return "warning";
  if (score > 0) return "unhealthy";
  return "critical";
}

export class HealthScorer extends EventEmitter<SupervisorEvents> {
  private readonly logger: Logger;
  private readonly options: HealthScorerOptions;
  private readonly records = new Map<string, HealthRecord>();
  private readonly alerts: BoundedQueue<HealthAlert>;
  private readonly aggregateTask: PeriodicTask;
  private aggregate: AggregateHealth;

  constructor(options: HealthScorerOptions, logger: Logger) {
    super();
    this.options = { ...options };
    this.logger = logger;
    this.alerts = new BoundedQueue<HealthAlert>(options.maxAlerts, "drop-newest");
    this.aggregate = {
      totalConnections: 0,
      healthyConnections: 0,
      unhealthyConnections: 0,
      averageHealthScore: 0,
      averageLatency: 0,
      totalErrors: 0,
      overallStatus: "healthy",
      lastUpdated: new Date()
    };
    this.aggregateTask = new PeriodicTask(
      "HealthScorer aggregate",
      options.aggregateInterval,
      () => {
        this.computeAggregate();
      },
      logger
    );
  }

  /**
   * Starts tracking a connection. New connections start healthy with a score of 1.
   */
  public register(connectionId: string): void {
    if (this.records.has(connectionId)) {
      return;
    }
    this.records.set(connectionId, {
      connectionId,
      score: 1,
      state: "healthy",
      consecutiveFailures: 0,
      totalPings: 0,
      successfulPings: 0,
      errorCount: 0,
      averageLatency: 0,
      minLatency: 0,
      maxLatency: 0,
      lastLatency: 0,
      samples: new BoundedQueue<number>(this.options.maxSampleSize, "drop-oldest"),
      createdAt: Date.now(),
      lastAlertAt: new Map()
    });
  }

  public unregister(connectionId: string): boolean {
    return this.records.delete(connectionId);
  }

  public has(connectionId: string): boolean {
    return this.records.has(connectionId);
  }

  /**
   * Applies a probe outcome and recomputes the score and state.
   * A state change raises exactly one `health_state_changed` alert.
   *
   * @returns The updated health, or undefined for an untracked connection
   */
  public recordProbeResult(result: ProbeResult): ConnectionHealth | undefined {
    const record = this.records.get(result.connectionId);
    if (!record) {
      return undefined;
    }

    record.totalPings++;
    record.lastCheckAt = result.timestamp;

    if (result.success) {
      const latency = Math.max(0, result.latencyMs ?? 0);
      record.successfulPings++;
      record.consecutiveFailures = 0;
      record.lastSuccessAt = result.timestamp;
      this.addLatencySample(record, latency);

      if (latency > this.options.highLatencyThreshold) {
        this.raiseThrottled(record, {
          type: "high_latency",
          severity: "warning",
          connectionId: record.connectionId,
          message: `High latency detected: ${latency}ms`,
          metadata: { latencyMs: latency, threshold: this.options.highLatencyThreshold }
        });
      }
    } else {
      record.consecutiveFailures++;
      record.errorCount++;

      if (record.consecutiveFailures >= this.options.failureThreshold) {
        this.raiseThrottled(record, {
          type: "connection_down",
          severity: "critical",
          connectionId: record.connectionId,
          message: `Connection failed ${record.consecutiveFailures} consecutive probes`,
          metadata: {
            consecutiveFailures: record.consecutiveFailures,
            error: result.error?.message
          }
        });
      }
    }

    this.rescore(record);
    return this.toHealth(record);
  }

  /**
   * Counts a transport error against a connection without a probe
   */
  public recordError(connectionId: string): void {
    const record = this.records.get(connectionId);
    if (record) {
      record.errorCount++;
    }
  }

  /**
   * Raises a connection_timeout alert for a connection evicted for silence
   */
  public reportTimeout(connectionId: string, silenceMs: number): void {
    this.raiseAlert({
      type: "connection_timeout",
      severity: "critical",
      connectionId,
      message: `No probe acknowledgment for ${silenceMs}ms`,
      metadata: { silenceMs }
    });
  }

  /**
   * Enqueues an alert without blocking. When the queue is full the alert is
   * dropped and counted.
   *
   * @returns The alert, or undefined if it was dropped
   */
  public raiseAlert(input: AlertInput): HealthAlert | undefined {
    const alert: HealthAlert = {
      id: uuidv4(),
      type: input.type,
      severity: input.severity,
      connectionId: input.connectionId,
      message: input.message,
      timestamp: new Date(),
      metadata: { ...input.metadata }
    };

    if (!this.alerts.push(alert)) {
      this.logger.warn("HealthScorer: alert queue full, dropping alert", {
        type: alert.type,
        connectionId: alert.connectionId,
        dropped: this.alerts.getDroppedCount()
      });
      return undefined;
    }

    this.logger.info(`HealthScorer: ${alert.message}`, {
      alertId: alert.id,
      type: alert.type,
      severity: alert.severity,
      connectionId: alert.connectionId
    });
    this.emit("health:alert", alert);
    return alert;
  }

  /**
   * Removes and returns every pending alert. Each alert is delivered at most once.
   */
  public drainAlerts(): HealthAlert[] {
    return this.alerts.drain();
  }

  public pendingAlerts(): number {
    return this.alerts.size();
  }

  public droppedAlerts(): number {
    return this.alerts.getDroppedCount();
  }

  public getHealth(connectionId: string): ConnectionHealth | undefined {
    const record = this.records.get(connectionId);
    return record ? this.toHealth(record) : undefined;
  }

  public getAll(): ConnectionHealth[] {
    return Array.from(this.records.values(), (record) => this.toHealth(record));
  }

  /**
   * Recomputes the fleet snapshot. With no tracked connections the previous
   * snapshot is kept.
   */
  public computeAggregate(): AggregateHealth {
    const total = this.records.size;
    if (total === 0) {
      return this.getAggregate();
    }

    let scoreSum = 0;
    let latencySum = 0;
    let healthy = 0;
    let errors = 0;
    for (const record of this.records.values()) {
      scoreSum += record.score;
      latencySum += record.averageLatency;
      errors += record.errorCount;
      if (record.state === "healthy") {
        healthy++;
      }
    }

    const healthyRatio = healthy / total;
    this.aggregate = {
      totalConnections: total,
      healthyConnections: healthy,
      unhealthyConnections: total - healthy,
      averageHealthScore: scoreSum / total,
      averageLatency: latencySum / total,
      totalErrors: errors,
      overallStatus: this.classifyFleet(healthyRatio),
      lastUpdated: new Date()
    };

    if (this.aggregate.overallStatus !== "healthy") {
      this.logger.warn("HealthScorer: fleet health degraded", {
        overallStatus: this.aggregate.overallStatus,
        healthyRatio,
        total
      });
    }
    this.emit("health:aggregate", this.getAggregate());
    return this.getAggregate();
  }

  public getAggregate(): AggregateHealth {
    return { ...this.aggregate, lastUpdated: new Date(this.aggregate.lastUpdated) };
  }

  public start(): void {
    this.aggregateTask.start();
  }

  public async close(): Promise<void> {
    await this.aggregateTask.stop();
  }

  private classifyFleet(healthyRatio: number): HealthState {
    if (healthyRatio >= THRESHOLDS.AGGREGATE_HEALTHY_RATIO) return "healthy";
    if (healthyRatio >= THRESHOLDS.AGGREGATE_WARNING_RATIO) return "warning";
    if (healthyRatio >= THRESHOLDS.AGGREGATE_UNHEALTHY_RATIO) return "unhealthy";
    return "critical";
  }

  private addLatencySample(record: HealthRecord, latency: number): void {
    if (record.successfulPings === 1) {
      record.averageLatency = latency;
      record.minLatency = latency;
      record.maxLatency = latency;
    } else {
      record.averageLatency =
        (1 - THRESHOLDS.LATENCY_EMA_WEIGHT) * record.averageLatency +
        THRESHOLDS.LATENCY_EMA_WEIGHT * latency;
      record.minLatency = Math.min(record.minLatency, latency);
      record.maxLatency = Math.max(record.maxLatency, latency);
    }
    record.lastLatency = latency;
    record.samples.push(latency);
  }

  private rescore(record: HealthRecord): void {
    const previous = record.state;
    record.score = computeHealthScore(
      record.successfulPings,
      record.totalPings,
      record.consecutiveFailures,
      record.averageLatency
    );
    record.state = classifyScore(
      record.score,
      this.options.healthThreshold,
      this.options.unhealthyThreshold
    );

    if (record.state === previous) {
      return;
    }

    this.raiseAlert({
      type: "health_state_changed",
      severity: STATE_SEVERITY[record.state],
      connectionId: record.connectionId,
      message: `Connection health changed from ${previous} to ${record.state}`,
      metadata: { previousState: previous, newState: record.state, score: record.score }
    });
    this.emit("health:changed", record.connectionId, previous, record.state, record.score);
  }

  private raiseThrottled(record: HealthRecord, input: AlertInput): void {
    const now = Date.now();
    const last = record.lastAlertAt.get(input.type);
    if (last !== undefined && now - last < this.options.alertCooldown) {
      return;
    }
    record.lastAlertAt.set(input.type, now);
    this.raiseAlert(input);
  }

  private toHealth(record: HealthRecord): ConnectionHealth {
    return {
      connectionId: record.connectionId,
      healthScore: record.score,
      state: record.state,
      consecutiveFailures: record.consecutiveFailures,
      totalPings: record.totalPings,
      successfulPings: record.successfulPings,
      errorCount: record.errorCount,
      averageLatency: record.averageLatency,
      minLatency: record.minLatency,
      maxLatency: record.maxLatency,
      lastLatency: record.lastLatency,
      samples: record.samples.toArray(),
      createdAt: new Date(record.createdAt),
      lastCheckAt: record.lastCheckAt !== undefined ? new Date(record.lastCheckAt) : undefined,
      lastSuccessAt: record.lastSuccessAt !== undefined ? new Date(record.lastSuccessAt) : undefined
    };
  }
}
