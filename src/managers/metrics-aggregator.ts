/**
 * MetricsAggregator - Process-wide counters for connections, messages, errors and latency
 */

import type {
  ConnectionMetrics,
  ErrorMetrics,
  LatencyBucket,
  Logger,
  MessageDirection,
  MessageMetrics,
  MetricsSnapshot,
  PerformanceMetrics
} from "../types";
import { SupervisorError, categorizeErrorCode } from "../types";
import { LATENCY_BUCKETS, THRESHOLDS } from "../constants";

const bucketLabel = (upperBound: number | null): string =>
  upperBound === null ? `>${LATENCY_BUCKETS[LATENCY_BUCKETS.length - 1]}ms` : `<=${upperBound}ms`;

const emptyHistogram = (): LatencyBucket[] => [
  ...LATENCY_BUCKETS.map((upperBound) => ({
    upperBound,
    label: bucketLabel(upperBound),
    count: 0
  })),
  { upperBound: null, label: bucketLabel(null), count: 0 }
];

const emptyConnections = (): ConnectionMetrics => ({
  totalConnections: 0,
  acceptedConnections: 0,
  rejectedConnections: 0,
  closedConnections: 0,
  activeConnections: 0,
  maxConcurrentConnections: 0,
  averageConnectionTime: 0,
  rejectionReasons: {}
});

const emptyMessages = (): MessageMetrics => ({
  messagesSent: 0,
  messagesReceived: 0,
  bytesSent: 0,
  bytesReceived: 0,
  averageMessageSize: 0,
  messageTypes: {}
});

const emptyErrors = (): ErrorMetrics => ({
  totalErrors: 0,
  connectionErrors: 0,
  messageErrors: 0,
  timeoutErrors: 0,
  authenticationErrors: 0,
  errorsByType: {}
});

interface LatencyState {
  average: number;
  min: number;
  max: number;
  samples: number;
  histogram: LatencyBucket[];
}

const emptyLatency = (): LatencyState => ({
  average: 0,
  min: 0,
  max: 0,
  samples: 0,
  histogram: emptyHistogram()
});

/**
 * Aggregates supervisor-wide metrics. Every read returns a deep copy, so a
 * snapshot never changes after it is taken.
 *
 * @example
 * ```typescript
 * const metrics = new MetricsAggregator(logger);
 * metrics.recordMessage('inbound', 'event', 512);
 * metrics.recordLatency(42);
 * const { messages, performance } = metrics.getSummary();
 * ```
 */
export class MetricsAggregator {
  private readonly logger: Logger;
  private connections = emptyConnections();
  private messages = emptyMessages();
  private errors = emptyErrors();
  private latency = emptyLatency();
  private closedSamples = 0;
  private startedAt = Date.now();

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public recordConnectionAccepted(): void {
    this.connections.totalConnections++;
    this.connections.acceptedConnections++;
    this.connections.activeConnections++;
    if (this.connections.activeConnections > this.connections.maxConcurrentConnections) {
      this.connections.maxConcurrentConnections = this.connections.activeConnections;
    }
  }

  public recordConnectionRejected(reason: string): void {
    this.connections.totalConnections++;
    this.connections.rejectedConnections++;
    this.connections.rejectionReasons[reason] =
      (this.connections.rejectionReasons[reason] ?? 0) + 1;
  }

  /**
   * Counts a closed connection and folds its lifetime into the moving average
   */
  public recordConnectionClosed(lifetimeMs: number): void {
    this.connections.closedConnections++;
    this.connections.activeConnections = Math.max(0, this.connections.activeConnections - 1);
    this.connections.averageConnectionTime =
      this.closedSamples === 0
        ? lifetimeMs
        : (1 - THRESHOLDS.LIFETIME_EMA_WEIGHT) * this.connections.averageConnectionTime +
          THRESHOLDS.LIFETIME_EMA_WEIGHT * lifetimeMs;
    this.closedSamples++;
  }

  /**
   * Counts a message. A size that is not a finite, non-negative number counts as 0 bytes.
   */
  public recordMessage(direction: MessageDirection, messageType: string, bytes: number): void {
    let size = bytes;
    if (!Number.isFinite(bytes) || bytes < 0) {
      this.logger.debug("MetricsAggregator: ignoring invalid message size", { messageType, bytes });
      size = 0;
    }
    if (direction === "outbound") {
      this.messages.messagesSent++;
      this.messages.bytesSent += size;
    } else {
      this.messages.messagesReceived++;
      this.messages.bytesReceived += size;
    }
    this.messages.messageTypes[messageType] = (this.messages.messageTypes[messageType] ?? 0) + 1;

    const count = this.messages.messagesSent + this.messages.messagesReceived;
    const totalBytes = this.messages.bytesSent + this.messages.bytesReceived;
    this.messages.averageMessageSize = totalBytes / count;
  }

  /**
   * Counts an error under its category. Plain errors are counted by name.
   */
  public recordError(error: Error): void {
    const code = error instanceof SupervisorError ? error.code : error.name || "Error";

    this.errors.totalErrors++;
    this.errors.errorsByType[code] = (this.errors.errorsByType[code] ?? 0) + 1;
    this.errors.lastError = error.message;
    this.errors.lastErrorTime = new Date();

    switch (categorizeErrorCode(code)) {
      case "connection":
        this.errors.connectionErrors++;
        break;
      case "message":
        this.errors.messageErrors++;
        break;
      case "timeout":
        this.errors.timeoutErrors++;
        break;
      case "authentication":
        this.errors.authenticationErrors++;
        break;
      case "other":
        break;
    }
  }

  public recordLatency(latencyMs: number): void {
    if (!Number.isFinite(latencyMs) || latencyMs < 0) {
      this.logger.debug("MetricsAggregator: ignoring invalid latency sample", { latencyMs });
      return;
    }

    const state = this.latency;
    state.samples++;
    if (state.samples === 1) {
      state.average = latencyMs;
      state.min = latencyMs;
      state.max = latencyMs;
    } else {
      state.average =
        (1 - THRESHOLDS.LATENCY_EMA_WEIGHT) * state.average +
        THRESHOLDS.LATENCY_EMA_WEIGHT * latencyMs;
      state.min = Math.min(state.min, latencyMs);
      state.max = Math.max(state.max, latencyMs);
    }

    const bucket =
      state.histogram.find((b) => b.upperBound !== null && latencyMs <= b.upperBound) ??
      state.histogram[state.histogram.length - 1];
    bucket.count++;
  }

  /**
   * Deep copy of every metric. Rates are derived from uptime at call time.
   */
  public getSummary(): MetricsSnapshot {
    const now = Date.now();
    const uptime = now - this.startedAt;
    const seconds = uptime / 1000;
    const totalMessages = this.messages.messagesSent + this.messages.messagesReceived;
    const totalBytes = this.messages.bytesSent + this.messages.bytesReceived;

    const performance: PerformanceMetrics = {
      averageLatency: this.latency.average,
      minLatency: this.latency.min,
      maxLatency: this.latency.max,
      latencySamples: this.latency.samples,
      latencyHistogram: this.latency.histogram.map((bucket) => ({ ...bucket })),
      messagesPerSecond: seconds > 0 ? totalMessages / seconds : 0,
      bytesPerSecond: seconds > 0 ? totalBytes / seconds : 0
    };

    return {
      connections: {
        ...this.connections,
        rejectionReasons: { ...this.connections.rejectionReasons }
      },
      messages: {
        ...this.messages,
        messageTypes: { ...this.messages.messageTypes }
      },
      errors: {
        ...this.errors,
        errorsByType: { ...this.errors.errorsByType },
        lastErrorTime: this.errors.lastErrorTime ? new Date(this.errors.lastErrorTime) : undefined
      },
      performance,
      uptime,
      startedAt: new Date(this.startedAt),
      timestamp: new Date(now)
    };
  }

  public reset(): void {
    this.connections = emptyConnections();
    this.messages = emptyMessages();
    this.errors = emptyErrors();
    this.latency = emptyLatency();
    this.closedSamples = 0;
    this.startedAt = Date.now();
  }
}
