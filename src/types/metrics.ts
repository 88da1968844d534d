/**
 * Metrics snapshot types. Every snapshot is a deep copy owned by the caller.
 */

export type MessageDirection = "inbound" | "outbound";

export interface ConnectionMetrics {
  totalConnections: number;
  acceptedConnections: number;
  rejectedConnections: number;
  closedConnections: number;
  activeConnections: number;
  maxConcurrentConnections: number;
  /** Moving average of connection lifetime in ms */
  averageConnectionTime: number;
  rejectionReasons: Record<string, number>;
}

export interface MessageMetrics {
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  averageMessageSize: number;
  messageTypes: Record<string, number>;
}

export interface ErrorMetrics {
  totalErrors: number;
  connectionErrors: number;
  messageErrors: number;
  timeoutErrors: number;
  authenticationErrors: number;
  errorsByType: Record<string, number>;
  lastError?: string;
  lastErrorTime?: Date;
}

export interface LatencyBucket {
  /** Inclusive upper bound in ms; null for the overflow bucket */
  upperBound: number | null;
  label: string;
  count: number;
}

export interface PerformanceMetrics {
  averageLatency: number;
  minLatency: number;
  maxLatency: number;
  latencySamples: number;
  latencyHistogram: LatencyBucket[];
  messagesPerSecond: number;
  bytesPerSecond: number;
}

export interface MetricsSnapshot {
  connections: ConnectionMetrics;
  messages: MessageMetrics;
  errors: ErrorMetrics;
  performance: PerformanceMetrics;
  /** Milliseconds since the aggregator started (or was reset) */
  uptime: number;
  startedAt: Date;
  timestamp: Date;
}
