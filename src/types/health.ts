/**
 * Health types: per-connection scores, fleet aggregate, alerts and service status
 */

/** Discrete state derived from a health score */
export type HealthState = "healthy" | "warning" | "unhealthy" | "critical";

export interface ConnectionHealth {
  connectionId: string;
  /** Always within [0, 1] */
  healthScore: number;
  state: HealthState;
  consecutiveFailures: number;
  totalPings: number;
  successfulPings: number;
  errorCount: number;
  /** Exponential moving average of probe latency (weight 0.1) */
  averageLatency: number;
  minLatency: number;
  maxLatency: number;
  lastLatency: number;
  /** Most recent latency samples, oldest first, bounded by maxSampleSize */
  samples: number[];
  createdAt: Date;
  lastCheckAt?: Date;
  lastSuccessAt?: Date;
}

export interface AggregateHealth {
  totalConnections: number;
  healthyConnections: number;
  unhealthyConnections: number;
  averageHealthScore: number;
  averageLatency: number;
  totalErrors: number;
  overallStatus: HealthState;
  lastUpdated: Date;
}

export type AlertType =
  | "health_state_changed"
  | "connection_down"
  | "high_latency"
  | "connection_timeout"
  | "recovery_failed"
  | "recovery_complete";

export type AlertSeverity = "info" | "warning" | "error" | "critical";

export interface HealthAlert {
  id: string;
  type: AlertType;
  severity: AlertSeverity;
  connectionId?: string;
  message: string;
  timestamp: Date;
  metadata: Record<string, unknown>;
}

/**
 * Outcome of a single liveness probe, as reported by the heartbeat probe
 */
export interface ProbeResult {
  connectionId: string;
  success: boolean;
  latencyMs?: number;
  error?: Error;
  timestamp: number;
}

/**
 * Service-level status for readiness endpoints and dashboards
 */
export interface HealthStatus {
  /** Overall status: healthy, degraded, or unhealthy */
  status: "healthy" | "degraded" | "unhealthy";

  /** ISO timestamp of the check */
  timestamp: string;

  connections: {
    active: number;
    capacity: number;
    availableCapacity: number;
    acceptingConnections: boolean;
  };

  health: {
    overallStatus: HealthState;
    averageHealthScore: number;
    healthyConnections: number;
    unhealthyConnections: number;
  };

  heartbeat: {
    running: boolean;
    tracked: number;
    unhealthy: number;
  };

  recovery: {
    enabled: boolean;
    active: number;
    queued: number;
    failed: number;
  };

  alerts: {
    pending: number;
    dropped: number;
  };

  diagnostics: {
    enabled: boolean;
    activeSessions: number;
  };
}
