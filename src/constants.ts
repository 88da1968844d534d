/**
 * Timeout and interval constants (milliseconds)
 */
export const TIMEOUTS = {
  /** Liveness probe interval */
  PING_INTERVAL: 30_000,
  /** Silence after which a connection is evicted regardless of the failure counter */
  PONG_TIMEOUT: 90_000,
  /** Wait for a single probe acknowledgment */
  PROBE_TIMEOUT: 10_000,
  /** Hard-timeout sweep interval */
  HEARTBEAT_CLEANUP_INTERVAL: 30_000,
  /** Idle time after which a connection counts as stale */
  STALE_CONNECTION: 5 * 60_000,
  /** Stale sweep interval */
  STALE_CLEANUP_INTERVAL: 60_000,
  /** Fleet aggregate recomputation interval */
  AGGREGATE_INTERVAL: 30_000,
  /** Minimum gap between two alerts of the same type for one connection */
  ALERT_COOLDOWN: 5 * 60_000,
  /** Overall budget for one recovery run */
  RECOVERY_TIMEOUT: 5 * 60_000,
  /** Opening handshake bound for a redial */
  HANDSHAKE_TIMEOUT: 10_000,
  /** Probe interval for recoverable connections */
  RECOVERY_HEALTH_CHECK_INTERVAL: 30_000,
  /** Diagnostics maintenance interval */
  DIAGNOSTIC_INTERVAL: 30_000,
  /** How long diagnostics history is kept */
  DIAGNOSTIC_RETENTION: 24 * 60 * 60_000
} as const;

/**
 * Retry and backoff constants
 */
export const RETRY = {
  MAX_RETRIES: 5,
  INITIAL_BACKOFF: 1000,
  MAX_BACKOFF: 30_000,
  BACKOFF_MULTIPLIER: 2,
  /** Jitter spread as a fraction of the computed delay (symmetric) */
  JITTER_RATIO: 0.1
} as const;

/**
 * Limits and constraints
 */
export const LIMITS = {
  MAX_CONNECTIONS: 1000,
  MAX_LATENCY_SAMPLES: 100,
  MAX_ALERTS: 1000,
  RECOVERY_WORKERS: 10,
  RECOVERY_QUEUE_CAPACITY: 1000,
  MAX_DEBUG_SESSIONS: 10,
  MAX_LOG_ENTRIES: 10_000,
  MAX_TIMELINE_EVENTS: 500,
  MAX_NETWORK_TRACES: 1000,
  MAX_HEALTH_CHECKS: 100
} as const;

/**
 * Scoring thresholds
 */
export const THRESHOLDS = {
  HEALTHY: 0.8,
  UNHEALTHY: 0.5,
  /** Consecutive probe failures before a connection is reported unhealthy */
  FAILURE_THRESHOLD: 3,
  /** A single sample above this raises a high_latency alert */
  HIGH_LATENCY_MS: 500,
  /** Weight of a new sample in the latency moving average */
  LATENCY_EMA_WEIGHT: 0.1,
  /** Weight of a new lifetime in the pool's average lifetime */
  LIFETIME_EMA_WEIGHT: 0.1,
  /** Weight of a new probe score in a recoverable connection's smoothed score */
  RECOVERY_SCORE_WEIGHT: 0.2,
  /** Fleet healthy-ratio cut-offs */
  AGGREGATE_HEALTHY_RATIO: 0.9,
  AGGREGATE_WARNING_RATIO: 0.7,
  AGGREGATE_UNHEALTHY_RATIO: 0.5
} as const;

/**
 * Inclusive upper bounds (ms) of the latency histogram buckets.
 * A tenth bucket collects everything above the last bound.
 */
export const LATENCY_BUCKETS = [1, 5, 10, 50, 100, 500, 1000, 5000, 10000] as const;
