/**
 * Configuration schemas for the connection supervisor using Zod
 * Provides runtime validation, defaults and TypeScript type inference
 */

import { z } from "zod";
import { ConfigurationError } from "./events";
import { TIMEOUTS, RETRY, LIMITS, THRESHOLDS } from "../constants";

// Logger interface
export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

const isLogger = (value: unknown): value is Logger =>
  typeof value === "object" &&
  value !== null &&
  "debug" in value &&
  typeof value.debug === "function" &&
  "info" in value &&
  typeof value.info === "function" &&
  "warn" in value &&
  typeof value.warn === "function" &&
  "error" in value &&
  typeof value.error === "function";

// Logger schema - any object exposing the four level methods
export const LoggerSchema = z.custom<Logger>(isLogger, {
  message: "Logger must implement debug, info, warn and error"
});

// Log level schema
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

// Diagnostics detail level schema
export const DetailLevelSchema = z.enum(["basic", "standard", "detailed", "verbose"]);

const duration = (min: number, max: number) => z.number().int().min(min).max(max);
const ratio = z.number().min(0).max(1);

// Supervisor configuration schema. Durations are milliseconds.
export const SupervisorConfigSchema = z.object({
  // Admission
  maxConnections: z.number().int().min(1).max(1_000_000),
  staleConnectionTimeout: duration(1000, 86_400_000),
  staleCleanupInterval: duration(100, 3_600_000),

  // Heartbeat
  pingInterval: duration(50, 3_600_000),
  pongTimeout: duration(100, 86_400_000),
  probeTimeout: duration(10, 600_000),
  heartbeatCleanupInterval: duration(50, 3_600_000),
  failureThreshold: z.number().int().min(1).max(100),

  // Health scoring
  healthThreshold: ratio,
  unhealthyThreshold: ratio,
  maxSampleSize: z.number().int().min(1).max(100_000),
  aggregateInterval: duration(50, 3_600_000),
  alertCooldown: duration(0, 86_400_000),
  highLatencyThreshold: duration(1, 600_000),
  maxAlerts: z.number().int().min(1).max(1_000_000),

  // Recovery
  enableRecovery: z.boolean(),
  recoveryEnabledByDefault: z.boolean(),
  maxRetries: z.number().int().min(1).max(1000),
  initialBackoff: duration(1, 3_600_000),
  maxBackoff: duration(1, 86_400_000),
  backoffMultiplier: z.number().min(1).max(10),
  jitterEnabled: z.boolean(),
  recoveryTimeout: duration(100, 86_400_000),
  handshakeTimeout: duration(10, 600_000),
  recoveryWorkers: z.number().int().min(1).max(1000),
  recoveryQueueCapacity: z.number().int().min(1).max(1_000_000),
  recoveryHealthCheckInterval: duration(50, 3_600_000),

  // Diagnostics
  enableDiagnostics: z.boolean(),
  enableNetworkTracing: z.boolean(),
  detailLevel: DetailLevelSchema,
  maxDebugSessions: z.number().int().min(0).max(10_000),
  retentionPeriod: duration(1000, 30 * 86_400_000),
  maxLogEntries: z.number().int().min(1).max(1_000_000),
  diagnosticInterval: duration(50, 3_600_000),

  // Logging
  logLevel: LogLevelSchema,
  logger: LoggerSchema.optional()
});

// Partial config accepted by the supervisor constructor
export const PartialSupervisorConfigSchema = SupervisorConfigSchema.partial();

// Type inference from schemas
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type DetailLevel = z.infer<typeof DetailLevelSchema>;
export type SupervisorConfig = z.infer<typeof SupervisorConfigSchema>;
export type PartialSupervisorConfig = z.infer<typeof PartialSupervisorConfigSchema>;

// Default configuration with validation
export const DEFAULT_CONFIG: SupervisorConfig = SupervisorConfigSchema.parse({
  maxConnections: LIMITS.MAX_CONNECTIONS,
  staleConnectionTimeout: TIMEOUTS.STALE_CONNECTION,
  staleCleanupInterval: TIMEOUTS.STALE_CLEANUP_INTERVAL,

  pingInterval: TIMEOUTS.PING_INTERVAL,
  pongTimeout: TIMEOUTS.PONG_TIMEOUT,
  probeTimeout: TIMEOUTS.PROBE_TIMEOUT,
  heartbeatCleanupInterval: TIMEOUTS.HEARTBEAT_CLEANUP_INTERVAL,
  failureThreshold: THRESHOLDS.FAILURE_THRESHOLD,

  healthThreshold: THRESHOLDS.HEALTHY,
  unhealthyThreshold: THRESHOLDS.UNHEALTHY,
  maxSampleSize: LIMITS.MAX_LATENCY_SAMPLES,
  aggregateInterval: TIMEOUTS.AGGREGATE_INTERVAL,
  alertCooldown: TIMEOUTS.ALERT_COOLDOWN,
  highLatencyThreshold: THRESHOLDS.HIGH_LATENCY_MS,
  maxAlerts: LIMITS.MAX_ALERTS,

  enableRecovery: true,
  recoveryEnabledByDefault: true,
  maxRetries: RETRY.MAX_RETRIES,
  initialBackoff: RETRY.INITIAL_BACKOFF,
  maxBackoff: RETRY.MAX_BACKOFF,
  backoffMultiplier: RETRY.BACKOFF_MULTIPLIER,
  jitterEnabled: true,
  recoveryTimeout: TIMEOUTS.RECOVERY_TIMEOUT,
  handshakeTimeout: TIMEOUTS.HANDSHAKE_TIMEOUT,
  recoveryWorkers: LIMITS.RECOVERY_WORKERS,
  recoveryQueueCapacity: LIMITS.RECOVERY_QUEUE_CAPACITY,
  recoveryHealthCheckInterval: TIMEOUTS.RECOVERY_HEALTH_CHECK_INTERVAL,

  enableDiagnostics: false,
  enableNetworkTracing: false,
  detailLevel: "standard",
  maxDebugSessions: LIMITS.MAX_DEBUG_SESSIONS,
  retentionPeriod: TIMEOUTS.DIAGNOSTIC_RETENTION,
  maxLogEntries: LIMITS.MAX_LOG_ENTRIES,
  diagnosticInterval: TIMEOUTS.DIAGNOSTIC_INTERVAL,

  logLevel: "info"
});

/**
 * Validates a complete configuration, including cross-field constraints.
 *
 * @throws {ConfigurationError} With the zod issues in `details.issues` on schema failure
 */
export function validateConfig(config: unknown): SupervisorConfig {
  const result = SupervisorConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError("Invalid supervisor configuration", {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message
      }))
    });
  }

  const parsed = result.data;

  if (parsed.unhealthyThreshold >= parsed.healthThreshold) {
    throw new ConfigurationError("unhealthyThreshold must be lower than healthThreshold", {
      healthThreshold: parsed.healthThreshold,
      unhealthyThreshold: parsed.unhealthyThreshold
    });
  }

  if (parsed.maxBackoff < parsed.initialBackoff) {
    throw new ConfigurationError("maxBackoff must be greater than or equal to initialBackoff", {
      initialBackoff: parsed.initialBackoff,
      maxBackoff: parsed.maxBackoff
    });
  }

  if (parsed.pongTimeout <= parsed.pingInterval) {
    throw new ConfigurationError("pongTimeout must be greater than pingInterval", {
      pingInterval: parsed.pingInterval,
      pongTimeout: parsed.pongTimeout
    });
  }

  return parsed;
}

/**
 * Merges a partial configuration over DEFAULT_CONFIG and validates the result
 */
export function resolveConfig(config: PartialSupervisorConfig = {}): SupervisorConfig {
  const defined = Object.fromEntries(
    Object.entries(config).filter(([, value]) => value !== undefined)
  );
  return validateConfig({ ...DEFAULT_CONFIG, ...defined });
}

// Safe parse configuration
export function safeParseConfig(config: unknown): {
  success: boolean;
  data?: SupervisorConfig;
  error?: ConfigurationError;
} {
  try {
    const data = validateConfig(config);
    return { success: true, data };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { success: false, error };
    }
    throw error;
  }
}

/**
 * Heartbeat options accepted by {@link SupervisorConfigBuilder.withHeartbeat}
 */
export interface HeartbeatOptions {
  pingInterval?: number;
  pongTimeout?: number;
  probeTimeout?: number;
  cleanupInterval?: number;
  failureThreshold?: number;
}

export interface HealthOptions {
  healthThreshold?: number;
  unhealthyThreshold?: number;
  maxSampleSize?: number;
  aggregateInterval?: number;
  alertCooldown?: number;
  highLatencyThreshold?: number;
  maxAlerts?: number;
}

export interface RecoveryOptions {
  enabled?: boolean;
  enabledByDefault?: boolean;
  maxRetries?: number;
  initialBackoff?: number;
  maxBackoff?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  recoveryTimeout?: number;
  handshakeTimeout?: number;
  workers?: number;
  queueCapacity?: number;
  healthCheckInterval?: number;
}

export interface DiagnosticsOptions {
  enabled?: boolean;
  networkTracing?: boolean;
  detailLevel?: DetailLevel;
  maxDebugSessions?: number;
  retentionPeriod?: number;
  maxLogEntries?: number;
  interval?: number;
}

const shape = SupervisorConfigSchema.shape;

/**
 * Fluent API builder for supervisor configurations.
 * Each setter validates its own values; `.build()` validates the whole
 * configuration including cross-field constraints.
 *
 * @example
 * ```typescript
 * const config = ConnectionSupervisor.builder()
 *   .withMaxConnections(5000)
 *   .withHeartbeat({ pingInterval: 15000, pongTimeout: 45000 })
 *   .withRecovery({ maxRetries: 8, initialBackoff: 500 })
 *   .withDiagnostics({ enabled: true, detailLevel: 'detailed' })
 *   .withLogging('debug')
 *   .build();
 *
 * const supervisor = new ConnectionSupervisor(config);
 * ```
 */
export class SupervisorConfigBuilder {
  private config: SupervisorConfig = { ...DEFAULT_CONFIG };

  /**
   * Sets the hard admission limit. Connections beyond it are rejected with `pool_full`.
   */
  withMaxConnections(maxConnections: number): this {
    this.config.maxConnections = shape.maxConnections.parse(maxConnections);
    return this;
  }

  /**
   * Configures the periodic liveness probe and the authoritative silence timeout.
   *
   * @throws {z.ZodError} If a value is out of range
   *
   * @example
   * ```typescript
   * builder.withHeartbeat({ pingInterval: 10000, pongTimeout: 30000, probeTimeout: 5000 })
   * ```
   */
  withHeartbeat(options: HeartbeatOptions): this {
    if (options.pingInterval !== undefined) {
      this.config.pingInterval = shape.pingInterval.parse(options.pingInterval);
    }
    if (options.pongTimeout !== undefined) {
      this.config.pongTimeout = shape.pongTimeout.parse(options.pongTimeout);
    }
    if (options.probeTimeout !== undefined) {
      this.config.probeTimeout = shape.probeTimeout.parse(options.probeTimeout);
    }
    if (options.cleanupInterval !== undefined) {
      this.config.heartbeatCleanupInterval = shape.heartbeatCleanupInterval.parse(
        options.cleanupInterval
      );
    }
    if (options.failureThreshold !== undefined) {
      this.config.failureThreshold = shape.failureThreshold.parse(options.failureThreshold);
    }
    return this;
  }

  /**
   * Configures score thresholds, sample window and alerting.
   */
  withHealthScoring(options: HealthOptions): this {
    if (options.healthThreshold !== undefined) {
      this.config.healthThreshold = shape.healthThreshold.parse(options.healthThreshold);
    }
    if (options.unhealthyThreshold !== undefined) {
      this.config.unhealthyThreshold = shape.unhealthyThreshold.parse(options.unhealthyThreshold);
    }
    if (options.maxSampleSize !== undefined) {
      this.config.maxSampleSize = shape.maxSampleSize.parse(options.maxSampleSize);
    }
    if (options.aggregateInterval !== undefined) {
      this.config.aggregateInterval = shape.aggregateInterval.parse(options.aggregateInterval);
    }
    if (options.alertCooldown !== undefined) {
      this.config.alertCooldown = shape.alertCooldown.parse(options.alertCooldown);
    }
    if (options.highLatencyThreshold !== undefined) {
      this.config.highLatencyThreshold = shape.highLatencyThreshold.parse(
        options.highLatencyThreshold
      );
    }
    if (options.maxAlerts !== undefined) {
      this.config.maxAlerts = shape.maxAlerts.parse(options.maxAlerts);
    }
    return this;
  }

  /**
   * Configures automatic recovery of outbound connections.
   * Passing a boolean only toggles the engine.
   *
   * @example
   * ```typescript
   * builder.withRecovery(false)
   * builder.withRecovery({ maxRetries: 3, initialBackoff: 2000, maxBackoff: 20000, jitter: false })
   * ```
   */
  withRecovery(options: RecoveryOptions | boolean): this {
    if (typeof options === "boolean") {
      this.config.enableRecovery = options;
      return this;
    }
    if (options.enabled !== undefined) {
      this.config.enableRecovery = shape.enableRecovery.parse(options.enabled);
    }
    if (options.enabledByDefault !== undefined) {
      this.config.recoveryEnabledByDefault = shape.recoveryEnabledByDefault.parse(
        options.enabledByDefault
      );
    }
    if (options.maxRetries !== undefined) {
      this.config.maxRetries = shape.maxRetries.parse(options.maxRetries);
    }
    if (options.initialBackoff !== undefined) {
      this.config.initialBackoff = shape.initialBackoff.parse(options.initialBackoff);
    }
    if (options.maxBackoff !== undefined) {
      this.config.maxBackoff = shape.maxBackoff.parse(options.maxBackoff);
    }
    if (options.backoffMultiplier !== undefined) {
      this.config.backoffMultiplier = shape.backoffMultiplier.parse(options.backoffMultiplier);
    }
    if (options.jitter !== undefined) {
      this.config.jitterEnabled = shape.jitterEnabled.parse(options.jitter);
    }
    if (options.recoveryTimeout !== undefined) {
      this.config.recoveryTimeout = shape.recoveryTimeout.parse(options.recoveryTimeout);
    }
    if (options.handshakeTimeout !== undefined) {
      this.config.handshakeTimeout = shape.handshakeTimeout.parse(options.handshakeTimeout);
    }
    if (options.workers !== undefined) {
      this.config.recoveryWorkers = shape.recoveryWorkers.parse(options.workers);
    }
    if (options.queueCapacity !== undefined) {
      this.config.recoveryQueueCapacity = shape.recoveryQueueCapacity.parse(options.queueCapacity);
    }
    if (options.healthCheckInterval !== undefined) {
      this.config.recoveryHealthCheckInterval = shape.recoveryHealthCheckInterval.parse(
        options.healthCheckInterval
      );
    }
    return this;
  }

  /**
   * Enables the diagnostics overlay. Disabled diagnostics cost nothing at runtime.
   */
  withDiagnostics(options: DiagnosticsOptions | boolean): this {
    if (typeof options === "boolean") {
      this.config.enableDiagnostics = options;
      return this;
    }
    this.config.enableDiagnostics = shape.enableDiagnostics.parse(options.enabled ?? true);
    if (options.networkTracing !== undefined) {
      this.config.enableNetworkTracing = shape.enableNetworkTracing.parse(options.networkTracing);
    }
    if (options.detailLevel !== undefined) {
      this.config.detailLevel = shape.detailLevel.parse(options.detailLevel);
    }
    if (options.maxDebugSessions !== undefined) {
      this.config.maxDebugSessions = shape.maxDebugSessions.parse(options.maxDebugSessions);
    }
    if (options.retentionPeriod !== undefined) {
      this.config.retentionPeriod = shape.retentionPeriod.parse(options.retentionPeriod);
    }
    if (options.maxLogEntries !== undefined) {
      this.config.maxLogEntries = shape.maxLogEntries.parse(options.maxLogEntries);
    }
    if (options.interval !== undefined) {
      this.config.diagnosticInterval = shape.diagnosticInterval.parse(options.interval);
    }
    return this;
  }

  /**
   * Configures eviction of connections that carried no traffic for `timeout` ms.
   */
  withStaleConnectionCleanup(timeout: number, interval?: number): this {
    this.config.staleConnectionTimeout = shape.staleConnectionTimeout.parse(timeout);
    if (interval !== undefined) {
      this.config.staleCleanupInterval = shape.staleCleanupInterval.parse(interval);
    }
    return this;
  }

  /**
   * Sets the log level, and optionally a custom logger replacing the pino default.
   */
  withLogging(level: LogLevel, logger?: Logger): this {
    this.config.logLevel = LogLevelSchema.parse(level);
    if (logger) {
      this.config.logger = LoggerSchema.parse(logger);
    }
    return this;
  }

  /**
   * Builds and validates the final configuration.
   *
   * @throws {ConfigurationError} If the configuration is invalid
   */
  build(): SupervisorConfig {
    return validateConfig(this.config);
  }
}
