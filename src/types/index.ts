/**
 * Main type exports for the connection supervisor
 * Exports both Zod schemas and TypeScript types
 */

// Configuration schemas, types and builder
export {
  LoggerSchema,
  LogLevelSchema,
  DetailLevelSchema,
  SupervisorConfigSchema,
  PartialSupervisorConfigSchema,
  DEFAULT_CONFIG,
  validateConfig,
  resolveConfig,
  safeParseConfig,
  SupervisorConfigBuilder
} from "./config";
export type {
  Logger,
  LogLevel,
  DetailLevel,
  SupervisorConfig,
  PartialSupervisorConfig,
  HeartbeatOptions,
  HealthOptions,
  RecoveryOptions,
  DiagnosticsOptions
} from "./config";

// Errors and events
export {
  SupervisorErrorSchema,
  SupervisorError,
  ConnectionError,
  TimeoutError,
  AuthenticationError,
  MessageError,
  ValidationError,
  ConfigurationError,
  RecoveryError,
  DiagnosticsError,
  isRecoverableError,
  normalizeError
} from "./events";
export type {
  SerializedSupervisorError,
  SupervisorEvents
} from "./events";

export { ErrorCode, categorizeErrorCode } from "./error-codes";
export type { ErrorCategory } from "./error-codes";

// Domain types
export type {
  ConnectionAttributes,
  TransportHandle,
  ConnectionInfo,
  RejectionReason,
  RemovalReason,
  PoolMetrics,
  PoolStats
} from "./connection";

export type {
  HealthState,
  ConnectionHealth,
  AggregateHealth,
  AlertType,
  AlertSeverity,
  HealthAlert,
  ProbeResult,
  HealthStatus
} from "./health";

export { RECOVERY_PRIORITIES } from "./recovery";
export type {
  RecoveryState,
  RecoveryPriority,
  OutboundTarget,
  RecoveryRequest,
  RecoveryStatus,
  RecoveryMetrics,
  DialOptions,
  Dialer
} from "./recovery";

export type {
  MessageDirection,
  ConnectionMetrics,
  MessageMetrics,
  ErrorMetrics,
  LatencyBucket,
  PerformanceMetrics,
  MetricsSnapshot
} from "./metrics";

export { DEBUG_FEATURES } from "./diagnostics";
export type {
  DebugFeature,
  DiagnosticLogLevel,
  DebugLogEntry,
  TimelineEvent,
  NetworkTrace,
  HealthCheckType,
  HealthCheckStatus,
  HealthCheckResult,
  DebugSession,
  ConnectionDiagnostics,
  SystemDiagnostics
} from "./diagnostics";

// Input validation
export {
  ConnectionIdSchema,
  ConnectionAttributesSchema,
  RecoveryPrioritySchema,
  OutboundTargetSchema,
  DebugFeatureSchema,
  DiagnosticLogLevelSchema,
  HealthCheckTypeSchema,
  MessageTypeSchema
} from "./validation";
