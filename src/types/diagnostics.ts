/**
 * Diagnostics types: per-connection history, debug sessions and on-demand checks
 */

import type { MessageDirection } from "./metrics";

export type DebugFeature =
  | "network_tracing"
  | "message_logging"
  | "performance_profiling"
  | "state_tracking"
  | "error_capture";

export const DEBUG_FEATURES: readonly DebugFeature[] = [
  "network_tracing",
  "message_logging",
  "performance_profiling",
  "state_tracking",
  "error_capture"
];

export type DiagnosticLogLevel = "debug" | "info" | "warn" | "error";

export interface DebugLogEntry {
  timestamp: Date;
  level: DiagnosticLogLevel;
  connectionId: string;
  message: string;
  data?: Record<string, unknown>;
}

export interface TimelineEvent {
  timestamp: Date;
  type: string;
  description: string;
  data?: Record<string, unknown>;
}

export interface NetworkTrace {
  timestamp: Date;
  direction: MessageDirection;
  messageType: string;
  size: number;
  latencyMs?: number;
}

export type HealthCheckType = "ping" | "latency";

export type HealthCheckStatus = "pass" | "warn" | "fail";

export interface HealthCheckResult {
  type: HealthCheckType;
  status: HealthCheckStatus;
  latencyMs?: number;
  message: string;
  timestamp: Date;
}

export interface DebugSession {
  id: string;
  connectionId: string;
  features: DebugFeature[];
  logLevel: DiagnosticLogLevel;
  startedAt: Date;
  stoppedAt?: Date;
  active: boolean;
  entriesCollected: number;
}

export interface ConnectionDiagnostics {
  connectionId: string;
  registeredAt: Date;
  lastState?: string;
  messagesSent: number;
  messagesReceived: number;
  errorCount: number;
  lastError?: string;
  debugLogs: DebugLogEntry[];
  timeline: TimelineEvent[];
  networkTraces: NetworkTrace[];
  healthChecks: HealthCheckResult[];
}

export interface SystemDiagnostics {
  status: "healthy" | "degraded" | "unhealthy";
  trackedConnections: number;
  healthyConnections: number;
  activeDebugSessions: number;
  totalLogEntries: number;
  totalTraces: number;
  lastRunAt?: Date;
}
