/**
 * Error classes and the typed event map emitted by the supervisor and its managers
 */

import { z } from "zod";
import { ErrorCode } from "./error-codes";
import type { ConnectionInfo, RejectionReason, RemovalReason, TransportHandle } from "./connection";
import type { AggregateHealth, HealthAlert, HealthState } from "./health";
import type { RecoveryPriority, RecoveryRequest, RecoveryState } from "./recovery";
import type { DebugSession } from "./diagnostics";

// Supervisor error schema
export const SupervisorErrorSchema = z.object({
  message: z.string(),
  code: z.string(),
  details: z.unknown().optional(),
  recoverable: z.boolean(),
  name: z.string()
});

export type SerializedSupervisorError = z.infer<typeof SupervisorErrorSchema>;

/**
 * Base class for every error raised by the supervisor.
 * `recoverable` tells callers whether retrying the same operation can succeed.
 */
export class SupervisorError extends Error {
  public code: string;
  public details?: unknown;
  public recoverable: boolean;

  constructor(message: string, code: ErrorCode, details?: unknown, recoverable: boolean = false) {
    super(message);
    this.name = "SupervisorError";
    this.code = code;
    this.details = details;
    this.recoverable = recoverable;

    SupervisorErrorSchema.parse({
      message: this.message,
      code: this.code,
      details: this.details,
      recoverable: this.recoverable,
      name: this.name
    });
  }

  toJSON(): SerializedSupervisorError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      recoverable: this.recoverable,
      details: this.details
    };
  }
}

/**
 * Transport-level failure: write error, abnormal close, failed dial.
 */
export class ConnectionError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.CONNECTION_ERROR, details, true);
    this.name = "ConnectionError";
  }
}

export class TimeoutError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.TIMEOUT_ERROR, details, true);
    this.name = "TimeoutError";
  }
}

export class AuthenticationError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.AUTH_ERROR, details, false);
    this.name = "AuthenticationError";
  }
}

export class MessageError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.MESSAGE_ERROR, details, false);
    this.name = "MessageError";
  }
}

export class ValidationError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.VALIDATION_ERROR, details, false);
    this.name = "ValidationError";
  }
}

/**
 * Error thrown when supervisor configuration is invalid.
 * Raised at construction so a misconfigured supervisor never starts.
 *
 * @example
 * ```typescript
 * try {
 *   new ConnectionSupervisor({ healthThreshold: 0.4, unhealthyThreshold: 0.6 });
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.log('Configuration error:', error.message);
 *   }
 * }
 * ```
 */
export class ConfigurationError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.CONFIG_ERROR, details, false);
    this.name = "ConfigurationError";
  }
}

export class RecoveryError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.RECOVERY_FAILED, details, false);
    this.name = "RecoveryError";
  }
}

export class DiagnosticsError extends SupervisorError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCode.DIAGNOSTICS_ERROR, details, false);
    this.name = "DiagnosticsError";
  }
}

// Supervisor events interface with proper typing
export interface SupervisorEvents {
  // Registry events
  "connection:accepted": (info: ConnectionInfo) => void;
  "connection:rejected": (connectionId: string, reason: RejectionReason) => void;
  "connection:removed": (info: ConnectionInfo, reason: RemovalReason) => void;

  // Heartbeat events
  "heartbeat:ack": (connectionId: string, latencyMs: number) => void;
  "heartbeat:unhealthy": (connectionId: string, consecutiveFailures: number) => void;
  "heartbeat:timeout": (connectionId: string, silenceMs: number) => void;

  // Health events
  "health:changed": (
    connectionId: string,
    previous: HealthState,
    current: HealthState,
    score: number
  ) => void;
  "health:alert": (alert: HealthAlert) => void;
  "health:aggregate": (aggregate: AggregateHealth) => void;

  // Recovery events
  "recovery:queued": (request: RecoveryRequest) => void;
  "recovery:dropped": (connectionId: string, priority: RecoveryPriority) => void;
  "recovery:state": (connectionId: string, previous: RecoveryState, current: RecoveryState) => void;
  "recovery:attempt": (connectionId: string, attempt: number, delayMs: number) => void;
  "recovery:succeeded": (
    connectionId: string,
    transport: TransportHandle,
    attempts: number,
    durationMs: number
  ) => void;
  "recovery:failed": (connectionId: string, attempts: number, error: SupervisorError) => void;
  "recovery:cancelled": (connectionId: string) => void;

  // Diagnostics events
  "diagnostics:session_started": (session: DebugSession) => void;
  "diagnostics:session_stopped": (session: DebugSession) => void;

  // Error events
  error: (error: SupervisorError) => void;
  warning: (warning: string) => void;

  // Lifecycle events
  ready: () => void;
  close: () => void;
}

/**
 * Check if an error is a recoverable SupervisorError
 */
export function isRecoverableError(error: unknown): boolean {
  return error instanceof SupervisorError && error.recoverable;
}

/**
 * Wraps anything thrown by a transport into a SupervisorError.
 * Errors that already belong to the hierarchy are returned unchanged.
 */
export function normalizeError(error: unknown, context?: Record<string, unknown>): SupervisorError {
  if (error instanceof SupervisorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectionError(message, { ...context, cause: error instanceof Error ? error.name : typeof error });
}
