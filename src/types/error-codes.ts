/**
 * Machine-readable error codes carried by every SupervisorError
 */
export enum ErrorCode {
  CONNECTION_ERROR = "CONNECTION_ERROR",
  TIMEOUT_ERROR = "TIMEOUT_ERROR",
  AUTH_ERROR = "AUTH_ERROR",
  MESSAGE_ERROR = "MESSAGE_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  NOT_FOUND = "NOT_FOUND",
  RECOVERY_FAILED = "RECOVERY_FAILED",
  RECOVERY_CANCELLED = "RECOVERY_CANCELLED",
  QUEUE_FULL = "QUEUE_FULL",
  DIAGNOSTICS_ERROR = "DIAGNOSTICS_ERROR",
  SHUTDOWN = "SHUTDOWN"
}

/**
 * Error categories tracked by the metrics aggregator
 */
export type ErrorCategory = "connection" | "message" | "timeout" | "authentication" | "other";

/**
 * Maps an error code onto the metrics category it is counted under
 */
export function categorizeErrorCode(code: string): ErrorCategory {
  switch (code) {
    case ErrorCode.CONNECTION_ERROR:
    case ErrorCode.RECOVERY_FAILED:
      return "connection";
    case ErrorCode.MESSAGE_ERROR:
    case ErrorCode.VALIDATION_ERROR:
      return "message";
    case ErrorCode.TIMEOUT_ERROR:
      return "timeout";
    case ErrorCode.AUTH_ERROR:
      return "authentication";
    default:
      return "other";
  }
}
