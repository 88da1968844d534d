/**
 * Validation schemas for inputs crossing the supervisor's public surface
 */

import { z } from "zod";

/**
 * Validates connection IDs.
 * - Must not be empty
 * - Maximum 128 characters
 * - No whitespace or control characters
 *
 * @example
 * ```typescript
 * ConnectionIdSchema.parse('conn-7f3a'); // OK
 * ConnectionIdSchema.parse('conn 7f3a'); // Error: whitespace
 * ```
 */
export const ConnectionIdSchema = z
  .string()
  .min(1, "Connection ID cannot be empty")
  .max(128, "Connection ID must be 128 characters or less")
  .regex(/^[^\s\x00-\x1f\x7f]+$/, "Connection ID cannot contain whitespace or control characters");

export const ConnectionAttributesSchema = z.object({
  repository: z.string().min(1, "Repository cannot be empty").max(256),
  sessionId: z.string().min(1, "Session ID cannot be empty").max(256),
  protocolVersion: z.string().min(1).max(32),
  remoteAddress: z.string().max(256).optional(),
  userAgent: z.string().max(1024).optional()
});

export const RecoveryPrioritySchema = z.enum(["low", "normal", "high", "critical"]);

/**
 * Outbound targets must use ws:// or wss:// so the default dialer can reach them.
 */
export const OutboundTargetSchema = z.object({
  id: ConnectionIdSchema,
  url: z
    .string()
    .url()
    .refine((url) => url.startsWith("ws://") || url.startsWith("wss://"), {
      message: "Outbound URL must start with ws:// or wss://"
    }),
  headers: z.record(z.string()).optional(),
  attributes: ConnectionAttributesSchema,
  priority: RecoveryPrioritySchema.optional(),
  recoveryEnabled: z.boolean().optional()
});

export const DebugFeatureSchema = z.enum([
  "network_tracing",
  "message_logging",
  "performance_profiling",
  "state_tracking",
  "error_capture"
]);

export const DiagnosticLogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const HealthCheckTypeSchema = z.enum(["ping", "latency"]);

/**
 * Message types are free-form labels such as "text" or "binary"
 */
export const MessageTypeSchema = z.string().min(1).max(128);
