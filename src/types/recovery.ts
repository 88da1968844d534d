/**
 * Recovery types: per-connection state machine, queued requests and dialing
 */

import type { ConnectionAttributes, TransportHandle } from "./connection";

/**
 * connected -> disconnected -> reconnecting -> connected | failed.
 * draining is terminal and reachable from every state.
 */
export type RecoveryState = "connected" | "disconnected" | "reconnecting" | "failed" | "draining";

export type RecoveryPriority = "low" | "normal" | "high" | "critical";

/** Highest priority first */
export const RECOVERY_PRIORITIES: readonly RecoveryPriority[] = ["critical", "high", "normal", "low"];

/**
 * A connection this server dialed itself and can therefore redial
 */
export interface OutboundTarget {
  id: string;
  url: string;
  headers?: Record<string, string>;
  attributes: ConnectionAttributes;
  priority?: RecoveryPriority;
  /** Overrides recoveryEnabledByDefault for this connection */
  recoveryEnabled?: boolean;
}

export interface RecoveryRequest {
  readonly id: string;
  readonly connectionId: string;
  readonly priority: RecoveryPriority;
  readonly requestedAt: number;
  readonly cause: string;
  readonly callback?: (success: boolean, error?: Error) => void;
}

export interface RecoveryStatus {
  connectionId: string;
  state: RecoveryState;
  retryCount: number;
  backoffDuration: number;
  recoveryEnabled: boolean;
  healthScore: number;
  priority: RecoveryPriority;
  lastSeen: Date;
  lastError?: string;
}

export interface RecoveryMetrics {
  totalRecoveries: number;
  successfulRecoveries: number;
  failedRecoveries: number;
  cancelledRecoveries: number;
  droppedRequests: number;
  activeRecoveries: number;
  queueLength: number;
  averageRecoveryTime: number;
  minRecoveryTime: number;
  maxRecoveryTime: number;
}

export interface DialOptions {
  headers?: Record<string, string>;
  /** Upper bound for the opening handshake in ms */
  handshakeTimeout: number;
  signal?: AbortSignal;
}

/**
 * Opens a new transport to a remote endpoint
 */
export interface Dialer {
  dial(url: string, options: DialOptions): Promise<TransportHandle>;
}
