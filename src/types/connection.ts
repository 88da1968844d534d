/**
 * Connection types shared by the registry, heartbeat probe and recovery engine
 */

/**
 * Identifying attributes supplied by the transport layer when a connection is admitted
 */
export interface ConnectionAttributes {
  /** Repository the client is streaming events for */
  repository: string;
  /** Client session identifier (several connections may share a session) */
  sessionId: string;
  /** Wire protocol version negotiated during the handshake */
  protocolVersion: string;
  remoteAddress?: string;
  userAgent?: string;
}

/**
 * Minimal view of a live bidirectional stream.
 * The registry owns the handle; nothing outside it closes or pings the stream directly.
 */
export interface TransportHandle {
  /** True while the underlying stream can carry frames */
  readonly isOpen: boolean;

  /**
   * Sends a liveness probe and resolves with the round-trip time in milliseconds.
   * Rejects when the probe cannot be written or no acknowledgment arrives within `timeoutMs`.
   */
  ping(timeoutMs: number): Promise<number>;

  /** Closes the stream. Calling it on a closed stream is a no-op. */
  close(code?: number, reason?: string): void;

  /**
   * Subscribes to errors the stream raises after it opened.
   * Returns a function that removes the listener.
   */
  onError?(listener: (error: Error) => void): () => void;
}

/**
 * Read-only copy of a registered connection's identifying fields
 */
export interface ConnectionInfo extends ConnectionAttributes {
  id: string;
  connectedAt: Date;
  lastActivity: Date;
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
}

/**
 * Why a connection was refused at admission
 */
export type RejectionReason = "pool_full" | "duplicate_id" | "invalid_attributes" | "shutting_down";

/**
 * Why a connection left the registry
 */
export type RemovalReason =
  | "unregistered"
  | "stale"
  | "heartbeat_timeout"
  | "replaced"
  | "shutdown";

/**
 * Pool-level counters kept by the registry
 */
export interface PoolMetrics {
  totalConnections: number;
  activeConnections: number;
  connectionsAccepted: number;
  connectionsRejected: number;
  connectionsClosed: number;
  maxConcurrentConnections: number;
  /** Moving average (weight 0.1) of closed connection lifetimes in ms */
  averageLifetimeMs: number;
  rejectionReasons: Record<string, number>;
  lastCleanup?: Date;
}

/**
 * Utilization and distribution view of the pool
 */
export interface PoolStats {
  activeConnections: number;
  maxConnections: number;
  availableCapacity: number;
  utilizationPercent: number;
  byRepository: Record<string, number>;
  bySession: Record<string, number>;
  byProtocolVersion: Record<string, number>;
  metrics: PoolMetrics;
}
