/**
 * ConnectionRegistry - Capacity-bounded set of live connections
 * Handles admission control, lookup, stale eviction and pool metrics
 */

import { EventEmitter } from "eventemitter3";
import type {
  ConnectionAttributes,
  ConnectionInfo,
  Logger,
  MessageDirection,
  PoolMetrics,
  PoolStats,
  RejectionReason,
  RemovalReason,
  SupervisorEvents,
  TransportHandle
} from "../types";
import { ConnectionError, ErrorCode, SupervisorError } from "../types";
import { ConnectionAttributesSchema, ConnectionIdSchema } from "../types/validation";
import { THRESHOLDS } from "../constants";
import { PeriodicTask } from "../utils/periodic-task";

interface ConnectionRecord {
  id: string;
  attributes: ConnectionAttributes;
  transport: TransportHandle;
  connectedAt: number;
  lastActivity: number;
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
}

export interface ConnectionRegistryOptions {
  maxConnections: number;
  staleConnectionTimeout: number;
  staleCleanupInterval: number;
}

const emptyMetrics = (): PoolMetrics => ({
  totalConnections: 0,
  activeConnections: 0,
  connectionsAccepted: 0,
  connectionsRejected: 0,
  connectionsClosed: 0,
  maxConcurrentConnections: 0,
  averageLifetimeMs: 0,
  rejectionReasons: {}
});

export class ConnectionRegistry extends EventEmitter<SupervisorEvents> {
  private readonly logger: Logger;
  private readonly options: ConnectionRegistryOptions;
  private readonly connections = new Map<string, ConnectionRecord>();

  // Secondary indices for O(1) repository and session lookups
  private readonly repositoryIndex = new Map<string, Set<string>>();
  private readonly sessionIndex = new Map<string, Set<string>>();

  private metrics: PoolMetrics = emptyMetrics();
  private lifetimeSamples = 0;
  private closing = false;
  private readonly staleTask: PeriodicTask;

  constructor(options: ConnectionRegistryOptions, logger: Logger) {
    super();
    this.options = { ...options };
    this.logger = logger;
    this.staleTask = new PeriodicTask(
      "ConnectionRegistry stale sweep",
      options.staleCleanupInterval,
      () => {
        this.cleanupStale(this.options.staleConnectionTimeout);
      },
      logger
    );
  }

  /**
   * Admits a connection if capacity allows.
   * Never throws for admission failures: a rejected connection returns false,
   * increments the rejection counters and emits `connection:rejected`.
   *
   * @returns true if the connection was admitted
   *
   * @example
   * ```typescript
   * if (!registry.add('conn-1', transport, { repository: 'docs', sessionId: 's-1', protocolVersion: '1' })) {
   *   transport.close(1013, 'Server at capacity');
   * }
   * ```
   */
  public add(id: string, transport: TransportHandle, attributes: ConnectionAttributes): boolean {
    const idResult = ConnectionIdSchema.safeParse(id);
    const attributesResult = ConnectionAttributesSchema.safeParse(attributes);
    if (!idResult.success || !attributesResult.success) {
      return this.reject(id, "invalid_attributes");
    }
    if (this.closing) {
      return this.reject(id, "shutting_down");
    }
    if (this.connections.size >= this.options.maxConnections) {
      return this.reject(id, "pool_full");
    }
    if (this.connections.has(id)) {
      return this.reject(id, "duplicate_id");
    }

    const now = Date.now();
    const record: ConnectionRecord = {
      id,
      attributes: { ...attributesResult.data },
      transport,
      connectedAt: now,
      lastActivity: now,
      messagesSent: 0,
      messagesReceived: 0,
      bytesSent: 0,
      bytesReceived: 0
    };

    this.connections.set(id, record);
    this.index(this.repositoryIndex, record.attributes.repository, id);
    this.index(this.sessionIndex, record.attributes.sessionId, id);

    this.metrics.totalConnections++;
    this.metrics.connectionsAccepted++;
    this.metrics.activeConnections = this.connections.size;
    if (this.connections.size > this.metrics.maxConcurrentConnections) {
      this.metrics.maxConcurrentConnections = this.connections.size;
    }

    this.logger.debug("ConnectionRegistry: connection accepted", {
      connectionId: id,
      active: this.connections.size,
      capacity: this.options.maxConnections
    });
    this.emit("connection:accepted", this.toInfo(record));
    return true;
  }

  /**
   * Removes a connection without touching its transport. Idempotent.
   *
   * @returns true if the connection was present
   */
  public remove(id: string, reason: RemovalReason = "unregistered"): boolean {
    const record = this.connections.get(id);
    if (!record) {
      return false;
    }

    this.connections.delete(id);
    this.unindex(this.repositoryIndex, record.attributes.repository, id);
    this.unindex(this.sessionIndex, record.attributes.sessionId, id);

    const lifetime = Date.now() - record.connectedAt;
    this.metrics.averageLifetimeMs =
      this.lifetimeSamples === 0
        ? lifetime
        : (1 - THRESHOLDS.LIFETIME_EMA_WEIGHT) * this.metrics.averageLifetimeMs +
          THRESHOLDS.LIFETIME_EMA_WEIGHT * lifetime;
    this.lifetimeSamples++;
    this.metrics.connectionsClosed++;
    this.metrics.activeConnections = this.connections.size;

    this.logger.debug("ConnectionRegistry: connection removed", {
      connectionId: id,
      reason,
      lifetimeMs: lifetime
    });
    this.emit("connection:removed", this.toInfo(record), reason);
    return true;
  }

  /**
   * Closes the connection's transport, then removes it
   *
   * @returns true if the connection was present
   */
  public evict(id: string, reason: RemovalReason): boolean {
    const record = this.connections.get(id);
    if (!record) {
      return false;
    }

    try {
      record.transport.close(1001, reason);
    } catch (error) {
      this.logger.warn("ConnectionRegistry: transport close failed during eviction", {
        connectionId: id,
        reason,
        error: error instanceof Error ? error.message : String(error)
      });
    }
    return this.remove(id, reason);
  }

  /**
   * Gets a copy of a connection's identifying fields
   */
  public get(id: string): ConnectionInfo | undefined {
    const record = this.connections.get(id);
    return record ? this.toInfo(record) : undefined;
  }

  public has(id: string): boolean {
    return this.connections.has(id);
  }

  /**
   * All connections streaming a repository, in admission order
   */
  public getByRepository(repository: string): ConnectionInfo[] {
    return this.lookup(this.repositoryIndex, repository);
  }

  /**
   * All connections belonging to a client session, in admission order
   */
  public getBySession(sessionId: string): ConnectionInfo[] {
    return this.lookup(this.sessionIndex, sessionId);
  }

  public getAll(): ConnectionInfo[] {
    return Array.from(this.connections.values(), (record) => this.toInfo(record));
  }

  public ids(): string[] {
    return Array.from(this.connections.keys());
  }

  /**
   * Marks a connection active, postponing stale eviction
   *
   * @returns false if the connection is unknown
   */
  public touch(id: string): boolean {
    const record = this.connections.get(id);
    if (!record) {
      return false;
    }
    record.lastActivity = Date.now();
    return true;
  }

  /**
   * Counts a message on a connection and records it as activity
   *
   * @returns false if the connection is unknown
   */
  public recordTraffic(id: string, direction: MessageDirection, bytes: number): boolean {
    const record = this.connections.get(id);
    if (!record) {
      return false;
    }
    const size = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
    if (direction === "outbound") {
      record.messagesSent++;
      record.bytesSent += size;
    } else {
      record.messagesReceived++;
      record.bytesReceived += size;
    }
    record.lastActivity = Date.now();
    return true;
  }

  /**
   * Probes a connection through its private transport
   *
   * @returns Round-trip time in milliseconds
   * @throws {ConnectionError} If the connection is unknown or the probe fails
   */
  public async ping(id: string, timeoutMs: number): Promise<number> {
    const record = this.connections.get(id);
    if (!record) {
      throw new SupervisorError(`Connection ${id} is not registered`, ErrorCode.NOT_FOUND, {
        connectionId: id
      });
    }
    if (!record.transport.isOpen) {
      throw new ConnectionError(`Connection ${id} is not open`, { connectionId: id });
    }
    return record.transport.ping(timeoutMs);
  }

  /**
   * Closes and evicts every connection idle for longer than `maxIdleMs`
   *
   * @returns Number of evicted connections
   */
  public cleanupStale(maxIdleMs: number): number {
    const now = Date.now();
    const stale: string[] = [];
    for (const record of this.connections.values()) {
      if (now - record.lastActivity > maxIdleMs) {
        stale.push(record.id);
      }
    }

    for (const id of stale) {
      this.evict(id, "stale");
    }

    this.metrics.lastCleanup = new Date(now);
    if (stale.length > 0) {
      this.logger.info("ConnectionRegistry: evicted stale connections", {
        count: stale.length,
        maxIdleMs
      });
    }
    return stale.length;
  }

  public canAccept(): boolean {
    return !this.closing && this.connections.size < this.options.maxConnections;
  }

  public availableCapacity(): number {
    return Math.max(0, this.options.maxConnections - this.connections.size);
  }

  public get size(): number {
    return this.connections.size;
  }

  public get capacity(): number {
    return this.options.maxConnections;
  }

  public getMetrics(): PoolMetrics {
    return {
      ...this.metrics,
      rejectionReasons: { ...this.metrics.rejectionReasons },
      lastCleanup: this.metrics.lastCleanup ? new Date(this.metrics.lastCleanup) : undefined
    };
  }

  /**
   * Utilization and distribution of the pool
   */
  public getStats(): PoolStats {
    const byRepository: Record<string, number> = {};
    const bySession: Record<string, number> = {};
    const byProtocolVersion: Record<string, number> = {};

    for (const { attributes } of this.connections.values()) {
      byRepository[attributes.repository] = (byRepository[attributes.repository] ?? 0) + 1;
      bySession[attributes.sessionId] = (bySession[attributes.sessionId] ?? 0) + 1;
      byProtocolVersion[attributes.protocolVersion] =
        (byProtocolVersion[attributes.protocolVersion] ?? 0) + 1;
    }

    return {
      activeConnections: this.connections.size,
      maxConnections: this.options.maxConnections,
      availableCapacity: this.availableCapacity(),
      utilizationPercent: (this.connections.size / this.options.maxConnections) * 100,
      byRepository,
      bySession,
      byProtocolVersion,
      metrics: this.getMetrics()
    };
  }

  /**
   * Resets pool counters. Registered connections are kept.
   */
  public reset(): void {
    this.metrics = emptyMetrics();
    this.metrics.activeConnections = this.connections.size;
    this.lifetimeSamples = 0;
  }

  public start(): void {
    this.closing = false;
    this.staleTask.start();
  }

  /**
   * Stops admitting connections, stops the stale sweep and evicts everything
   *
   * @returns Number of connections closed
   */
  public async closeAll(): Promise<number> {
    this.closing = true;
    await this.staleTask.stop();

    const ids = this.ids();
    for (const id of ids) {
      this.evict(id, "shutdown");
    }
    if (ids.length > 0) {
      this.logger.info("ConnectionRegistry: closed all connections", { count: ids.length });
    }
    return ids.length;
  }

  private reject(id: string, reason: RejectionReason): false {
    this.metrics.connectionsRejected++;
    this.metrics.rejectionReasons[reason] = (this.metrics.rejectionReasons[reason] ?? 0) + 1;
    this.logger.warn("ConnectionRegistry: connection rejected", {
      connectionId: id,
      reason,
      active: this.connections.size,
      capacity: this.options.maxConnections
    });
    this.emit("connection:rejected", id, reason);
    return false;
  }

  private lookup(index: Map<string, Set<string>>, key: string): ConnectionInfo[] {
    const ids = index.get(key);
    if (!ids) {
      return [];
    }
    return Array.from(ids)
      .map((id) => this.connections.get(id))
      .filter((record): record is ConnectionRecord => record !== undefined)
      .map((record) => this.toInfo(record));
  }

  private index(index: Map<string, Set<string>>, key: string, id: string): void {
    let ids = index.get(key);
    if (!ids) {
      ids = new Set();
      index.set(key, ids);
    }
    ids.add(id);
  }

  private unindex(index: Map<string, Set<string>>, key: string, id: string): void {
    const ids = index.get(key);
    if (!ids) return;
    ids.delete(id);
    if (ids.size === 0) {
      index.delete(key);
    }
  }

  private toInfo(record: ConnectionRecord): ConnectionInfo {
    return {
      id: record.id,
      ...record.attributes,
      connectedAt: new Date(record.connectedAt),
      lastActivity: new Date(record.lastActivity),
      messagesSent: record.messagesSent,
      messagesReceived: record.messagesReceived,
      bytesSent: record.bytesSent,
      bytesReceived: record.bytesReceived
    };
  }
}
