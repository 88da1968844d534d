/**
 * ConnectionSupervisor - Lifecycle, liveness and recovery management for streaming connections
 * Wires the registry, heartbeat probe, health scorer, recovery engine, metrics and
 * diagnostics together behind one surface. Each concern lives in its own manager.
 */

import { EventEmitter } from "eventemitter3";
import type {
  AggregateHealth,
  ConnectionAttributes,
  ConnectionDiagnostics,
  ConnectionHealth,
  ConnectionInfo,
  DebugFeature,
  Dialer,
  DiagnosticLogLevel,
  HealthAlert,
  HealthCheckResult,
  HealthCheckType,
  HealthStatus,
  Logger,
  MessageDirection,
  MetricsSnapshot,
  OutboundTarget,
  PartialSupervisorConfig,
  PoolStats,
  RecoveryMetrics,
  RecoveryStatus,
  RemovalReason,
  SupervisorConfig,
  SupervisorEvents,
  SystemDiagnostics,
  TransportHandle
} from "./types";
import {
  ErrorCode,
  SupervisorConfigBuilder,
  SupervisorError,
  ValidationError,
  normalizeError,
  resolveConfig
} from "./types";
import { MessageTypeSchema, OutboundTargetSchema } from "./types/validation";
import {
  ConnectionRegistry,
  DiagnosticsManager,
  HealthScorer,
  HeartbeatProbe,
  MetricsAggregator,
  RecoveryEngine
} from "./managers";
import { WebSocketDialer } from "./core/websocket-transport";
import { createPinoLogger } from "./utils/logger";
import type { RandomSource } from "./utils/retry-policy";

/**
 * Collaborators that can be replaced, mostly for tests
 */
export interface SupervisorDependencies {
  /** Opens outbound connections during recovery (default: ws-based dialer) */
  dialer?: Dialer;
  /** Randomness for backoff jitter (default: Math.random) */
  random?: RandomSource;
}

export class ConnectionSupervisor extends EventEmitter<SupervisorEvents> {
  private readonly config: SupervisorConfig;
  private readonly logger: Logger;
  private started = false;
  private closing?: Promise<void>;
  private readonly errorSubscriptions = new Map<string, () => void>();

  // Managers
  private readonly registry: ConnectionRegistry;
  private readonly scorer: HealthScorer;
  private readonly heartbeat: HeartbeatProbe;
  private readonly recovery: RecoveryEngine;
  private readonly metrics: MetricsAggregator;
  private readonly diagnostics: DiagnosticsManager;

  /**
   * Creates a supervisor. Nothing runs until {@link start} is called.
   *
   * @param config - Partial configuration merged over DEFAULT_CONFIG
   * @param dependencies - Optional dialer and randomness overrides
   * @throws {ConfigurationError} If the resulting configuration is invalid
   *
   * @example
   * ```typescript
   * const supervisor = new ConnectionSupervisor({ maxConnections: 5000, logLevel: 'debug' });
   * supervisor.start();
   *
   * wss.on('connection', (socket, request) => {
   *   const id = randomUUID();
   *   const accepted = supervisor.registerConnection(id, new WebSocketTransport(socket), {
   *     repository: 'docs',
   *     sessionId: String(request.headers['x-session-id']),
   *     protocolVersion: '1'
   *   });
   *   if (!accepted) socket.close(1013, 'Try again later');
   * });
   * ```
   */
  constructor(config: PartialSupervisorConfig = {}, dependencies: SupervisorDependencies = {}) {
    super();

    this.config = resolveConfig(config);
    this.logger = this.config.logger ?? this.createDefaultLogger();
    const c = this.config;

    this.registry = new ConnectionRegistry(
      {
        maxConnections: c.maxConnections,
        staleConnectionTimeout: c.staleConnectionTimeout,
        staleCleanupInterval: c.staleCleanupInterval
      },
      this.logger
    );
    this.scorer = new HealthScorer(
      {
        healthThreshold: c.healthThreshold,
        unhealthyThreshold: c.unhealthyThreshold,
        maxSampleSize: c.maxSampleSize,
        aggregateInterval: c.aggregateInterval,
        alertCooldown: c.alertCooldown,
        highLatencyThreshold: c.highLatencyThreshold,
        failureThreshold: c.failureThreshold,
        maxAlerts: c.maxAlerts
      },
      this.logger
    );
    this.heartbeat = new HeartbeatProbe(
      {
        pingInterval: c.pingInterval,
        pongTimeout: c.pongTimeout,
        probeTimeout: c.probeTimeout,
        cleanupInterval: c.heartbeatCleanupInterval,
        failureThreshold: c.failureThreshold
      },
      this.registry,
      this.scorer,
      this.logger
    );
    this.recovery = new RecoveryEngine(
      {
        enabled: c.enableRecovery,
        enabledByDefault: c.recoveryEnabledByDefault,
        maxRetries: c.maxRetries,
        initialBackoff: c.initialBackoff,
        maxBackoff: c.maxBackoff,
        backoffMultiplier: c.backoffMultiplier,
        jitter: c.jitterEnabled,
        recoveryTimeout: c.recoveryTimeout,
        handshakeTimeout: c.handshakeTimeout,
        workers: c.recoveryWorkers,
        queueCapacity: c.recoveryQueueCapacity,
        healthCheckInterval: c.recoveryHealthCheckInterval,
        probeTimeout: c.probeTimeout
      },
      dependencies.dialer ?? new WebSocketDialer(this.logger),
      this.logger,
      dependencies.random
    );
    this.metrics = new MetricsAggregator(this.logger);
    this.diagnostics = new DiagnosticsManager(
      {
        enabled: c.enableDiagnostics,
        networkTracing: c.enableNetworkTracing,
        detailLevel: c.detailLevel,
        maxDebugSessions: c.maxDebugSessions,
        retentionPeriod: c.retentionPeriod,
        maxLogEntries: c.maxLogEntries,
        interval: c.diagnosticInterval,
        probeTimeout: c.probeTimeout
      },
      {
        ping: (id, timeoutMs) => this.registry.ping(id, timeoutMs),
        getHealthState: (id) => this.scorer.getHealth(id)?.state,
        getLastLatency: (id) => {
          const health = this.scorer.getHealth(id);
          return health && health.successfulPings > 0 ? health.lastLatency : undefined;
        }
      },
      this.logger
    );

    this.setupEventForwarding();

    this.logger.info("ConnectionSupervisor initialized", {
      maxConnections: c.maxConnections,
      recovery: c.enableRecovery,
      diagnostics: c.enableDiagnostics
    });
  }

  /**
   * Starts every background task: stale sweep, heartbeat loops, health
   * aggregation, recovery workers and (when enabled) diagnostics.
   * Emits 'ready'.
   *
   * @throws {SupervisorError} If the supervisor has been closed (ErrorCode.SHUTDOWN)
   */
  public start(): void {
    if (this.closing) {
      throw new SupervisorError("Supervisor has been closed", ErrorCode.SHUTDOWN);
    }
    if (this.started) {
      return;
    }
    this.started = true;

    this.registry.start();
    this.heartbeat.start();
    this.scorer.start();
    this.recovery.start();
    this.diagnostics.start();

    this.logger.info("ConnectionSupervisor started");
    this.emit("ready");
  }

  /**
   * Admits an inbound connection and starts probing it.
   * Admission failures never throw; a rejected connection returns false and
   * the caller is expected to close its transport.
   *
   * @returns true if the connection was admitted
   *
   * @example
   * ```typescript
   * if (!supervisor.registerConnection('conn-1', transport, attributes)) {
   *   socket.close(1013, 'Server at capacity');
   * }
   * ```
   */
  public registerConnection(
    id: string,
    transport: TransportHandle,
    attributes: ConnectionAttributes
  ): boolean {
    if (!this.registry.add(id, transport, attributes)) {
      return false;
    }
    this.watchTransport(id, transport);
    return true;
  }

  /**
   * Admits a connection this process dialed and makes it recoverable.
   * When it is later lost, the recovery engine re-dials `target.url`.
   *
   * @returns true if the connection was admitted
   * @throws {ValidationError} If the target is malformed
   *
   * @example
   * ```typescript
   * supervisor.registerOutboundConnection(
   *   {
   *     id: 'upstream-eu',
   *     url: 'wss://events.example.com/stream',
   *     attributes: { repository: 'docs', sessionId: 'relay', protocolVersion: '1' },
   *     priority: 'high'
   *   },
   *   transport
   * );
   * ```
   */
  public registerOutboundConnection(target: OutboundTarget, transport: TransportHandle): boolean {
    const parsed = OutboundTargetSchema.safeParse(target);
    if (!parsed.success) {
      throw new ValidationError("Invalid outbound target", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }

    if (!this.registry.add(parsed.data.id, transport, parsed.data.attributes)) {
      return false;
    }
    this.watchTransport(parsed.data.id, transport);
    this.recovery.register(parsed.data, transport);
    return true;
  }

  /**
   * Closes and removes a connection. Outbound connections are not recovered.
   * Idempotent.
   *
   * @returns true if the connection was registered
   */
  public unregisterConnection(id: string): boolean {
    if (this.registry.evict(id, "unregistered")) {
      return true;
    }
    // Outbound connections awaiting recovery are no longer in the registry
    if (!this.recovery.unregister(id)) {
      return false;
    }
    this.diagnostics.unregister(id);
    return true;
  }

  /**
   * Reports a transport failure. Counts it, records it in diagnostics and,
   * for outbound connections, schedules recovery. Emits 'error'.
   */
  public onTransportError(id: string, error: unknown): void {
    const normalized = normalizeError(error, { connectionId: id });

    this.metrics.recordError(normalized);
    this.scorer.recordError(id);
    this.diagnostics.logError(id, "Transport error", normalized);
    this.recovery.handleDisconnection(id, normalized.message);

    this.logger.warn("Transport error", { connectionId: id, error: normalized.message });
    this.emit("error", normalized);
  }

  /**
   * Records a message on a connection. Counts as activity for stale eviction.
   *
   * @returns false if the connection is unknown or the message type is empty or too long
   */
  public recordMessage(
    id: string,
    direction: MessageDirection,
    messageType: string,
    bytes: number,
    latencyMs?: number
  ): boolean {
    if (!MessageTypeSchema.safeParse(messageType).success) {
      this.logger.debug("Ignoring message with an invalid type", { connectionId: id, messageType });
      return false;
    }
    if (!this.registry.recordTraffic(id, direction, bytes)) {
      return false;
    }
    this.metrics.recordMessage(direction, messageType, bytes);
    if (latencyMs !== undefined) {
      this.metrics.recordLatency(latencyMs);
    }
    this.diagnostics.logMessage(id, direction, messageType, bytes, latencyMs);
    return true;
  }

  public canAccept(): boolean {
    return this.registry.canAccept();
  }

  public availableCapacity(): number {
    return this.registry.availableCapacity();
  }

  public getConnection(id: string): ConnectionInfo | undefined {
    return this.registry.get(id);
  }

  public getConnections(): ConnectionInfo[] {
    return this.registry.getAll();
  }

  public getConnectionsByRepository(repository: string): ConnectionInfo[] {
    return this.registry.getByRepository(repository);
  }

  public getConnectionsBySession(sessionId: string): ConnectionInfo[] {
    return this.registry.getBySession(sessionId);
  }

  public getPoolStats(): PoolStats {
    return this.registry.getStats();
  }

  public getConnectionHealth(id: string): ConnectionHealth | undefined {
    return this.scorer.getHealth(id);
  }

  /**
   * Fleet-wide health as of the last aggregation pass
   */
  public getAggregateHealth(): AggregateHealth {
    return this.scorer.getAggregate();
  }

  public getMetricsSnapshot(): MetricsSnapshot {
    return this.metrics.getSummary();
  }

  /**
   * Returns and clears the pending alerts, oldest first
   */
  public getAlerts(): HealthAlert[] {
    return this.scorer.drainAlerts();
  }

  public getRecoveryStatus(id: string): RecoveryStatus | undefined {
    return this.recovery.getStatus(id);
  }

  public getRecoveryMetrics(): RecoveryMetrics {
    return this.recovery.getMetrics();
  }

  /**
   * Re-arms recovery of an outbound connection whose retries were exhausted
   *
   * @returns true if a recovery was scheduled
   */
  public retryRecovery(id: string): boolean {
    return this.recovery.retry(id);
  }

  public setRecoveryEnabled(id: string, enabled: boolean): boolean {
    return this.recovery.setRecoveryEnabled(id, enabled);
  }

  /**
   * Starts a debug session on a connection
   *
   * @returns The session id
   * @throws {DiagnosticsError} If diagnostics are disabled, the connection is
   *   unknown or the session limit is reached
   *
   * @example
   * ```typescript
   * const sessionId = supervisor.startDebugSession('conn-1', ['network_tracing', 'error_capture']);
   * // reproduce the issue...
   * console.log(supervisor.getConnectionDiagnostics('conn-1')?.networkTraces);
   * supervisor.stopDebugSession(sessionId);
   * ```
   */
  public startDebugSession(
    id: string,
    features?: DebugFeature[],
    logLevel?: DiagnosticLogLevel
  ): string {
    return this.diagnostics.startDebugSession(id, features, logLevel);
  }

  public stopDebugSession(sessionId: string): boolean {
    return this.diagnostics.stopDebugSession(sessionId);
  }

  public performHealthCheck(id: string, type: HealthCheckType): Promise<HealthCheckResult> {
    return this.diagnostics.performHealthCheck(id, type);
  }

  public getConnectionDiagnostics(id: string): ConnectionDiagnostics | undefined {
    return this.diagnostics.getConnectionDiagnostics(id);
  }

  public getSystemDiagnostics(): SystemDiagnostics {
    return this.diagnostics.getSystemDiagnostics();
  }

  public get isRunning(): boolean {
    return this.started && this.closing === undefined;
  }

  /**
   * Service-level health of the supervisor.
   *
   * Overall status:
   * - healthy: running, accepting connections and the fleet is healthy
   * - degraded: pool full, fleet in warning or unhealthy state, or failed recoveries
   * - unhealthy: closed, not started or the fleet is critical
   *
   * @example
   * ```typescript
   * app.get('/healthz', (_req, res) => {
   *   const health = supervisor.getHealth();
   *   res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
   * });
   * ```
   */
  public getHealth(): HealthStatus {
    const aggregate = this.scorer.getAggregate();
    const heartbeat = this.heartbeat.getMetrics();
    const recovery = this.recovery.getMetrics();
    const failed = this.recovery.getAll().filter((status) => status.state === "failed").length;
    const accepting = this.registry.canAccept();

    let status: HealthStatus["status"];
    if (!this.isRunning || aggregate.overallStatus === "critical") {
      status = "unhealthy";
    } else if (!accepting || aggregate.overallStatus !== "healthy" || failed > 0) {
      status = "degraded";
    } else {
      status = "healthy";
    }

    return {
      status,
      timestamp: new Date().toISOString(),
      connections: {
        active: this.registry.size,
        capacity: this.registry.capacity,
        availableCapacity: this.registry.availableCapacity(),
        acceptingConnections: accepting
      },
      health: {
        overallStatus: aggregate.overallStatus,
        averageHealthScore: aggregate.averageHealthScore,
        healthyConnections: aggregate.healthyConnections,
        unhealthyConnections: aggregate.unhealthyConnections
      },
      heartbeat: {
        running: this.heartbeat.isRunning,
        tracked: heartbeat.trackedConnections,
        unhealthy: heartbeat.unhealthyConnections
      },
      recovery: {
        enabled: this.recovery.isEnabled,
        active: recovery.activeRecoveries,
        queued: recovery.queueLength,
        failed
      },
      alerts: {
        pending: this.scorer.pendingAlerts(),
        dropped: this.scorer.droppedAlerts()
      },
      diagnostics: {
        enabled: this.diagnostics.isEnabled,
        activeSessions: this.diagnostics.getDebugSessions().length
      }
    };
  }

  /**
   * Stops every background task, cancels recoveries and closes every
   * connection. Resolves once all of it has stopped. Safe to call repeatedly.
   * Emits 'close'.
   *
   * @example
   * ```typescript
   * process.on('SIGTERM', async () => {
   *   await supervisor.close();
   *   process.exit(0);
   * });
   * ```
   */
  public close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.shutdown();
    }
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    this.logger.info("Closing ConnectionSupervisor");

    await this.heartbeat.close();
    await this.recovery.close();
    const closed = await this.registry.closeAll();
    await this.scorer.close();
    await this.diagnostics.close();

    this.logger.info("ConnectionSupervisor closed", { connectionsClosed: closed });
    this.emit("close");
    this.removeAllListeners();
  }

  /**
   * Reconnects a recovered outbound connection to the registry under its old id
   */
  private reattach(
    id: string,
    transport: TransportHandle,
    attempts: number,
    durationMs: number
  ): void {
    const target = this.recovery.getTarget(id);
    if (!target || this.closing) {
      transport.close(1001, "Supervisor closing");
      return;
    }

    if (this.registry.has(id)) {
      this.registry.evict(id, "replaced");
    }
    if (!this.registry.add(id, transport, target.attributes)) {
      transport.close(1013, "Pool full");
      this.recovery.unregister(id);
      this.logger.warn("Recovered connection could not be re-admitted", { connectionId: id });
      this.emit("warning", `Recovered connection ${id} could not be re-admitted`);
      return;
    }
    this.watchTransport(id, transport);

    this.scorer.raiseAlert({
      type: "recovery_complete",
      severity: "info",
      connectionId: id,
      message: `Connection ${id} recovered after ${attempts} attempt(s)`,
      metadata: { attempts, durationMs }
    });
  }

  /**
   * Routes errors the transport raises after admission into onTransportError
   */
  private watchTransport(id: string, transport: TransportHandle): void {
    const unsubscribe = transport.onError?.((error) => this.onTransportError(id, error));
    if (unsubscribe) {
      this.errorSubscriptions.set(id, unsubscribe);
    }
  }

  private onRemoved(info: ConnectionInfo, reason: RemovalReason): void {
    this.errorSubscriptions.get(info.id)?.();
    this.errorSubscriptions.delete(info.id);
    this.heartbeat.untrack(info.id);
    this.scorer.unregister(info.id);
    this.metrics.recordConnectionClosed(Date.now() - info.connectedAt.getTime());

    switch (reason) {
      case "unregistered":
      case "shutdown":
        this.diagnostics.unregister(info.id);
        this.recovery.unregister(info.id);
        break;
      case "stale":
      case "heartbeat_timeout":
        if (this.recovery.isRegistered(info.id)) {
          this.recovery.handleDisconnection(info.id, reason);
        } else {
          this.diagnostics.unregister(info.id);
        }
        break;
      case "replaced":
        break;
    }
  }

  /**
   * Set up event forwarding from managers
   */
  private setupEventForwarding(): void {
    // Registry lifecycle drives the other managers
    this.registry.on("connection:accepted", (info) => {
      this.scorer.register(info.id);
      this.heartbeat.track(info.id);
      this.diagnostics.register(info.id);
      this.metrics.recordConnectionAccepted();
      this.emit("connection:accepted", info);
    });
    this.registry.on("connection:rejected", (id, reason) => {
      this.metrics.recordConnectionRejected(reason);
      this.emit("connection:rejected", id, reason);
    });
    this.registry.on("connection:removed", (info, reason) => {
      this.onRemoved(info, reason);
      this.emit("connection:removed", info, reason);
    });

    // Heartbeat
    this.heartbeat.on("heartbeat:ack", (id, latency) => {
      this.metrics.recordLatency(latency);
      this.emit("heartbeat:ack", id, latency);
    });
    this.heartbeat.on("heartbeat:unhealthy", (id, failures) => {
      this.recovery.handleDisconnection(id, "heartbeat_failures", "high");
      this.emit("heartbeat:unhealthy", id, failures);
    });
    this.heartbeat.on("heartbeat:timeout", (id, silenceMs) => {
      this.scorer.reportTimeout(id, silenceMs);
      this.diagnostics.logEvent(id, "heartbeat_timeout", "No acknowledgment within pongTimeout", {
        silenceMs
      });
      this.emit("heartbeat:timeout", id, silenceMs);
    });

    // Health
    this.scorer.on("health:changed", (id, previous, current, score) => {
      this.diagnostics.recordStateChange(id, previous, current);
      this.emit("health:changed", id, previous, current, score);
    });
    this.scorer.on("health:alert", (alert) => this.emit("health:alert", alert));
    this.scorer.on("health:aggregate", (aggregate) => this.emit("health:aggregate", aggregate));

    // Recovery
    this.recovery.on("recovery:queued", (request) => this.emit("recovery:queued", request));
    this.recovery.on("recovery:dropped", (id, priority) => {
      this.emit("recovery:dropped", id, priority);
      this.emit("warning", `Recovery queue full, dropped request for ${id}`);
    });
    this.recovery.on("recovery:state", (id, previous, current) => {
      this.diagnostics.logEvent(id, "recovery_state", `${previous} -> ${current}`, {
        previous,
        current
      });
      this.emit("recovery:state", id, previous, current);
    });
    this.recovery.on("recovery:attempt", (id, attempt, delayMs) =>
      this.emit("recovery:attempt", id, attempt, delayMs)
    );
    this.recovery.on("recovery:succeeded", (id, transport, attempts, durationMs) => {
      this.reattach(id, transport, attempts, durationMs);
      this.emit("recovery:succeeded", id, transport, attempts, durationMs);
    });
    this.recovery.on("recovery:failed", (id, attempts, error) => {
      this.metrics.recordError(error);
      this.scorer.raiseAlert({
        type: "recovery_failed",
        severity: "error",
        connectionId: id,
        message: error.message,
        metadata: { attempts }
      });
      this.emit("recovery:failed", id, attempts, error);
    });
    this.recovery.on("recovery:cancelled", (id) => this.emit("recovery:cancelled", id));

    // Diagnostics
    this.diagnostics.on("diagnostics:session_started", (session) =>
      this.emit("diagnostics:session_started", session)
    );
    this.diagnostics.on("diagnostics:session_stopped", (session) =>
      this.emit("diagnostics:session_stopped", session)
    );
  }

  /**
   * Create default logger using pino
   */
  private createDefaultLogger(): Logger {
    return createPinoLogger(this.config.logLevel, "ConnectionSupervisor");
  }

  /**
   * Creates a configuration builder for fluent configuration
   *
   * @example
   * ```typescript
   * const supervisor = new ConnectionSupervisor(
   *   ConnectionSupervisor.builder()
   *     .withMaxConnections(2000)
   *     .withRecovery({ maxRetries: 8 })
   *     .build()
   * );
   * ```
   */
  public static builder(): SupervisorConfigBuilder {
    return new SupervisorConfigBuilder();
  }
}
