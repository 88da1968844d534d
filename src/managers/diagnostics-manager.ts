/**
 * DiagnosticsManager - Optional per-connection history and debug sessions
 *
 * Keeps bounded, time-ordered histories (debug log, timeline, network traces,
 * health checks) for each connection and prunes them past `retentionPeriod`.
 * When disabled every recording call returns immediately and no timer exists.
 */

import { EventEmitter } from "eventemitter3";
import { v4 as uuidv4 } from "uuid";
import type {
  ConnectionDiagnostics,
  DebugFeature,
  DebugLogEntry,
  DebugSession,
  DetailLevel,
  DiagnosticLogLevel,
  HealthCheckResult,
  HealthCheckStatus,
  HealthCheckType,
  HealthState,
  Logger,
  MessageDirection,
  NetworkTrace,
  SupervisorEvents,
  SystemDiagnostics,
  TimelineEvent
} from "../types";
import { DEBUG_FEATURES, DiagnosticsError } from "../types";
import {
  DebugFeatureSchema,
  DiagnosticLogLevelSchema,
  HealthCheckTypeSchema
} from "../types/validation";
import { LIMITS, THRESHOLDS } from "../constants";
import { BoundedQueue } from "../utils/bounded-queue";
import { PeriodicTask } from "../utils/periodic-task";

export interface DiagnosticsManagerOptions {
  enabled: boolean;
  networkTracing: boolean;
  detailLevel: DetailLevel;
  maxDebugSessions: number;
  retentionPeriod: number;
  maxLogEntries: number;
  interval: number;
  probeTimeout: number;
}

/**
 * What diagnostics needs to know about a connection it does not own
 */
export interface DiagnosticsSource {
  ping(connectionId: string, timeoutMs: number): Promise<number>;
  getHealthState(connectionId: string): HealthState | undefined;
  getLastLatency(connectionId: string): number | undefined;
}

interface DiagnosticsRecord {
  connectionId: string;
  registeredAt: number;
  lastState?: string;
  messagesSent: number;
  messagesReceived: number;
  errorCount: number;
  lastError?: string;
  logs: BoundedQueue<DebugLogEntry>;
  timeline: BoundedQueue<TimelineEvent>;
  traces: BoundedQueue<NetworkTrace>;
  checks: BoundedQueue<HealthCheckResult>;
}

interface ActiveSession {
  session: DebugSession;
  features: Set<DebugFeature>;
}

const LOG_LEVEL_ORDER: Record<DiagnosticLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

// Latency check cut-offs (ms)
const LATENCY_PASS_MS = 100;
const LATENCY_WARN_MS = 500;

export class DiagnosticsManager extends EventEmitter<SupervisorEvents> {
  private readonly logger: Logger;
  private readonly options: DiagnosticsManagerOptions;
  private readonly source: DiagnosticsSource;
  private readonly records = new Map<string, DiagnosticsRecord>();
  private readonly sessions = new Map<string, ActiveSession>();
  private readonly task?: PeriodicTask;
  private system: SystemDiagnostics = {
    status: "healthy",
    trackedConnections: 0,
    healthyConnections: 0,
    activeDebugSessions: 0,
    totalLogEntries: 0,
    totalTraces: 0
  };

  constructor(options: DiagnosticsManagerOptions, source: DiagnosticsSource, logger: Logger) {
    super();
    this.options = { ...options };
    this.source = source;
    this.logger = logger;

    if (options.enabled) {
      this.task = new PeriodicTask(
        "DiagnosticsManager",
        options.interval,
        () => {
          this.runDiagnostics();
        },
        logger
      );
    }
  }

  public get isEnabled(): boolean {
    return this.options.enabled;
  }

  public register(connectionId: string): void {
    if (!this.options.enabled || this.records.has(connectionId)) {
      return;
    }
    const now = Date.now();
    this.records.set(connectionId, {
      connectionId,
      registeredAt: now,
      messagesSent: 0,
      messagesReceived: 0,
      errorCount: 0,
      logs: new BoundedQueue<DebugLogEntry>(this.options.maxLogEntries, "drop-oldest"),
      timeline: new BoundedQueue<TimelineEvent>(LIMITS.MAX_TIMELINE_EVENTS, "drop-oldest"),
      traces: new BoundedQueue<NetworkTrace>(LIMITS.MAX_NETWORK_TRACES, "drop-oldest"),
      checks: new BoundedQueue<HealthCheckResult>(LIMITS.MAX_HEALTH_CHECKS, "drop-oldest")
    });
    this.logEvent(connectionId, "registered", "Connection registered for diagnostics");
  }

  /**
   * Forgets a connection and stops every debug session attached to it
   */
  public unregister(connectionId: string): void {
    if (!this.options.enabled) {
      return;
    }
    this.records.delete(connectionId);
    for (const [sessionId, active] of this.sessions) {
      if (active.session.connectionId === connectionId) {
        this.stopDebugSession(sessionId);
      }
    }
  }

  /**
   * Counts a message. Traces it when network tracing is on globally or for a
   * session on this connection.
   */
  public logMessage(
    connectionId: string,
    direction: MessageDirection,
    messageType: string,
    size: number,
    latencyMs?: number
  ): void {
    const record = this.options.enabled ? this.records.get(connectionId) : undefined;
    if (!record) {
      return;
    }

    if (direction === "outbound") {
      record.messagesSent++;
    } else {
      record.messagesReceived++;
    }

    const now = new Date();
    if (this.options.networkTracing || this.sessionWants(connectionId, "network_tracing")) {
      record.traces.push({ timestamp: now, direction, messageType, size, latencyMs });
      this.collect(connectionId, "network_tracing");
      if (this.options.detailLevel !== "basic") {
        this.appendTimeline(record, {
          timestamp: now,
          type: "message",
          description: "Message traced",
          data: { messageType, size, direction, latencyMs }
        });
      }
    }

    const logMessages =
      this.options.detailLevel === "verbose" || this.sessionWants(connectionId, "message_logging");
    if (logMessages) {
      this.addEntry(
        record,
        "debug",
        `${direction} ${messageType} message`,
        { size, latencyMs },
        "message_logging"
      );
    }

    if (latencyMs !== undefined && this.sessionWants(connectionId, "performance_profiling")) {
      this.addEntry(record, "debug", "Latency sample", { latencyMs }, "performance_profiling");
    }
  }

  public logError(connectionId: string, message: string, error?: Error): void {
    const record = this.options.enabled ? this.records.get(connectionId) : undefined;
    if (!record) {
      return;
    }

    record.errorCount++;
    record.lastError = error ? error.message : message;

    const data = error ? { error: error.message, name: error.name } : undefined;
    this.addEntry(record, "error", message, data, "error_capture");
    this.appendTimeline(record, {
      timestamp: new Date(),
      type: "error",
      description: message,
      data
    });
  }

  public recordStateChange(connectionId: string, from: string, to: string): void {
    const record = this.options.enabled ? this.records.get(connectionId) : undefined;
    if (!record) {
      return;
    }
    record.lastState = to;
    this.appendTimeline(record, {
      timestamp: new Date(),
      type: "state_change",
      description: `${from} -> ${to}`,
      data: { from, to }
    });
    if (this.sessionWants(connectionId, "state_tracking")) {
      this.addEntry(
        record,
        "info",
        `State changed from ${from} to ${to}`,
        { from, to },
        "state_tracking"
      );
    }
  }

  public logEvent(
    connectionId: string,
    type: string,
    description: string,
    data?: Record<string, unknown>
  ): void {
    const record = this.options.enabled ? this.records.get(connectionId) : undefined;
    if (!record) {
      return;
    }
    this.appendTimeline(record, { timestamp: new Date(), type, description, data });
  }

  /**
   * Starts a debug session on a registered connection
   *
   * @returns The session id
   * @throws {DiagnosticsError} If diagnostics are disabled, the connection is
   *   unknown, the arguments are invalid or the session limit is reached
   *
   * @example
   * ```typescript
   * const sessionId = diagnostics.startDebugSession('conn-1', ['network_tracing'], 'info');
   * // ...
   * diagnostics.stopDebugSession(sessionId);
   * ```
   */
  public startDebugSession(
    connectionId: string,
    features: DebugFeature[] = [...DEBUG_FEATURES],
    logLevel: DiagnosticLogLevel = "debug"
  ): string {
    if (!this.options.enabled) {
      throw new DiagnosticsError("Diagnostics are disabled");
    }
    if (!this.records.has(connectionId)) {
      throw new DiagnosticsError(`Connection ${connectionId} not found`, { connectionId });
    }

    const parsedFeatures = DebugFeatureSchema.array().min(1).safeParse(features);
    const parsedLevel = DiagnosticLogLevelSchema.safeParse(logLevel);
    if (!parsedFeatures.success || !parsedLevel.success) {
      throw new DiagnosticsError("Invalid debug session options", { features, logLevel });
    }

    if (this.sessions.size >= this.options.maxDebugSessions) {
      throw new DiagnosticsError("Maximum debug sessions reached", {
        maxDebugSessions: this.options.maxDebugSessions
      });
    }

    const now = Date.now();
    let sessionId = `debug_${connectionId}_${Math.floor(now / 1000)}`;
    if (this.sessions.has(sessionId)) {
      sessionId = `debug_${connectionId}_${uuidv4()}`;
    }

    const featureSet = new Set(parsedFeatures.data);
    const session: DebugSession = {
      id: sessionId,
      connectionId,
      features: Array.from(featureSet),
      logLevel: parsedLevel.data,
      startedAt: new Date(now),
      active: true,
      entriesCollected: 0
    };
    this.sessions.set(sessionId, { session, features: featureSet });

    this.logger.info("DiagnosticsManager: debug session started", {
      sessionId,
      connectionId,
      features: session.features
    });
    this.emit("diagnostics:session_started", { ...session, features: [...session.features] });
    return sessionId;
  }

  /**
   * Stops a debug session. Collection for it stops immediately.
   *
   * @returns false if the session is unknown
   */
  public stopDebugSession(sessionId: string): boolean {
    const active = this.sessions.get(sessionId);
    if (!active) {
      return false;
    }
    this.sessions.delete(sessionId);

    const stopped: DebugSession = {
      ...active.session,
      features: [...active.session.features],
      active: false,
      stoppedAt: new Date()
    };
    this.logger.info("DiagnosticsManager: debug session stopped", {
      sessionId,
      connectionId: stopped.connectionId,
      entriesCollected: stopped.entriesCollected
    });
    this.emit("diagnostics:session_stopped", stopped);
    return true;
  }

  public getDebugSessions(): DebugSession[] {
    return Array.from(this.sessions.values(), ({ session }) => ({
      ...session,
      features: [...session.features]
    }));
  }

  /**
   * Runs an on-demand check and stores the result in the connection's history
   *
   * @throws {DiagnosticsError} If diagnostics are disabled, the connection is
   *   unknown or the check type is unsupported
   */
  public async performHealthCheck(
    connectionId: string,
    type: HealthCheckType
  ): Promise<HealthCheckResult> {
    if (!this.options.enabled) {
      throw new DiagnosticsError("Diagnostics are disabled");
    }
    if (!this.records.has(connectionId)) {
      throw new DiagnosticsError(`Connection ${connectionId} not found`, { connectionId });
    }
    const parsedType = HealthCheckTypeSchema.safeParse(type);
    if (!parsedType.success) {
      throw new DiagnosticsError(`Unsupported health check type: ${String(type)}`, { type });
    }

    const result =
      parsedType.data === "ping"
        ? await this.pingCheck(connectionId)
        : this.latencyCheck(connectionId);

    const record = this.records.get(connectionId);
    record?.checks.push(result);
    return { ...result, timestamp: new Date(result.timestamp) };
  }

  /**
   * One diagnostics pass: retention pruning, then system status
   */
  public runDiagnostics(): SystemDiagnostics {
    const now = Date.now();
    this.pruneBefore(now - this.options.retentionPeriod);

    let healthy = 0;
    let totalLogEntries = 0;
    let totalTraces = 0;
    for (const record of this.records.values()) {
      if (this.source.getHealthState(record.connectionId) === "healthy") {
        healthy++;
      }
      totalLogEntries += record.logs.size();
      totalTraces += record.traces.size();
    }

    const tracked = this.records.size;
    let status: SystemDiagnostics["status"] = "healthy";
    if (tracked > 0) {
      const ratio = healthy / tracked;
      if (ratio >= THRESHOLDS.AGGREGATE_HEALTHY_RATIO) {
        status = "healthy";
      } else if (ratio >= THRESHOLDS.AGGREGATE_WARNING_RATIO) {
        status = "degraded";
      } else {
        status = "unhealthy";
      }
    }

    this.system = {
      status,
      trackedConnections: tracked,
      healthyConnections: healthy,
      activeDebugSessions: this.sessions.size,
      totalLogEntries,
      totalTraces,
      lastRunAt: new Date(now)
    };
    return this.getSystemDiagnostics();
  }

  public getSystemDiagnostics(): SystemDiagnostics {
    return {
      ...this.system,
      lastRunAt: this.system.lastRunAt ? new Date(this.system.lastRunAt) : undefined
    };
  }

  public getConnectionDiagnostics(connectionId: string): ConnectionDiagnostics | undefined {
    const record = this.records.get(connectionId);
    if (!record) {
      return undefined;
    }
    return {
      connectionId: record.connectionId,
      registeredAt: new Date(record.registeredAt),
      lastState: record.lastState,
      messagesSent: record.messagesSent,
      messagesReceived: record.messagesReceived,
      errorCount: record.errorCount,
      lastError: record.lastError,
      debugLogs: record.logs.toArray().map((entry) => ({
        ...entry,
        timestamp: new Date(entry.timestamp),
        data: entry.data ? { ...entry.data } : undefined
      })),
      timeline: record.timeline.toArray().map((event) => ({
        ...event,
        timestamp: new Date(event.timestamp),
        data: event.data ? { ...event.data } : undefined
      })),
      networkTraces: record.traces.toArray().map((trace) => ({
        ...trace,
        timestamp: new Date(trace.timestamp)
      })),
      healthChecks: record.checks.toArray().map((check) => ({
        ...check,
        timestamp: new Date(check.timestamp)
      }))
    };
  }

  public start(): void {
    this.task?.start();
  }

  public async close(): Promise<void> {
    await this.task?.stop();
    for (const sessionId of Array.from(this.sessions.keys())) {
      this.stopDebugSession(sessionId);
    }
    this.records.clear();
  }

  private async pingCheck(connectionId: string): Promise<HealthCheckResult> {
    try {
      const latency = await this.source.ping(connectionId, this.options.probeTimeout);
      return {
        type: "ping",
        status: "pass",
        latencyMs: latency,
        message: `Ping acknowledged in ${latency}ms`,
        timestamp: new Date()
      };
    } catch (error) {
      return {
        type: "ping",
        status: "fail",
        message: `Ping failed: ${error instanceof Error ? error.message : String(error)}`,
        timestamp: new Date()
      };
    }
  }

  private latencyCheck(connectionId: string): HealthCheckResult {
    const latency = this.source.getLastLatency(connectionId);
    if (latency === undefined) {
      return {
        type: "latency",
        status: "warn",
        message: "No latency samples yet",
        timestamp: new Date()
      };
    }

    let status: HealthCheckStatus = "fail";
    let message = `High latency detected (${latency}ms)`;
    if (latency < LATENCY_PASS_MS) {
      status = "pass";
      message = `Latency ${latency}ms`;
    } else if (latency < LATENCY_WARN_MS) {
      status = "warn";
      message = `Elevated latency ${latency}ms`;
    }
    return { type: "latency", status, latencyMs: latency, message, timestamp: new Date() };
  }

  private pruneBefore(cutoff: number): void {
    const expired = (item: { timestamp: Date }) => item.timestamp.getTime() < cutoff;
    let pruned = 0;
    for (const record of this.records.values()) {
      pruned += record.logs.dropWhile(expired);
      pruned += record.timeline.dropWhile(expired);
      pruned += record.traces.dropWhile(expired);
      pruned += record.checks.dropWhile(expired);
    }
    if (pruned > 0) {
      this.logger.debug("DiagnosticsManager: pruned expired entries", { pruned });
    }
  }

  private appendTimeline(record: DiagnosticsRecord, event: TimelineEvent): void {
    record.timeline.push(event);
  }

  private addEntry(
    record: DiagnosticsRecord,
    level: DiagnosticLogLevel,
    message: string,
    data: Record<string, unknown> | undefined,
    feature: DebugFeature
  ): void {
    record.logs.push({
      timestamp: new Date(),
      level,
      connectionId: record.connectionId,
      message,
      data
    });
    this.collect(record.connectionId, feature, level);
  }

  private sessionWants(connectionId: string, feature: DebugFeature): boolean {
    for (const { session, features } of this.sessions.values()) {
      if (session.connectionId === connectionId && features.has(feature)) {
        return true;
      }
    }
    return false;
  }

  // Credits an entry to every session on the connection that collects it.
  // Log entries below a session's level are not credited to it.
  private collect(connectionId: string, feature: DebugFeature, level?: DiagnosticLogLevel): void {
    for (const { session, features } of this.sessions.values()) {
      if (
        session.connectionId === connectionId &&
        features.has(feature) &&
        (level === undefined || LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[session.logLevel])
      ) {
        session.entriesCollected++;
      }
    }
  }
}
