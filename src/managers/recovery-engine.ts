/**
 * RecoveryEngine - Bounded, backoff-driven reconnection of outbound connections
 *
 * Disconnections become RecoveryRequests on a bounded priority queue consumed by
 * a fixed pool of workers. Each run makes at most `maxRetries` dial attempts,
 * waiting `min(initialBackoff * multiplier^k, maxBackoff)` (±10% jitter) before
 * attempt k > 0, all within `recoveryTimeout`. Unregistering a connection aborts
 * its scope, which ends any wait or dial in progress.
 */

import { EventEmitter } from "eventemitter3";
import { v4 as uuidv4 } from "uuid";
import type {
  Dialer,
  Logger,
  OutboundTarget,
  RecoveryMetrics,
  RecoveryPriority,
  RecoveryRequest,
  RecoveryState,
  RecoveryStatus,
  SupervisorEvents,
  TransportHandle
} from "../types";
import {
  ErrorCode,
  RECOVERY_PRIORITIES,
  RecoveryError,
  SupervisorError,
  TimeoutError,
  ValidationError
} from "../types";
import { OutboundTargetSchema } from "../types/validation";
import { THRESHOLDS } from "../constants";
import { BoundedPriorityQueue, QueueAbortedError } from "../utils/bounded-queue";
import { RetryPolicy, type RandomSource } from "../utils/retry-policy";
import { AbortedError, isAbortedError, sleep, withTimeout } from "../utils/abortable";
import { PeriodicTask } from "../utils/periodic-task";

export interface RecoveryEngineOptions {
  enabled: boolean;
  enabledByDefault: boolean;
  maxRetries: number;
  initialBackoff: number;
  maxBackoff: number;
  backoffMultiplier: number;
  jitter: boolean;
  recoveryTimeout: number;
  handshakeTimeout: number;
  workers: number;
  queueCapacity: number;
  healthCheckInterval: number;
  probeTimeout: number;
}

interface RecoverableConnection {
  target: OutboundTarget;
  priority: RecoveryPriority;
  state: RecoveryState;
  retryCount: number;
  backoffDuration: number;
  recoveryEnabled: boolean;
  healthScore: number;
  lastSeen: number;
  lastError?: string;
  transport?: TransportHandle;
  scope: AbortController;
  /** Id of the request queued or running for this record */
  pendingRequestId?: string;
}

/**
 * Probe score for a recoverable connection's round-trip time
 */
export function latencyScore(latencyMs: number): number {
  if (latencyMs < 50) return 1.0;
  if (latencyMs < 100) return 0.9;
  if (latencyMs < 200) return 0.8;
  if (latencyMs < 500) return 0.6;
  if (latencyMs < 1000) return 0.4;
  return 0.2;
}

export class RecoveryEngine extends EventEmitter<SupervisorEvents> {
  private readonly logger: Logger;
  private readonly options: RecoveryEngineOptions;
  private readonly dialer: Dialer;
  private readonly policy: RetryPolicy;
  private readonly records = new Map<string, RecoverableConnection>();
  private readonly queue: BoundedPriorityQueue<RecoveryRequest, RecoveryPriority>;
  private readonly healthTask: PeriodicTask;
  private lifecycle?: AbortController;
  private workers: Promise<void>[] = [];

  private totalRecoveries = 0;
  private successfulRecoveries = 0;
  private failedRecoveries = 0;
  private cancelledRecoveries = 0;
  private droppedRequests = 0;
  private activeRecoveries = 0;
  private recoveryTimeTotal = 0;
  private minRecoveryTime = 0;
  private maxRecoveryTime = 0;

  constructor(
    options: RecoveryEngineOptions,
    dialer: Dialer,
    logger: Logger,
    random?: RandomSource
  ) {
    super();
    this.options = { ...options };
    this.dialer = dialer;
    this.logger = logger;
    this.policy = RetryPolicy.exponential(
      options.initialBackoff,
      options.maxBackoff,
      options.backoffMultiplier,
      options.jitter,
      random
    );
    this.queue = new BoundedPriorityQueue<RecoveryRequest, RecoveryPriority>(
      options.queueCapacity,
      RECOVERY_PRIORITIES
    );
    this.healthTask = new PeriodicTask(
      "RecoveryEngine health check",
      options.healthCheckInterval,
      () => this.checkHealth(),
      logger
    );
  }

  /**
   * Makes an outbound connection recoverable. The connection starts `connected`.
   *
   * @throws {ValidationError} If the target is malformed
   */
  public register(target: OutboundTarget, transport: TransportHandle): RecoveryStatus {
    const parsed = OutboundTargetSchema.safeParse(target);
    if (!parsed.success) {
      throw new ValidationError("Invalid outbound target", {
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      });
    }

    const previous = this.records.get(target.id);
    if (previous) {
      previous.scope.abort();
      this.discardQueued(target.id);
    }

    const record: RecoverableConnection = {
      target: { ...parsed.data, attributes: { ...parsed.data.attributes } },
      priority: parsed.data.priority ?? "normal",
      state: "connected",
      retryCount: 0,
      backoffDuration: this.options.initialBackoff,
      recoveryEnabled: parsed.data.recoveryEnabled ?? this.options.enabledByDefault,
      healthScore: 1,
      lastSeen: Date.now(),
      transport,
      scope: new AbortController()
    };
    this.records.set(target.id, record);

    this.logger.debug("RecoveryEngine: connection registered", {
      connectionId: target.id,
      url: record.target.url,
      recoveryEnabled: record.recoveryEnabled
    });
    return this.toStatus(record);
  }

  /**
   * Drains a connection: aborts any wait or dial in progress, discards queued
   * requests and forgets the connection. Idempotent.
   */
  public unregister(connectionId: string): boolean {
    const record = this.records.get(connectionId);
    if (!record) {
      return false;
    }

    this.transition(record, "draining");
    record.scope.abort();
    this.records.delete(connectionId);

    this.discardQueued(connectionId);
    return true;
  }

  public isRegistered(connectionId: string): boolean {
    return this.records.has(connectionId);
  }

  public setRecoveryEnabled(connectionId: string, enabled: boolean): boolean {
    const record = this.records.get(connectionId);
    if (!record) {
      return false;
    }
    record.recoveryEnabled = enabled;
    this.logger.info("RecoveryEngine: recovery toggled", { connectionId, enabled });
    return true;
  }

  /**
   * Reports a lost connection. Enqueues a recovery request unless recovery is
   * disabled, the connection is draining or failed, or a request is already
   * queued or running. Never blocks: with a full queue the request is dropped.
   *
   * @returns true if a request was enqueued
   */
  public handleDisconnection(
    connectionId: string,
    cause: string,
    priority?: RecoveryPriority,
    callback?: (success: boolean, error?: Error) => void
  ): boolean {
    const record = this.records.get(connectionId);
    if (!record || !this.options.enabled || !record.recoveryEnabled) {
      return false;
    }
    if (record.state === "draining" || record.state === "failed" || record.pendingRequestId) {
      return false;
    }
    return this.enqueue(record, cause, priority ?? record.priority, callback);
  }

  /**
   * Re-arms a connection whose recovery was exhausted
   *
   * @returns true if a request was enqueued
   */
  public retry(connectionId: string, priority: RecoveryPriority = "high"): boolean {
    const record = this.records.get(connectionId);
    if (!record || !this.options.enabled || record.state !== "failed" || record.pendingRequestId) {
      return false;
    }
    record.retryCount = 0;
    record.backoffDuration = this.options.initialBackoff;
    return this.enqueue(record, "manual_retry", priority);
  }

  /**
   * Runs one recovery to completion. Workers call this for each dequeued request.
   * A request that no longer belongs to a disconnected record (the connection was
   * unregistered or registered again since) is cancelled without dialing.
   *
   * @returns true if the connection was re-established
   */
  public async attemptRecovery(request: RecoveryRequest): Promise<boolean> {
    const record = this.records.get(request.connectionId);
    if (!record || record.pendingRequestId !== request.id || record.state !== "disconnected") {
      request.callback?.(false, this.cancellation(request.connectionId));
      return false;
    }

    const connectionId = request.connectionId;
    const startedAt = Date.now();
    const deadline = startedAt + this.options.recoveryTimeout;
    const signal = record.scope.signal;
    let attempts = 0;
    let lastError: Error | undefined;

    this.activeRecoveries++;
    this.totalRecoveries++;
    this.transition(record, "reconnecting");
    this.logger.info("RecoveryEngine: recovery started", {
      connectionId,
      cause: request.cause,
      priority: request.priority,
      queuedForMs: startedAt - request.requestedAt
    });

    try {
      for (let k = 0; k < this.options.maxRetries; k++) {
        let delay = 0;
        if (k > 0) {
          delay = this.policy.calculateDelay(k);
          record.backoffDuration = delay;
          if (Date.now() + delay >= deadline) {
            lastError = new TimeoutError("Recovery timeout exceeded", {
              recoveryTimeout: this.options.recoveryTimeout
            });
            break;
          }
          await sleep(delay, signal);
        }

        attempts = k + 1;
        record.retryCount = attempts;
        this.emit("recovery:attempt", connectionId, attempts, delay);

        try {
          const transport = await withTimeout(
            (dialSignal) =>
              this.dialer.dial(record.target.url, {
                headers: record.target.headers,
                handshakeTimeout: this.options.handshakeTimeout,
                signal: dialSignal
              }),
            Math.min(this.options.handshakeTimeout, Math.max(1, deadline - Date.now())),
            signal,
            `Handshake with ${record.target.url} timed out`
          );

          if (signal.aborted) {
            transport.close(1001, "draining");
            throw new AbortedError();
          }

          this.onRecovered(record, transport, attempts, Date.now() - startedAt);
          request.callback?.(true);
          return true;
        } catch (error) {
          if (isAbortedError(error)) {
            throw error;
          }
          lastError = error instanceof Error ? error : new Error(String(error));
          record.lastError = lastError.message;
          this.logger.warn("RecoveryEngine: reconnection attempt failed", {
            connectionId,
            attempt: attempts,
            maxRetries: this.options.maxRetries,
            error: lastError.message
          });
        }
      }

      const failure = this.onExhausted(record, attempts, lastError);
      request.callback?.(false, failure);
      return false;
    } catch (error) {
      if (!isAbortedError(error)) {
        throw error;
      }
      this.cancelledRecoveries++;
      this.logger.info("RecoveryEngine: recovery cancelled", { connectionId, attempts });
      this.emit("recovery:cancelled", connectionId);
      request.callback?.(false, this.cancellation(connectionId));
      return false;
    } finally {
      this.activeRecoveries--;
      record.pendingRequestId = undefined;
    }
  }

  /**
   * Probes every connected recoverable connection once. Failures enqueue a
   * recovery; successes smooth the connection's score towards the probe score.
   */
  public async checkHealth(): Promise<void> {
    const connected = Array.from(this.records.values()).filter(
      (record) => record.state === "connected" && record.transport !== undefined
    );

    await Promise.allSettled(
      connected.map(async (record) => {
        const transport = record.transport;
        if (!transport) return;
        try {
          const latency = await transport.ping(this.options.probeTimeout);
          if (record.state !== "connected") return;
          record.lastSeen = Date.now();
          record.healthScore =
            (1 - THRESHOLDS.RECOVERY_SCORE_WEIGHT) * record.healthScore +
            THRESHOLDS.RECOVERY_SCORE_WEIGHT * latencyScore(latency);
        } catch (error) {
          if (record.state !== "connected") return;
          record.lastError = error instanceof Error ? error.message : String(error);
          this.handleDisconnection(record.target.id, "health_check_failed");
        }
      })
    );
  }

  public getStatus(connectionId: string): RecoveryStatus | undefined {
    const record = this.records.get(connectionId);
    return record ? this.toStatus(record) : undefined;
  }

  public getAll(): RecoveryStatus[] {
    return Array.from(this.records.values(), (record) => this.toStatus(record));
  }

  public getTarget(connectionId: string): OutboundTarget | undefined {
    const record = this.records.get(connectionId);
    if (!record) {
      return undefined;
    }
    return {
      ...record.target,
      headers: record.target.headers ? { ...record.target.headers } : undefined,
      attributes: { ...record.target.attributes }
    };
  }

  public getMetrics(): RecoveryMetrics {
    return {
      totalRecoveries: this.totalRecoveries,
      successfulRecoveries: this.successfulRecoveries,
      failedRecoveries: this.failedRecoveries,
      cancelledRecoveries: this.cancelledRecoveries,
      droppedRequests: this.droppedRequests,
      activeRecoveries: this.activeRecoveries,
      queueLength: this.queue.size(),
      averageRecoveryTime:
        this.successfulRecoveries > 0 ? this.recoveryTimeTotal / this.successfulRecoveries : 0,
      minRecoveryTime: this.minRecoveryTime,
      maxRecoveryTime: this.maxRecoveryTime
    };
  }

  public get isEnabled(): boolean {
    return this.options.enabled;
  }

  public get isRunning(): boolean {
    return this.lifecycle !== undefined && !this.lifecycle.signal.aborted;
  }

  /**
   * Starts the worker pool and the health checker. No-op when recovery is disabled.
   */
  public start(): void {
    if (!this.options.enabled || this.isRunning) {
      return;
    }
    const lifecycle = new AbortController();
    this.lifecycle = lifecycle;
    this.workers = Array.from({ length: this.options.workers }, (_, index) =>
      this.runWorker(index, lifecycle.signal)
    );
    this.healthTask.start();
    this.logger.info("RecoveryEngine: started", {
      workers: this.options.workers,
      queueCapacity: this.options.queueCapacity
    });
  }

  /**
   * Cancels every recovery, stops the workers and the health checker.
   * Resolves once all of them have stopped.
   */
  public async close(): Promise<void> {
    this.lifecycle?.abort();
    for (const record of this.records.values()) {
      record.scope.abort();
    }
    for (const request of this.queue.close()) {
      request.callback?.(false, this.cancellation(request.connectionId));
    }

    await Promise.all([...this.workers, this.healthTask.stop()]);
    this.workers = [];
    this.logger.info("RecoveryEngine: stopped", { ...this.getMetrics() });
  }

  private async runWorker(index: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let request: RecoveryRequest;
      try {
        request = await this.queue.take(signal);
      } catch (error) {
        if (error instanceof QueueAbortedError) {
          break;
        }
        throw error;
      }

      try {
        await this.attemptRecovery(request);
      } catch (error) {
        this.logger.error("RecoveryEngine: worker failed to process request", {
          worker: index,
          connectionId: request.connectionId,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
  }

  private enqueue(
    record: RecoverableConnection,
    cause: string,
    priority: RecoveryPriority,
    callback?: (success: boolean, error?: Error) => void
  ): boolean {
    const connectionId = record.target.id;
    const request: RecoveryRequest = {
      id: uuidv4(),
      connectionId,
      priority,
      requestedAt: Date.now(),
      cause,
      callback
    };

    this.transition(record, "disconnected");
    record.transport = undefined;

    if (!this.queue.offer(request, priority)) {
      this.droppedRequests++;
      this.logger.warn("RecoveryEngine: recovery queue full, dropping request", {
        connectionId,
        priority,
        capacity: this.queue.getCapacity(),
        dropped: this.droppedRequests
      });
      this.emit("recovery:dropped", connectionId, priority);
      callback?.(
        false,
        new SupervisorError("Recovery queue is full", ErrorCode.QUEUE_FULL, { connectionId })
      );
      return false;
    }

    record.pendingRequestId = request.id;
    this.emit("recovery:queued", request);
    return true;
  }

  private onRecovered(
    record: RecoverableConnection,
    transport: TransportHandle,
    attempts: number,
    durationMs: number
  ): void {
    record.transport = transport;
    record.retryCount = 0;
    record.backoffDuration = this.options.initialBackoff;
    record.healthScore = 1;
    record.lastSeen = Date.now();
    record.lastError = undefined;
    this.transition(record, "connected");

    this.successfulRecoveries++;
    this.recoveryTimeTotal += durationMs;
    this.minRecoveryTime =
      this.successfulRecoveries === 1 ? durationMs : Math.min(this.minRecoveryTime, durationMs);
    this.maxRecoveryTime = Math.max(this.maxRecoveryTime, durationMs);

    this.logger.info("RecoveryEngine: connection recovered", {
      connectionId: record.target.id,
      attempts,
      durationMs
    });
    this.emit("recovery:succeeded", record.target.id, transport, attempts, durationMs);
  }

  private onExhausted(
    record: RecoverableConnection,
    attempts: number,
    lastError?: Error
  ): RecoveryError {
    record.healthScore = 0;
    this.transition(record, "failed");
    this.failedRecoveries++;

    const failure = new RecoveryError(
      `Recovery of ${record.target.id} failed after ${attempts} attempts`,
      { connectionId: record.target.id, attempts, lastError: lastError?.message }
    );
    this.logger.error("RecoveryEngine: recovery exhausted", failure.toJSON());
    this.emit("recovery:failed", record.target.id, attempts, failure);
    return failure;
  }

  private transition(record: RecoverableConnection, next: RecoveryState): void {
    const previous = record.state;
    if (previous === next) {
      return;
    }
    record.state = next;
    this.logger.debug("RecoveryEngine: state changed", {
      connectionId: record.target.id,
      from: previous,
      to: next
    });
    this.emit("recovery:state", record.target.id, previous, next);
  }

  private discardQueued(connectionId: string): void {
    for (const request of this.queue.removeWhere((r) => r.connectionId === connectionId)) {
      request.callback?.(false, this.cancellation(connectionId));
    }
  }

  private cancellation(connectionId: string): SupervisorError {
    return new SupervisorError("Recovery cancelled", ErrorCode.RECOVERY_CANCELLED, {
      connectionId
    });
  }

  private toStatus(record: RecoverableConnection): RecoveryStatus {
    return {
      connectionId: record.target.id,
      state: record.state,
      retryCount: record.retryCount,
      backoffDuration: record.backoffDuration,
      recoveryEnabled: record.recoveryEnabled,
      healthScore: record.healthScore,
      priority: record.priority,
      lastSeen: new Date(record.lastSeen),
      lastError: record.lastError
    };
  }
}
