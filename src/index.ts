/**
 * Stream Supervisor
 * Connection lifecycle, liveness probing, health scoring and recovery for
 * long-lived streaming connections
 *
 * @packageDocumentation
 */

/**
 * Main supervisor class
 * @see {@link ConnectionSupervisor}
 */
export { ConnectionSupervisor } from "./connection-supervisor";
export type { SupervisorDependencies } from "./connection-supervisor";
import { ConnectionSupervisor } from "./connection-supervisor";
import type { PartialSupervisorConfig } from "./types";
import type { SupervisorDependencies } from "./connection-supervisor";

/**
 * Configuration, errors, events and domain types
 */
export * from "./types";

/**
 * Individual managers, for callers composing their own supervisor
 */
export {
  ConnectionRegistry,
  HeartbeatProbe,
  HealthScorer,
  RecoveryEngine,
  MetricsAggregator,
  DiagnosticsManager,
  computeHealthScore,
  classifyScore,
  latencyPenalty,
  latencyScore
} from "./managers";
export type {
  ConnectionRegistryOptions,
  HeartbeatProbeOptions,
  HeartbeatMetrics,
  HealthScorerOptions,
  AlertInput,
  RecoveryEngineOptions,
  DiagnosticsManagerOptions,
  DiagnosticsSource
} from "./managers";

/**
 * WebSocket transport adapter and outbound dialer built on `ws`
 */
export { WebSocketTransport, WebSocketDialer } from "./core/websocket-transport";
export type { WebSocketLike, SocketDialOptions, SocketFactory } from "./core/websocket-transport";

/**
 * Utilities
 */
export {
  createPinoLogger,
  BoundedQueue,
  BoundedPriorityQueue,
  QueueOverflowError,
  QueueAbortedError,
  RetryPolicy,
  RetryStrategySchema,
  PeriodicTask,
  AbortedError,
  isAbortedError,
  sleep,
  withTimeout
} from "./utils";
export type { OverflowStrategy, RetryStrategy, RandomSource } from "./utils";

/**
 * Package version string
 */
export const VERSION = "0.1.0";

/**
 * Quick start function to create and start a supervisor
 *
 * @example
 * ```typescript
 * import { createSupervisor } from 'stream-supervisor';
 *
 * const supervisor = createSupervisor({ maxConnections: 2000, logLevel: 'info' });
 * ```
 */
export function createSupervisor(
  config: PartialSupervisorConfig = {},
  dependencies: SupervisorDependencies = {}
): ConnectionSupervisor {
  const supervisor = new ConnectionSupervisor(config, dependencies);
  supervisor.start();
  return supervisor;
}

// Default export for convenience
export default ConnectionSupervisor;
