/**
 * Manager exports
 * Each class owns one concern of the supervisor
 */

export { ConnectionRegistry, type ConnectionRegistryOptions } from "./connection-registry";
export { HeartbeatProbe, type HeartbeatProbeOptions, type HeartbeatMetrics } from "./heartbeat-probe";
export {
  HealthScorer,
  computeHealthScore,
  classifyScore,
  latencyPenalty,
  type HealthScorerOptions,
  type AlertInput
} from "./health-scorer";
export { RecoveryEngine, latencyScore, type RecoveryEngineOptions } from "./recovery-engine";
export { MetricsAggregator } from "./metrics-aggregator";
export {
  DiagnosticsManager,
  type DiagnosticsManagerOptions,
  type DiagnosticsSource
} from "./diagnostics-manager";
