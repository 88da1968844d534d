import { describe, it, expect, vi } from "vitest";
import {
  SupervisorConfigSchema,
  SupervisorConfigBuilder,
  validateConfig,
  resolveConfig,
  safeParseConfig,
  DEFAULT_CONFIG
} from "./config";
import { ConfigurationError } from "./events";

describe("Supervisor Configuration", () => {
  describe("DEFAULT_CONFIG", () => {
    it("should carry the documented defaults", () => {
      expect(DEFAULT_CONFIG).toMatchObject({
        maxConnections: 1000,
        pingInterval: 30000,
        pongTimeout: 90000,
        probeTimeout: 10000,
        heartbeatCleanupInterval: 30000,
        staleConnectionTimeout: 300000,
        staleCleanupInterval: 60000,
        healthThreshold: 0.8,
        unhealthyThreshold: 0.5,
        maxSampleSize: 100,
        aggregateInterval: 30000,
        alertCooldown: 300000,
        maxAlerts: 1000,
        enableRecovery: true,
        maxRetries: 5,
        initialBackoff: 1000,
        maxBackoff: 30000,
        backoffMultiplier: 2,
        jitterEnabled: true,
        recoveryTimeout: 300000,
        handshakeTimeout: 10000,
        recoveryWorkers: 10,
        recoveryQueueCapacity: 1000,
        recoveryHealthCheckInterval: 30000,
        enableDiagnostics: false,
        detailLevel: "standard",
        maxDebugSessions: 10,
        retentionPeriod: 86400000,
        maxLogEntries: 10000,
        diagnosticInterval: 30000,
        logLevel: "info"
      });
    });

    it("should pass its own validation", () => {
      expect(() => validateConfig(DEFAULT_CONFIG)).not.toThrow();
    });
  });

  describe("SupervisorConfigSchema", () => {
    it("should reject a non-positive maxConnections", () => {
      const result = SupervisorConfigSchema.safeParse({ ...DEFAULT_CONFIG, maxConnections: 0 });
      expect(result.success).toBe(false);
    });

    it("should reject an unknown detail level", () => {
      const result = SupervisorConfigSchema.safeParse({ ...DEFAULT_CONFIG, detailLevel: "loud" });
      expect(result.success).toBe(false);
    });

    it("should accept any object exposing the four log methods as logger", () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const result = SupervisorConfigSchema.safeParse({ ...DEFAULT_CONFIG, logger });
      expect(result.success).toBe(true);
    });

    it("should reject a logger missing a method", () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
      const result = SupervisorConfigSchema.safeParse({ ...DEFAULT_CONFIG, logger });
      expect(result.success).toBe(false);
    });
  });

  describe("validateConfig", () => {
    it("should throw ConfigurationError with issue paths on schema failure", () => {
      try {
        validateConfig({ ...DEFAULT_CONFIG, maxRetries: 0 });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        if (error instanceof ConfigurationError) {
          expect(error.message).toBe("Invalid supervisor configuration");
          expect(error.details).toEqual({
            issues: [{ path: "maxRetries", message: expect.any(String) }]
          });
        }
      }
    });

    it("should require unhealthyThreshold below healthThreshold", () => {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, healthThreshold: 0.5, unhealthyThreshold: 0.5 })
      ).toThrow("unhealthyThreshold must be lower than healthThreshold");
    });

    it("should require maxBackoff >= initialBackoff", () => {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, initialBackoff: 5000, maxBackoff: 4000 })
      ).toThrow("maxBackoff must be greater than or equal to initialBackoff");
    });

    it("should require pongTimeout > pingInterval", () => {
      expect(() =>
        validateConfig({ ...DEFAULT_CONFIG, pingInterval: 30000, pongTimeout: 30000 })
      ).toThrow("pongTimeout must be greater than pingInterval");
    });
  });

  describe("resolveConfig", () => {
    it("should merge a partial config over the defaults", () => {
      const config = resolveConfig({ maxConnections: 50, logLevel: "silent" });
      expect(config.maxConnections).toBe(50);
      expect(config.logLevel).toBe("silent");
      expect(config.pingInterval).toBe(DEFAULT_CONFIG.pingInterval);
    });

    it("should ignore keys explicitly set to undefined", () => {
      const config = resolveConfig({ maxRetries: undefined });
      expect(config.maxRetries).toBe(5);
    });
  });

  describe("safeParseConfig", () => {
    it("should return data on success", () => {
      const result = safeParseConfig(DEFAULT_CONFIG);
      expect(result.success).toBe(true);
      expect(result.data?.maxConnections).toBe(1000);
    });

    it("should return the ConfigurationError on failure", () => {
      const result = safeParseConfig({ ...DEFAULT_CONFIG, maxBackoff: 10, initialBackoff: 20 });
      expect(result.success).toBe(false);
      expect(result.error).toBeInstanceOf(ConfigurationError);
    });
  });

  describe("SupervisorConfigBuilder", () => {
    it("should build the defaults when nothing is set", () => {
      expect(new SupervisorConfigBuilder().build()).toEqual(DEFAULT_CONFIG);
    });

    it("should apply every group of settings", () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const config = new SupervisorConfigBuilder()
        .withMaxConnections(5000)
        .withHeartbeat({ pingInterval: 15000, pongTimeout: 45000, cleanupInterval: 5000 })
        .withHealthScoring({ healthThreshold: 0.9, unhealthyThreshold: 0.6 })
        .withRecovery({ maxRetries: 8, initialBackoff: 500, jitter: false, workers: 4 })
        .withDiagnostics({ detailLevel: "verbose", networkTracing: true })
        .withStaleConnectionCleanup(120000, 10000)
        .withLogging("debug", logger)
        .build();

      expect(config).toMatchObject({
        maxConnections: 5000,
        pingInterval: 15000,
        pongTimeout: 45000,
        heartbeatCleanupInterval: 5000,
        healthThreshold: 0.9,
        unhealthyThreshold: 0.6,
        maxRetries: 8,
        initialBackoff: 500,
        jitterEnabled: false,
        recoveryWorkers: 4,
        enableDiagnostics: true,
        enableNetworkTracing: true,
        detailLevel: "verbose",
        staleConnectionTimeout: 120000,
        staleCleanupInterval: 10000,
        logLevel: "debug"
      });
      expect(config.logger).toBe(logger);
    });

    it("should toggle recovery and diagnostics with booleans", () => {
      const config = new SupervisorConfigBuilder()
        .withRecovery(false)
        .withDiagnostics(true)
        .build();
      expect(config.enableRecovery).toBe(false);
      expect(config.enableDiagnostics).toBe(true);
    });

    it("should reject out-of-range values immediately", () => {
      expect(() => new SupervisorConfigBuilder().withMaxConnections(-1)).toThrow();
      expect(() => new SupervisorConfigBuilder().withHeartbeat({ failureThreshold: 0 })).toThrow();
    });

    it("should check cross-field constraints at build", () => {
      const builder = new SupervisorConfigBuilder().withHeartbeat({
        pingInterval: 60000,
        pongTimeout: 30000
      });
      expect(() => builder.build()).toThrow(ConfigurationError);
    });
  });
});
