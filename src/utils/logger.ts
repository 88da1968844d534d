/**
 * Logger utility for the connection supervisor
 * Provides pino-based logging with structured output and optional pretty printing
 */

import pino from "pino";
import type { Logger, LogLevel } from "../types";

/**
 * Creates a pino-based logger that conforms to the supervisor Logger interface.
 * Pretty printing is used outside production; silent and test loggers skip the
 * transport so no worker thread is started.
 *
 * @param level - Log level (debug, info, warn, error, silent)
 * @param name - Logger name for identifying log source (e.g., "ConnectionSupervisor", "RecoveryEngine")
 *
 * @example
 * ```typescript
 * const logger = createPinoLogger('info', 'ConnectionSupervisor');
 * logger.info('Connection accepted', { connectionId: 'conn-1', active: 12 });
 * logger.warn('Recovery queue full, dropping request', { connectionId: 'conn-9' });
 * ```
 */
export function createPinoLogger(level: LogLevel, name?: string): Logger {
  const env = process.env.NODE_ENV;
  const pretty = level !== "silent" && env !== "production" && env !== "test";

  const pinoLogger = pino({
    level,
    name: name || "ConnectionSupervisor",
    transport: pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            ignore: "pid,hostname",
            translateTime: "HH:MM:ss.l",
            singleLine: false
          }
        }
      : undefined,
    // Production: fast JSON logs
    formatters:
      env === "production"
        ? {
            level: (label) => {
              return { level: label };
            }
          }
        : undefined
  });

  const write =
    (method: "debug" | "info" | "warn" | "error") =>
    (message: string, data?: unknown): void => {
      if (data === undefined) {
        pinoLogger[method](message);
      } else if (data instanceof Error) {
        pinoLogger[method]({ err: data }, message);
      } else if (typeof data === "object" && data !== null) {
        pinoLogger[method](data, message);
      } else {
        pinoLogger[method]({ data }, message);
      }
    };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error")
  };
}
