/**
 * Diagnostic logger. Writes to stderr so stdout stays reserved for
 * operator output and machine-readable results.
 */

import pino, { type Logger, type LoggerOptions } from "pino";
import type { LogConfig } from "../types/config.js";

let loggerInstance: Logger | null = null;

const REDACT_PATHS = ["pfxPassword", "request.pfxPassword"];

const VERBOSE_LEVELS: ReadonlySet<LogConfig["level"]> = new Set(["debug", "info"]);

/**
 * Build pino options for a log config
 */
export function loggerOptions(config: LogConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    redact: REDACT_PATHS,
  };

  // pino-pretty runs in a worker thread; only start it when something below warn can be logged
  if (config.format === "pretty" && VERBOSE_LEVELS.has(config.level)) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        destination: 2,
      },
    };
  }

  return options;
}

/**
 * Create or get the logger instance
 */
export function createLogger(config: LogConfig): Logger {
  if (loggerInstance) {
    return loggerInstance;
  }

  const options = loggerOptions(config);
  loggerInstance = options.transport ? pino(options) : pino(options, pino.destination(2));
  return loggerInstance;
}

/**
 * Get the current logger instance (creates a quiet default if not initialized)
 */
export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = pino({ level: "warn", redact: REDACT_PATHS }, pino.destination(2));
  }
  return loggerInstance;
}

/**
 * Reset the logger instance (for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
