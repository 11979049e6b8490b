import { DEFAULT_CONFIG, type Config } from "../../src/types/config.js";
import { Logger, LogLevel } from "../../src/utils/logger.js";

/**
 * A Logger whose stdout/stderr land in arrays
 */
export function captureLogger() {
  const out: string[] = [];
  const err: string[] = [];
  const logger = new Logger(LogLevel.INFO, {
    out: { write: (chunk: string) => out.push(chunk) },
    err: { write: (chunk: string) => err.push(chunk) },
  });

  return {
    logger,
    stdout: () => out.join(""),
    stderr: () => err.join(""),
  };
}

export function configFor(baseUrl: string, overrides: Partial<Config> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    ...overrides,
    service: { ...DEFAULT_CONFIG.service, baseUrl, livenessTimeoutMs: 1000, requestTimeoutMs: 2000 },
  };
}
