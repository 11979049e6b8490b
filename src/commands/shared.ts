import type { Config } from "../types/config.js";
import { ConfigError, ScriptSignError } from "../types/errors.js";
import type { Logger } from "../utils/logger.js";

/**
 * What every command runs with: the loaded config and operator output
 */
export interface CommandContext {
  config: Config;
  logger: Logger;
}

/**
 * Apply a --service-url override for one invocation
 */
export function withServiceUrl(config: Config, serviceUrl?: string): Config {
  if (!serviceUrl) {
    return config;
  }
  if (!isHttpUrl(serviceUrl)) {
    throw new ConfigError(`Invalid service URL: ${serviceUrl}`);
  }
  return { ...config, service: { ...config.service, baseUrl: serviceUrl } };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Report an error consistently.
 * @returns the exit code for an aborted run
 */
export function reportError(error: unknown, logger: Logger): number {
  if (error instanceof ScriptSignError) {
    logger.error(error.message);
    if (error.help) {
      logger.note(`Help: ${error.help()}`);
    }
    return 1;
  }

  if (error instanceof Error) {
    logger.error(error.message);
    return 1;
  }

  logger.error("An unknown error occurred");
  return 1;
}
