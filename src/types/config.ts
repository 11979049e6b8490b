import { z } from "zod";

const PortSchema = z.number().int().min(1).max(65535);

/**
 * Signing service connection settings
 */
export const ServiceConfigSchema = z.object({
  /** Base URL of the local signing service */
  baseUrl: z.string().url().default("http://localhost:20000"),
  /** Timeout for the liveness probe */
  livenessTimeoutMs: z.number().int().positive().default(2000),
  /** Timeout for sign, verify and certificate listing calls */
  requestTimeoutMs: z.number().int().positive().default(120_000),
});

export type ServiceConfig = z.infer<typeof ServiceConfigSchema>;

/**
 * Signing defaults
 */
export const SigningConfigSchema = z.object({
  /** RFC 3161 timestamp server used when --timestamp-server is not given */
  timestampServer: z.string().url().optional(),
});

/**
 * Port scan settings
 */
export const PortScanConfigSchema = z.object({
  host: z.string().default("localhost"),
  startPort: PortSchema.default(11000),
  endPort: PortSchema.default(12000),
  probeTimeoutMs: z.number().int().positive().default(200),
  /** How a probe that neither connected nor was refused counts */
  inconclusive: z.enum(["free", "skip"]).default("free"),
});

export type PortScanConfig = z.infer<typeof PortScanConfigSchema>;

/**
 * Diagnostic logging
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const LogConfigSchema = z.object({
  level: LogLevelSchema.default("warn"),
  /** json for machines, pretty for terminals */
  format: z.enum(["json", "pretty"]).default("pretty"),
});

export type LogConfig = z.infer<typeof LogConfigSchema>;

/**
 * Main configuration schema for scriptsign.yml
 */
export const ConfigSchema = z.object({
  service: ServiceConfigSchema.optional().transform((val) => ServiceConfigSchema.parse(val ?? {})),
  signing: SigningConfigSchema.optional().transform((val) => SigningConfigSchema.parse(val ?? {})),
  portScan: PortScanConfigSchema.optional().transform((val) =>
    PortScanConfigSchema.parse(val ?? {}),
  ),
  log: LogConfigSchema.optional().transform((val) => LogConfigSchema.parse(val ?? {})),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Configuration file paths in order of precedence
 */
export const CONFIG_PATHS = [
  "/etc/scriptsign/config.yml",
  "~/.config/scriptsign/config.yml",
  "./scriptsign.yml",
] as const;

/**
 * Environment variables that override config values
 */
export const ENV_SERVICE_URL = "SCRIPTSIGN_SERVICE_URL";
export const ENV_LOG_LEVEL = "SCRIPTSIGN_LOG_LEVEL";
export const ENV_PFX_PASSWORD = "SCRIPTSIGN_PFX_PASSWORD";

/**
 * Apply environment overrides on top of a parsed config
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv): Config {
  const serviceUrl = env[ENV_SERVICE_URL];
  const logLevel = LogLevelSchema.safeParse(env[ENV_LOG_LEVEL]);

  return {
    ...config,
    service: serviceUrl ? { ...config.service, baseUrl: serviceUrl } : config.service,
    log: logLevel.success ? { ...config.log, level: logLevel.data } : config.log,
  };
}

/**
 * Strip a trailing slash so paths can be appended directly
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}
