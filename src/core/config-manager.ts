import { readFile } from "node:fs/promises";
import { parse as yamlParse } from "yaml";
import {
  applyEnvOverrides,
  CONFIG_PATHS,
  type Config,
  ConfigSchema,
  DEFAULT_CONFIG,
} from "../types/config.js";
import { ConfigError } from "../types/errors.js";
import { type Logger, logger as defaultLogger } from "../utils/logger.js";
import { fileExists, resolvePath } from "../utils/paths.js";

// =============================================================================
// Types
// =============================================================================

export interface ConfigManagerOptions {
  /** Explicit config file (--config). Must exist and be valid. */
  configPath?: string;
  /** Override search paths for testing */
  configPaths?: readonly string[];
  /** Environment to read overrides from */
  env?: NodeJS.ProcessEnv;
  /** Where warnings about a broken config on the search path go */
  logger?: Logger;
}

// =============================================================================
// ConfigManager Class
// =============================================================================

export class ConfigManager {
  private config: Config | null = null;
  private configPath: string | null = null;
  private readonly explicitPath: string | null;
  private readonly configPaths: readonly string[];
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  private static instance: ConfigManager | null = null;

  constructor(options?: ConfigManagerOptions) {
    this.explicitPath = options?.configPath ? resolvePath(options.configPath) : null;
    this.configPaths = options?.configPaths ?? CONFIG_PATHS;
    this.env = options?.env ?? process.env;
    this.logger = options?.logger ?? defaultLogger;
  }

  /**
   * Get or create the singleton instance
   */
  static getInstance(options?: ConfigManagerOptions): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager(options);
    }
    return ConfigManager.instance;
  }

  /**
   * Initialize the singleton with options (e.g. --config).
   * Must be called before the first getInstance() call.
   */
  static init(options: ConfigManagerOptions): ConfigManager {
    if (ConfigManager.instance) {
      throw new ConfigError("ConfigManager already initialized");
    }
    ConfigManager.instance = new ConfigManager(options);
    return ConfigManager.instance;
  }

  /**
   * Reset singleton (useful for testing)
   */
  static resetInstance(): void {
    ConfigManager.instance = null;
  }

  /**
   * Find the first existing config file from config paths
   */
  private async findConfigFile(): Promise<string | null> {
    for (const path of this.configPaths) {
      const expandedPath = resolvePath(path);
      if (await fileExists(expandedPath)) {
        return expandedPath;
      }
    }
    return null;
  }

  /**
   * Load configuration. An explicit --config file must exist and be valid;
   * a broken file on the search path falls back to defaults with a warning.
   */
  async loadConfig(): Promise<Config> {
    if (this.config) {
      return this.config;
    }

    if (this.explicitPath) {
      if (!(await fileExists(this.explicitPath))) {
        throw new ConfigError(`Config file not found: ${this.explicitPath}`);
      }
      const parsed = await this.readConfigFile(this.explicitPath);
      if (!parsed.success) {
        throw new ConfigError(`Invalid config in ${this.explicitPath}: ${parsed.message}`);
      }
      return this.useConfig(parsed.config, this.explicitPath);
    }

    const configFile = await this.findConfigFile();
    if (!configFile) {
      return this.useConfig(DEFAULT_CONFIG, null);
    }

    const parsed = await this.readConfigFile(configFile);
    if (!parsed.success) {
      this.logger.warn(`Invalid config in ${configFile}, using defaults`);
      this.logger.warn(`  ${parsed.message}`);
      return this.useConfig(DEFAULT_CONFIG, null);
    }
    return this.useConfig(parsed.config, configFile);
  }

  private async readConfigFile(
    path: string,
  ): Promise<{ success: true; config: Config } | { success: false; message: string }> {
    let data: unknown;
    try {
      data = yamlParse(await readFile(path, "utf8"));
    } catch (error) {
      return { success: false, message: error instanceof Error ? error.message : String(error) };
    }

    // An empty file parses to null
    const result = ConfigSchema.safeParse(data ?? {});
    if (!result.success) {
      const message = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join(", ");
      return { success: false, message };
    }
    return { success: true, config: result.data };
  }

  private useConfig(config: Config, path: string | null): Config {
    this.config = applyEnvOverrides(config, this.env);
    this.configPath = path;
    return this.config;
  }

  /**
   * Get the path of the loaded config file, or null if using defaults
   */
  getConfigPath(): string | null {
    return this.configPath;
  }
}

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Get the singleton ConfigManager instance
 */
export function getConfigManager(options?: ConfigManagerOptions): ConfigManager {
  return ConfigManager.getInstance(options);
}
