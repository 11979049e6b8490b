import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { stringify as yamlStringify } from "yaml";
import { ConfigManager, getConfigManager } from "../../../src/core/config-manager.js";
import { applyEnvOverrides, DEFAULT_CONFIG } from "../../../src/types/config.js";
import { ConfigError } from "../../../src/types/errors.js";
import { captureLogger } from "../../helpers/capture.js";

describe("ConfigManager", () => {
  let tempDir: string;

  beforeEach(async () => {
    ConfigManager.resetInstance();
    tempDir = await mkdtemp(join(tmpdir(), "scriptsign-config-test-"));
  });

  afterEach(async () => {
    ConfigManager.resetInstance();
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("singleton", () => {
    test("getInstance returns same instance", () => {
      const instance1 = ConfigManager.getInstance();
      const instance2 = getConfigManager();

      expect(instance1).toBe(instance2);
    });

    test("init refuses to replace an existing instance", () => {
      ConfigManager.init({ configPath: join(tempDir, "a.yml") });

      expect(() => ConfigManager.init({ configPath: join(tempDir, "b.yml") })).toThrow(
        "ConfigManager already initialized",
      );
    });
  });

  describe("loadConfig", () => {
    test("returns DEFAULT_CONFIG when no config file exists", async () => {
      const manager = new ConfigManager({
        configPaths: [join(tempDir, "nonexistent.yml")],
        env: {},
      });

      const config = await manager.loadConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(config.service.baseUrl).toBe("http://localhost:20000");
      expect(config.portScan.startPort).toBe(11000);
      expect(config.portScan.endPort).toBe(12000);
      expect(manager.getConfigPath()).toBeNull();
    });

    test("uses second path if first doesn't exist", async () => {
      const configPath = join(tempDir, "scriptsign.yml");
      await writeFile(
        configPath,
        yamlStringify({
          service: { baseUrl: "http://localhost:20500" },
          portScan: { startPort: 13000, inconclusive: "skip" },
        }),
      );

      const manager = new ConfigManager({
        configPaths: [join(tempDir, "missing.yml"), configPath],
        env: {},
      });
      const config = await manager.loadConfig();

      expect(config.service).toEqual({
        baseUrl: "http://localhost:20500",
        livenessTimeoutMs: 2000,
        requestTimeoutMs: 120000,
      });
      expect(config.portScan).toEqual({
        host: "localhost",
        startPort: 13000,
        endPort: 12000,
        probeTimeoutMs: 200,
        inconclusive: "skip",
      });
      expect(manager.getConfigPath()).toBe(configPath);
    });

    test("treats an empty file as defaults", async () => {
      const configPath = join(tempDir, "empty.yml");
      await writeFile(configPath, "");

      const manager = new ConfigManager({ configPaths: [configPath], env: {} });

      expect(await manager.loadConfig()).toEqual(DEFAULT_CONFIG);
      expect(manager.getConfigPath()).toBe(configPath);
    });

    test("warns and falls back to defaults for an invalid file on the search path", async () => {
      const configPath = join(tempDir, "bad.yml");
      await writeFile(configPath, yamlStringify({ portScan: { startPort: 70000 } }));
      const { logger, stderr } = captureLogger();

      const manager = new ConfigManager({ configPaths: [configPath], env: {}, logger });
      const config = await manager.loadConfig();

      expect(config).toEqual(DEFAULT_CONFIG);
      expect(manager.getConfigPath()).toBeNull();
      expect(stderr().split("\n")[0]).toBe(`[WARN] Invalid config in ${configPath}, using defaults`);
    });

    test("an explicit config file must exist", async () => {
      const configPath = join(tempDir, "custom.yml");
      const manager = new ConfigManager({ configPath, env: {} });

      await expect(manager.loadConfig()).rejects.toThrow(`Config file not found: ${configPath}`);
    });

    test("an explicit config file must be valid", async () => {
      const configPath = join(tempDir, "custom.yml");
      await writeFile(configPath, yamlStringify({ service: { baseUrl: "not a url" } }));
      const manager = new ConfigManager({ configPath, env: {} });

      await expect(manager.loadConfig()).rejects.toBeInstanceOf(ConfigError);
    });

    test("explicit path wins over the search path", async () => {
      const searchPath = join(tempDir, "search.yml");
      const explicitPath = join(tempDir, "explicit.yml");
      await writeFile(searchPath, yamlStringify({ log: { level: "error" } }));
      await writeFile(explicitPath, yamlStringify({ log: { level: "debug", format: "json" } }));

      const manager = new ConfigManager({
        configPath: explicitPath,
        configPaths: [searchPath],
        env: {},
      });

      expect((await manager.loadConfig()).log).toEqual({ level: "debug", format: "json" });
      expect(manager.getConfigPath()).toBe(explicitPath);
    });

    test("applies environment overrides", async () => {
      const manager = new ConfigManager({
        configPaths: [],
        env: { SCRIPTSIGN_SERVICE_URL: "http://10.0.0.5:21000", SCRIPTSIGN_LOG_LEVEL: "info" },
      });

      const config = await manager.loadConfig();

      expect(config.service.baseUrl).toBe("http://10.0.0.5:21000");
      expect(config.log.level).toBe("info");
    });
  });
});

describe("applyEnvOverrides", () => {
  test("ignores an unknown log level", () => {
    const config = applyEnvOverrides(DEFAULT_CONFIG, { SCRIPTSIGN_LOG_LEVEL: "chatty" });

    expect(config.log.level).toBe("warn");
  });

  test("leaves config untouched without variables", () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, {})).toEqual(DEFAULT_CONFIG);
  });
});
