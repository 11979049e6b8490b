import { afterEach, describe, expect, test } from "vitest";
import { DEFAULT_CONFIG } from "../../../src/types/config.js";
import { createLogger, getLogger, loggerOptions, resetLogger } from "../../../src/utils/diagnostics.js";
import { Logger, LogLevel } from "../../../src/utils/logger.js";

function sinks() {
  const out: string[] = [];
  const err: string[] = [];
  return {
    streams: {
      out: { write: (chunk: string) => out.push(chunk) },
      err: { write: (chunk: string) => err.push(chunk) },
    },
    out,
    err,
  };
}

describe("Logger", () => {
  test("routes messages to stdout or stderr", () => {
    const { streams, out, err } = sinks();
    const logger = new Logger(LogLevel.DEBUG, streams);

    logger.debug("probing");
    logger.info("listing");
    logger.warn("careful");
    logger.error("failed");
    logger.success("done");
    logger.fail("not done");
    logger.note("Help: retry");
    logger.print("11000");

    expect(out).toEqual(["listing\n", "✓ done\n", "✗ not done\n", "11000\n"]);
    expect(err).toEqual(["[DEBUG] probing\n", "[WARN] careful\n", "[ERROR] failed\n", "Help: retry\n"]);
  });

  test("drops messages below the level", () => {
    const { streams, out, err } = sinks();
    const logger = new Logger(LogLevel.ERROR, streams);

    logger.debug("a");
    logger.info("b");
    logger.warn("c");
    logger.error("d");
    logger.print("e");

    expect(out).toEqual(["e\n"]);
    expect(err).toEqual(["[ERROR] d\n"]);
  });

  test("setLevel takes effect immediately", () => {
    const { streams, err } = sinks();
    const logger = new Logger(LogLevel.INFO, streams);

    logger.debug("hidden");
    logger.setLevel(LogLevel.DEBUG);
    logger.debug("shown");

    expect(err).toEqual(["[DEBUG] shown\n"]);
  });
});

describe("diagnostics", () => {
  afterEach(() => {
    resetLogger();
  });

  test("pretty format uses the pino-pretty transport on stderr", () => {
    const options = loggerOptions({ level: "info", format: "pretty" });

    expect(options.level).toBe("info");
    expect(options.transport).toEqual({
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    });
  });

  test("pretty format at warn and above writes plain JSON without a transport", () => {
    expect(loggerOptions({ level: "warn", format: "pretty" }).transport).toBeUndefined();
    expect(loggerOptions({ level: "error", format: "pretty" }).transport).toBeUndefined();
  });

  test("json format has no transport and redacts PFX passwords", () => {
    const options = loggerOptions({ level: "debug", format: "json" });

    expect(options.transport).toBeUndefined();
    expect(options.redact).toEqual(["pfxPassword", "request.pfxPassword"]);
  });

  test("createLogger keeps the first instance until reset", () => {
    const first = createLogger({ ...DEFAULT_CONFIG.log, format: "json", level: "error" });
    const second = createLogger({ ...DEFAULT_CONFIG.log, format: "json", level: "debug" });

    expect(second).toBe(first);
    expect(getLogger().level).toBe("error");

    resetLogger();
    expect(createLogger({ level: "debug", format: "json" }).level).toBe("debug");
  });

  test("getLogger defaults to warn", () => {
    expect(getLogger().level).toBe("warn");
  });
});
