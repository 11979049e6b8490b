import { createServer, type Server } from "node:net";
import { afterEach, describe, expect, test } from "vitest";
import { findPortCommand, parsePort } from "../../../src/commands/find-port.js";
import { DEFAULT_CONFIG, type Config } from "../../../src/types/config.js";
import { InvalidPortRangeError } from "../../../src/types/errors.js";
import { captureLogger } from "../../helpers/capture.js";

const config: Config = {
  ...DEFAULT_CONFIG,
  portScan: { ...DEFAULT_CONFIG.portScan, host: "127.0.0.1", probeTimeoutMs: 500 },
};

describe("find-port command", () => {
  let server: Server | null = null;

  afterEach(async () => {
    if (server?.listening) {
      await new Promise<void>((resolve) => server?.close(() => resolve()));
    }
    server = null;
  });

  async function occupyPort(): Promise<number> {
    const s = createServer((socket) => socket.destroy());
    server = s;
    await new Promise<void>((resolve) => s.listen(0, "127.0.0.1", () => resolve()));
    const address = s.address();
    if (address === null || typeof address === "string") {
      throw new Error("no TCP address");
    }
    return address.port;
  }

  test("prints only the port number", async () => {
    const port = await occupyPort();
    await new Promise<void>((resolve) => server?.close(() => resolve()));
    const { logger, stdout, stderr } = captureLogger();

    const code = await findPortCommand(String(port), String(port), { config, logger });

    expect(code).toBe(0);
    expect(stdout()).toBe(`${port}\n`);
    expect(stderr()).toBe("");
  });

  test("exits 1 with nothing on stdout when the range is exhausted", async () => {
    const port = await occupyPort();
    const { logger, stdout, stderr } = captureLogger();

    const code = await findPortCommand(String(port), String(port), { config, logger });

    expect(code).toBe(1);
    expect(stdout()).toBe("");
    expect(stderr()).toBe(`[ERROR] No available port between ${port} and ${port}\n`);
  });

  test("exits 1 for a non-numeric bound", async () => {
    const { logger, stdout, stderr } = captureLogger();

    const code = await findPortCommand("eleven", undefined, { config, logger });

    expect(code).toBe(1);
    expect(stdout()).toBe("");
    expect(stderr()).toBe(
      '[ERROR] Invalid port range: start port "eleven" is not a number\n' +
        "Help: Ports must be whole numbers between 1 and 65535\n",
    );
  });

  test("exits 1 for an out-of-range bound", async () => {
    const { logger, stderr } = captureLogger();

    const code = await findPortCommand("11000", "99999", { config, logger });

    expect(code).toBe(1);
    expect(stderr().split("\n")[0]).toBe("[ERROR] Invalid port range: end port 99999 is outside 1-65535");
  });

  test("an inverted range finds nothing", async () => {
    const { logger, stdout } = captureLogger();

    const code = await findPortCommand("12000", "11000", { config, logger });

    expect(code).toBe(1);
    expect(stdout()).toBe("");
  });
});

describe("parsePort", () => {
  test("parses decimal integers", () => {
    expect(parsePort("11000", "start")).toBe(11000);
    expect(parsePort(" 80 ", "start")).toBe(80);
  });

  test("rejects anything else", () => {
    expect(() => parsePort("1e4", "end")).toThrow(InvalidPortRangeError);
    expect(() => parsePort("-1", "end")).toThrow('end port "-1" is not a number');
    expect(() => parsePort("", "end")).toThrow(InvalidPortRangeError);
  });
});
