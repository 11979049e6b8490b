import { createConnection } from "node:net";
import type { Logger } from "pino";
import type { PortScanConfig } from "../types/config.js";
import { InvalidPortRangeError } from "../types/errors.js";
import { getLogger } from "../utils/diagnostics.js";

// =============================================================================
// Types
// =============================================================================

/**
 * What a single connect attempt observed
 */
export type ProbeOutcome = "in-use" | "refused" | "timeout" | "error";

/**
 * How the scan treats a probed port
 */
export type PortVerdict = "occupied" | "free" | "skip";

export type ProbePolicy = (outcome: ProbeOutcome) => PortVerdict;

export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<ProbeOutcome>;

export interface PortFinderOptions {
  probe?: PortProbe;
  policy?: ProbePolicy;
  logger?: Logger;
}

// =============================================================================
// Policies
// =============================================================================

/**
 * Only a successful connect marks a port as taken. Timeouts and socket
 * errors count as free, so a filtered port never stalls or aborts the scan.
 */
export const inconclusiveAsFree: ProbePolicy = (outcome) =>
  outcome === "in-use" ? "occupied" : "free";

/**
 * Only a refused connect marks a port as free; timeouts and errors are skipped.
 */
export const skipInconclusive: ProbePolicy = (outcome) => {
  switch (outcome) {
    case "in-use":
      return "occupied";
    case "refused":
      return "free";
    default:
      return "skip";
  }
};

export function policyFor(setting: PortScanConfig["inconclusive"]): ProbePolicy {
  return setting === "skip" ? skipInconclusive : inconclusiveAsFree;
}

// =============================================================================
// Probe
// =============================================================================

/**
 * Attempt one TCP connection and report what happened. The socket is always destroyed.
 */
export function probePort(host: string, port: number, timeoutMs: number): Promise<ProbeOutcome> {
  return new Promise((resolve) => {
    const socket = createConnection({ host, port });
    let settled = false;

    const finish = (outcome: ProbeOutcome) => {
      if (settled) return;
      settled = true;
      socket.destroy();
      resolve(outcome);
    };

    socket.setTimeout(timeoutMs);
    socket.once("connect", () => finish("in-use"));
    socket.once("timeout", () => finish("timeout"));
    socket.once("error", (error: NodeJS.ErrnoException) => {
      finish(error.code === "ECONNREFUSED" ? "refused" : "error");
    });
  });
}

// =============================================================================
// PortFinder Class
// =============================================================================

/**
 * Finds the lowest port in a range with no listener. Ports are probed one
 * at a time in ascending order.
 */
export class PortFinder {
  private readonly probe: PortProbe;
  private readonly policy: ProbePolicy;
  private readonly logger: Logger;

  constructor(
    private readonly config: PortScanConfig,
    options: PortFinderOptions = {},
  ) {
    this.probe = options.probe ?? probePort;
    this.policy = options.policy ?? policyFor(config.inconclusive);
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Scan [startPort, endPort] inclusive.
   * @returns the first free port, or null when the range is exhausted
   */
  async findAvailablePort(
    startPort: number = this.config.startPort,
    endPort: number = this.config.endPort,
  ): Promise<number | null> {
    assertValidPort(startPort, "start");
    assertValidPort(endPort, "end");

    for (let port = startPort; port <= endPort; port++) {
      const outcome = await this.probe(this.config.host, port, this.config.probeTimeoutMs);
      const verdict = this.policy(outcome);
      this.logger.debug({ port, outcome, verdict }, "probed port");

      if (verdict === "free") {
        return port;
      }
    }

    this.logger.debug({ startPort, endPort }, "port range exhausted");
    return null;
  }
}

function assertValidPort(port: number, label: string): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidPortRangeError(`${label} port ${port} is outside 1-65535`);
  }
}
