import { PortFinder } from "../core/port-finder.js";
import { InvalidPortRangeError } from "../types/errors.js";
import { type CommandContext, reportError } from "./shared.js";

/**
 * Parse a port argument. Accepts decimal integers only.
 */
export function parsePort(value: string, label: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidPortRangeError(`${label} port "${value}" is not a number`);
  }
  return Number.parseInt(value, 10);
}

/**
 * scriptsign find-port [startPort] [endPort]
 *
 * Stdout carries the port number and nothing else, so scripts can capture it.
 */
export async function findPortCommand(
  startArg: string | undefined,
  endArg: string | undefined,
  context: CommandContext,
): Promise<number> {
  const { logger, config } = context;

  try {
    const startPort = startArg === undefined ? config.portScan.startPort : parsePort(startArg, "start");
    const endPort = endArg === undefined ? config.portScan.endPort : parsePort(endArg, "end");

    const port = await new PortFinder(config.portScan).findAvailablePort(startPort, endPort);
    if (port === null) {
      logger.error(`No available port between ${startPort} and ${endPort}`);
      return 1;
    }

    logger.print(String(port));
    return 0;
  } catch (error) {
    return reportError(error, logger);
  }
}
