import { SigningClient, type SigningService } from "../core/signing-client.js";
import { ScriptSignError } from "../types/errors.js";
import { type CommandContext, reportError, withServiceUrl } from "./shared.js";

/**
 * Result of a single health check
 */
export interface CheckResult {
  name: string;
  passed: boolean;
  message: string;
  help?: string;
}

/**
 * Run all health checks against the signing service
 */
export async function runHealthChecks(service: SigningService): Promise<CheckResult[]> {
  const results: CheckResult[] = [];

  // 1. Service reachable
  let available = false;
  let reachable = false;
  try {
    const liveness = await service.checkLiveness();
    reachable = true;
    available = liveness?.available ?? false;
    results.push({
      name: "Signing service",
      passed: true,
      message: `Signing service reachable at ${service.baseUrl}`,
    });
  } catch (error) {
    results.push({
      name: "Signing service",
      passed: false,
      message: error instanceof Error ? error.message : String(error),
      help: error instanceof ScriptSignError && error.help ? error.help() : undefined,
    });
  }

  if (!reachable) {
    results.push({
      name: "Signing runtime",
      passed: false,
      message: "Skipped (signing service unreachable)",
    });
    results.push({
      name: "Certificates",
      passed: false,
      message: "Skipped (signing service unreachable)",
    });
    return results;
  }

  // 2. Runtime available
  results.push({
    name: "Signing runtime",
    passed: available,
    message: available ? "Signing runtime available" : "Signing runtime unavailable",
    help: available ? undefined : "Install or enable the signing runtime, then restart the service",
  });

  // 3. Certificates present
  try {
    const certificates = await service.listCertificates();
    const count = certificates.length;
    results.push({
      name: "Certificates",
      passed: count > 0,
      message:
        count > 0
          ? `${count} code-signing certificate${count === 1 ? "" : "s"} available`
          : "No code-signing certificates found",
      help: count > 0 ? undefined : "Create a code-signing certificate, or sign with --pfx <path>",
    });
  } catch (error) {
    results.push({
      name: "Certificates",
      passed: false,
      message: error instanceof Error ? error.message : String(error),
    });
  }

  return results;
}

/**
 * scriptsign doctor
 */
export async function doctorCommand(
  options: { serviceUrl?: string; json?: boolean },
  context: CommandContext,
): Promise<number> {
  const { logger } = context;

  let results: CheckResult[];
  try {
    const config = withServiceUrl(context.config, options.serviceUrl);
    results = await runHealthChecks(new SigningClient(config.service));
  } catch (error) {
    return reportError(error, logger);
  }

  const passed = results.filter((r) => r.passed).length;
  const total = results.length;

  if (options.json) {
    logger.print(JSON.stringify(results, null, 2));
  } else {
    logger.info("scriptsign Health Check");
    logger.info("=======================\n");

    for (const result of results) {
      if (result.passed) {
        logger.success(result.message);
      } else {
        logger.fail(result.message);
        if (result.help) {
          logger.info(`  → Fix: ${result.help}`);
        }
      }
    }

    logger.info(`\nHealth: ${passed}/${total} checks passed`);
  }

  return passed < total ? 1 : 0;
}
