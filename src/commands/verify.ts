import { SigningOrchestrator, toVerificationReport } from "../core/orchestrator.js";
import { SigningClient } from "../core/signing-client.js";
import { type CommandContext, reportError, withServiceUrl } from "./shared.js";

/**
 * scriptsign verify <script>
 *
 * Unlike the check after signing, a signature that is not Valid fails the run.
 */
export async function verifyCommand(
  script: string,
  options: { serviceUrl?: string },
  context: CommandContext,
): Promise<number> {
  const { logger } = context;

  try {
    const config = withServiceUrl(context.config, options.serviceUrl);
    const orchestrator = new SigningOrchestrator(new SigningClient(config.service));

    const { scriptPath, result } = await orchestrator.verifyExisting(script);
    const report = toVerificationReport(result);

    if (report.ok) {
      logger.success(`${scriptPath}: ${report.status}`);
      return 0;
    }

    logger.fail(`${scriptPath}: ${report.status ?? "unknown"}`);
    logger.error(report.reason);
    return 1;
  } catch (error) {
    return reportError(error, logger);
  }
}
