import { SigningOrchestrator } from "../core/orchestrator.js";
import { SigningClient } from "../core/signing-client.js";
import { NoCertificatesFoundError } from "../types/errors.js";
import { printCertificates } from "./sign.js";
import { type CommandContext, reportError, withServiceUrl } from "./shared.js";

/**
 * scriptsign certs
 */
export async function certsCommand(
  options: { serviceUrl?: string; json?: boolean },
  context: CommandContext,
): Promise<number> {
  const { logger } = context;

  try {
    const config = withServiceUrl(context.config, options.serviceUrl);
    const orchestrator = new SigningOrchestrator(new SigningClient(config.service));

    const certificates = await orchestrator.listCertificates();
    if (certificates.length === 0) {
      throw new NoCertificatesFoundError();
    }

    if (options.json) {
      logger.print(JSON.stringify(certificates, null, 2));
      return 0;
    }

    logger.info("Code-signing certificates:");
    logger.info("");
    printCertificates(certificates, logger);
    return 0;
  } catch (error) {
    return reportError(error, logger);
  }
}
