import { type SigningOutcome, SigningOrchestrator } from "../core/orchestrator.js";
import { SigningClient } from "../core/signing-client.js";
import type { Certificate } from "../types/signing.js";
import type { Logger } from "../utils/logger.js";
import { type CommandContext, reportError, withServiceUrl } from "./shared.js";

export interface SignCommandOptions {
  thumbprint?: string;
  pfx?: string;
  pfxPassword?: string;
  timestampServer?: string;
  serviceUrl?: string;
}

/**
 * scriptsign sign <script>
 * @returns process exit code
 */
export async function signCommand(
  script: string,
  options: SignCommandOptions,
  context: CommandContext,
): Promise<number> {
  const { logger } = context;

  try {
    const config = withServiceUrl(context.config, options.serviceUrl);
    const orchestrator = new SigningOrchestrator(new SigningClient(config.service));

    const outcome = await orchestrator.run({
      scriptPath: script,
      certThumbprint: options.thumbprint,
      pfxPath: options.pfx,
      pfxPassword: options.pfxPassword,
      timestampServer: options.timestampServer ?? config.signing.timestampServer,
    });

    if (outcome.kind === "certificate-choice-required") {
      printCertificateChoice(outcome.certificates, outcome.scriptPath, logger);
      return 0;
    }

    printSigned(outcome, logger);
    return 0;
  } catch (error) {
    return reportError(error, logger);
  }
}

/**
 * Print an inventory as a numbered list, in service order
 */
export function printCertificates(certificates: Certificate[], logger: Logger): void {
  certificates.forEach((cert, index) => {
    logger.info(`  ${index + 1}. ${cert.Subject}`);
    logger.info(`     Thumbprint: ${cert.Thumbprint}`);
    logger.info(`     Expires:    ${String(cert.NotAfter)}`);
  });
}

function printCertificateChoice(certificates: Certificate[], scriptPath: string, logger: Logger): void {
  logger.info("No certificate specified. Available code-signing certificates:");
  logger.info("");
  printCertificates(certificates, logger);
  logger.info("");
  logger.info(`To sign ${scriptPath}, re-run with --thumbprint <thumbprint> or --pfx <path>`);
}

function printSigned(outcome: Extract<SigningOutcome, { kind: "signed" }>, logger: Logger): void {
  const { signature, verification } = outcome;

  logger.success(`Signed ${outcome.scriptPath}`);
  if (signature) {
    logger.info(`  Status:         ${signature.Status}`);
    if (signature.SignedBy) logger.info(`  Signed by:      ${signature.SignedBy}`);
    if (signature.TimeStamper) logger.info(`  Timestamped by: ${signature.TimeStamper}`);
    if (signature.SignatureType) logger.info(`  Signature type: ${signature.SignatureType}`);
  }

  if (verification.ok) {
    logger.success(`Signature verified: ${verification.status}`);
  } else {
    logger.warn(`Signature could not be verified: ${verification.reason}`);
  }
}
