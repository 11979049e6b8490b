#!/usr/bin/env node
import { Command } from "commander";
import { certsCommand } from "./commands/certs.js";
import { doctorCommand } from "./commands/doctor.js";
import { findPortCommand } from "./commands/find-port.js";
import { type CommandContext, reportError } from "./commands/shared.js";
import { type SignCommandOptions, signCommand } from "./commands/sign.js";
import { verifyCommand } from "./commands/verify.js";
import { ConfigManager, getConfigManager } from "./core/config-manager.js";
import { ENV_PFX_PASSWORD } from "./types/config.js";
import { createLogger } from "./utils/diagnostics.js";
import { LogLevel, logger } from "./utils/logger.js";

interface GlobalOptions {
  config?: string;
  debug?: boolean;
}

const program = new Command();

program
  .name("scriptsign")
  .description("Sign and verify scripts through a local code-signing service")
  .version("1.0.0")
  .option("-c, --config <path>", "Path to config file")
  .option("--debug", "Write diagnostic logs to stderr")
  .hook("preAction", (thisCommand) => {
    // Initialize ConfigManager with custom path if provided
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.config) {
      ConfigManager.init({ configPath: opts.config });
    }
  });

/**
 * Load config, set up diagnostics, then run a command and record its exit code
 */
async function run(command: (context: CommandContext) => Promise<number>): Promise<void> {
  let context: CommandContext;
  try {
    const manager = getConfigManager();
    const config = await manager.loadConfig();
    const debug = program.opts<GlobalOptions>().debug;
    if (debug) {
      logger.setLevel(LogLevel.DEBUG);
    }
    createLogger(debug ? { ...config.log, level: "debug" } : config.log);
    logger.debug(`Config: ${manager.getConfigPath() ?? "built-in defaults"}`);
    context = { config, logger };
  } catch (error) {
    process.exitCode = reportError(error, logger);
    return;
  }

  process.exitCode = await command(context);
}

program
  .command("sign")
  .description("Sign a script, then verify the signature")
  .argument("<script>", "Path to the script to sign")
  .option("-t, --thumbprint <thumbprint>", "Thumbprint of a certificate in the certificate store")
  .option("--pfx <path>", "PFX file holding the signing certificate and key")
  .option("--pfx-password <password>", `PFX password (or set ${ENV_PFX_PASSWORD})`)
  .option("--timestamp-server <url>", "Timestamp server URL")
  .option("--service-url <url>", "Signing service base URL")
  .action(async (script: string, options: SignCommandOptions) => {
    const pfxPassword = options.pfxPassword ?? process.env[ENV_PFX_PASSWORD];
    await run((context) => signCommand(script, { ...options, pfxPassword }, context));
  });

program
  .command("verify")
  .description("Verify the signature of a script")
  .argument("<script>", "Path to the script to verify")
  .option("--service-url <url>", "Signing service base URL")
  .action(async (script: string, options: { serviceUrl?: string }) => {
    await run((context) => verifyCommand(script, options, context));
  });

program
  .command("certs")
  .description("List code-signing certificates known to the signing service")
  .option("--service-url <url>", "Signing service base URL")
  .option("--json", "Output certificates as JSON")
  .action(async (options: { serviceUrl?: string; json?: boolean }) => {
    await run((context) => certsCommand(options, context));
  });

program
  .command("doctor")
  .description("Check that the signing service is ready")
  .option("--service-url <url>", "Signing service base URL")
  .option("--json", "Output results as JSON")
  .action(async (options: { serviceUrl?: string; json?: boolean }) => {
    await run((context) => doctorCommand(options, context));
  });

program
  .command("find-port")
  .description("Print the first TCP port with no listener")
  .argument("[startPort]", "First port to try")
  .argument("[endPort]", "Last port to try")
  .action(async (startPort: string | undefined, endPort: string | undefined) => {
    await run((context) => findPortCommand(startPort, endPort, context));
  });

await program.parseAsync();
