#!/usr/bin/env node
import { Command } from "commander";
import { createLogger } from "./utils/logger.js";
import { formatUserFacingError } from "./interfaces/user-facing-error.js";
import { createCliContext } from "./cli/context.js";
import { registerRunCommand } from "./cli/run.js";
import { registerUnsubscribeCommand } from "./cli/unsubscribe.js";
import { registerAutoCommand } from "./cli/auto.js";
import { registerReviewedCommand } from "./cli/reviewed.js";
import { registerAuthCommands } from "./cli/auth.js";

const logger = createLogger();

const program = new Command();

program
  .name("mailbox-triage")
  .description("Clean up a Gmail inbox: trash old mail and duplicates, sort the rest, unsubscribe")
  .version("0.1.0")
  .option("-c, --config <path>", "Config file (default: $CONFIG_PATH or ./config/config.yaml)")
  .showHelpAfterError(true);

const ctx = createCliContext(program, logger);
registerRunCommand(program, ctx);
registerUnsubscribeCommand(program, ctx);
registerAutoCommand(program, ctx);
registerReviewedCommand(program, ctx);
registerAuthCommands(program, ctx);

async function main(): Promise<void> {
  await program.parseAsync(process.argv);
}

main().catch((err) => {
  logger.debug({ error: err }, "Command failed");
  console.error(formatUserFacingError(err));
  process.exitCode = 1;
});
