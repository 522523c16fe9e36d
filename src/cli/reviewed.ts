import type { Command } from "commander";
import { ReviewLedger } from "../triage/review-ledger.js";
import { TerminalPrompter, confirm } from "../interfaces/terminal.js";
import type { CliContext } from "./context.js";

export function registerReviewedCommand(program: Command, ctx: CliContext): void {
  const reviewed = program
    .command("reviewed")
    .description("Inspect or reset the list of emails already handled");

  const ledger = () =>
    new ReviewLedger(ctx.config().state.reviewed_path, ctx.logger.child({ component: "ledger" }));

  reviewed
    .command("count")
    .description("How many emails are remembered as reviewed")
    .action(async () => {
      console.log(`${await ledger().count()} emails marked as reviewed.`);
    });

  reviewed
    .command("clear")
    .description("Forget every reviewed email so the next run offers them again")
    .option("-y, --yes", "Do not ask for confirmation")
    .action(async (options: { yes?: boolean }) => {
      if (!options.yes) {
        const prompter = new TerminalPrompter();
        const proceed = await confirm(prompter, "Clear the review history?").finally(() =>
          prompter.close()
        );
        if (!proceed) {
          console.log("Aborted. No changes made.");
          return;
        }
      }
      await ledger().clear();
      console.log("Review history cleared.");
    });
}
