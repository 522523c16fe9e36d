import type { Command } from "commander";
import { createTriageApp } from "../app.js";
import { createRunId, withRunContext } from "../core/correlation.js";
import { TerminalPrompter, confirm } from "../interfaces/terminal.js";
import { formatUnsubscribeReport, formatUnsubscribeResult } from "../interfaces/report.js";
import { progressPrinter, type CliContext } from "./context.js";

export function registerUnsubscribeCommand(program: Command, ctx: CliContext): void {
  program
    .command("unsubscribe")
    .description("List newsletter unsubscribe links and try each one")
    .option("--dry-run", "Only list the links")
    .option("-y, --yes", "Attempt every link without asking")
    .action(async (options: { dryRun?: boolean; yes?: boolean }) => {
      await withRunContext({ runId: createRunId(), mode: "unsubscribe", trigger: "cli" }, async () => {
        const { orchestrator } = createTriageApp(ctx.config(), ctx.logger);
        const scan = await orchestrator.scan({
          mode: "unsubscribe",
          onProgress: progressPrinter("Fetching metadata"),
        });

        console.log(formatUnsubscribeReport(scan.newsletterItems));
        if (options.dryRun || scan.newsletterItems.length === 0) return;

        if (!options.yes) {
          const prompter = new TerminalPrompter();
          const proceed = await confirm(
            prompter,
            `Attempt to unsubscribe from ${scan.newsletterItems.length} senders?`
          ).finally(() => prompter.close());
          if (!proceed) {
            console.log("Aborted. No changes made.");
            return;
          }
        }

        const results = await orchestrator.unsubscribe(scan, { dryRun: false }, (item, result) => {
          console.log(formatUnsubscribeResult(item, result));
        });
        const ok = results.filter(({ result }) => result.status === "ok").length;
        const manual = results.filter(({ result }) => result.status === "manual").length;
        console.log(`\nUnsubscribed ${ok}, ${manual} need a manual visit, ${results.length - ok - manual} failed.`);
      });
    });
}
