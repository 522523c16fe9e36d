import type { Command } from "commander";
import { createTriageApp } from "../app.js";
import { createRunId, withRunContext } from "../core/correlation.js";
import { previewReport } from "../triage/orchestrator.js";
import { PromptDecisionSource, TerminalPrompter, confirm } from "../interfaces/terminal.js";
import {
  formatApplyReport,
  formatCategoryBreakdown,
  formatScanSummary,
  formatUnsubscribeReport,
} from "../interfaces/report.js";
import { parseMode, parsePositiveInt, progressPrinter, type CliContext } from "./context.js";
import type { AppConfig } from "../utils/config.js";
import type { DecisionSource } from "../triage/decisions.js";
import type { TriageMode } from "../triage/types.js";

interface RunCommandOptions {
  mode: TriageMode;
  dryRun?: boolean;
  days?: number;
  yes?: boolean;
}

const UNSUBSCRIBE_PREVIEW = 5;

export function withAgeThreshold(config: AppConfig, days?: number): AppConfig {
  if (days === undefined) return config;
  return { ...config, rules: { ...config.rules, delete_older_than_days: days } };
}

export function registerRunCommand(program: Command, ctx: CliContext): void {
  program
    .command("run")
    .description("Scan the inbox, then trash, label or star what it finds")
    .option("-m, --mode <mode>", "all | delete-old | unsubscribe | organize | duplicates", parseMode, "all")
    .option("--dry-run", "Report what would change without touching the mailbox")
    .option("--days <n>", "Trash emails at least this many days old", parsePositiveInt)
    .option("-y, --yes", "Apply the configured category actions without prompting")
    .action(async (options: RunCommandOptions) => {
      const config = withAgeThreshold(ctx.config(), options.days);
      const runId = createRunId();
      await withRunContext({ runId, mode: options.mode, trigger: "cli" }, () =>
        runTriage(ctx, config, options)
      );
    });
}

async function runTriage(ctx: CliContext, config: AppConfig, options: RunCommandOptions): Promise<void> {
  const { orchestrator, policy } = createTriageApp(config, ctx.logger);
  const dryRun = options.dryRun ?? false;

  console.log(`Scanning (${options.mode})...`);
  const scan = await orchestrator.scan({
    mode: options.mode,
    onProgress: progressPrinter("Fetching metadata"),
  });

  console.log("");
  console.log(formatScanSummary(scan));
  console.log("");
  console.log(formatCategoryBreakdown(scan));
  if (scan.newsletterItems.length > 0) {
    console.log("");
    console.log(formatUnsubscribeReport(scan.newsletterItems, UNSUBSCRIBE_PREVIEW));
  }
  console.log("");

  const interactive = !dryRun && !options.yes;
  const prompter = interactive ? new TerminalPrompter() : null;
  try {
    const source: DecisionSource = prompter
      ? new PromptDecisionSource(prompter, (category) => policy.defaultFor(category))
      : policy;

    const decisions = await orchestrator.collectDecisions(scan, source);
    if (decisions === null) {
      console.log("Aborted. No changes made.");
      return;
    }

    const plan = orchestrator.plan(scan, decisions);
    if (dryRun) {
      console.log(formatApplyReport(previewReport(plan)));
      return;
    }

    const preview = previewReport(plan);
    console.log(
      `Plan: trash ${preview.trashedCount}, label ${preview.labeledCount}, ` +
        `star ${preview.starredCount}, skip ${preview.skippedCount}.`
    );
    if (prompter && !(await confirm(prompter, "Apply these changes?"))) {
      console.log("Aborted. No changes made.");
      return;
    }

    const report = await orchestrator.applyPlan(plan);
    console.log(formatApplyReport(report));
  } finally {
    prompter?.close();
  }
}
