import type { Command } from "commander";
import { createTriageApp } from "../app.js";
import { createRunId, withRunContext } from "../core/correlation.js";
import { TaskScheduler, resolveCronExpression } from "../core/scheduler.js";
import type { CliContext } from "./context.js";

export function registerAutoCommand(program: Command, ctx: CliContext): void {
  program
    .command("auto")
    .description("Run unattended triage passes on the configured schedule")
    .option("--now", "Also run one pass immediately")
    .action(async (options: { now?: boolean }) => {
      const config = ctx.config();
      const logger = ctx.logger;
      const { orchestrator, policy } = createTriageApp(config, logger);
      const scheduler = new TaskScheduler(logger.child({ component: "scheduler" }));

      const pass = () =>
        withRunContext({ runId: createRunId(), mode: "all", trigger: "schedule" }, async () => {
          const scan = await orchestrator.scan({ mode: "all" });
          const report = await orchestrator.resolveAndApply(scan, policy, { dryRun: false });
          logger.info({ ...report }, "Scheduled triage pass finished");
        });

      const cronExpression = resolveCronExpression(config.automation.schedule, config.automation.cron);
      scheduler.registerTask({
        name: "triage",
        cronExpression,
        handler: pass,
        description: "Scan and apply the configured category actions",
      });
      for (const task of scheduler.listTasks()) {
        console.log(`Next ${task.name} pass: ${task.nextRun?.toLocaleString() ?? "never"}`);
      }

      if (options.now) {
        await scheduler.executeTask("triage");
      }

      await new Promise<void>((resolve) => {
        const shutdown = (signal: string) => {
          logger.info({ signal }, "Received shutdown signal");
          scheduler.shutdown();
          resolve();
        };
        process.once("SIGTERM", () => shutdown("SIGTERM"));
        process.once("SIGINT", () => shutdown("SIGINT"));
      });
    });
}
