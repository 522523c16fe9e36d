import { Cron } from "croner";
import type { Logger } from "../utils/logger.js";

export interface ScheduledTaskDef {
  name: string;
  cronExpression: string;
  handler: () => Promise<void>;
  description?: string;
}

export interface TaskMetadata {
  name: string;
  cronExpression: string;
  description?: string;
  lastRun: Date | null;
  lastResult: "success" | "failure" | null;
  lastDurationMs: number | null;
  nextRun: Date | null;
  running: boolean;
}

interface ManagedTask {
  def: ScheduledTaskDef;
  cron: Cron;
  metadata: TaskMetadata;
}

/** Preset schedules: every day or every Monday, at 09:00 local time. */
export const SCHEDULE_PRESETS = {
  daily: "0 9 * * *",
  weekly: "0 9 * * 1",
} as const;

export function resolveCronExpression(
  schedule: keyof typeof SCHEDULE_PRESETS,
  cron?: string
): string {
  return cron ?? SCHEDULE_PRESETS[schedule];
}

/**
 * Cron-based runner for unattended triage passes, using croner.
 * A run that is still going when the next tick fires is skipped, and a
 * failed run is retried once before it is recorded as a failure.
 */
export class TaskScheduler {
  private tasks = new Map<string, ManagedTask>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  registerTask(def: ScheduledTaskDef): void {
    if (this.tasks.has(def.name)) {
      this.logger.warn({ task: def.name }, "Task already registered, replacing");
      this.removeTask(def.name);
    }

    const metadata: TaskMetadata = {
      name: def.name,
      cronExpression: def.cronExpression,
      description: def.description,
      lastRun: null,
      lastResult: null,
      lastDurationMs: null,
      nextRun: null,
      running: false,
    };

    const cron = new Cron(def.cronExpression, { catch: true }, async () => {
      await this.executeTask(def.name);
    });
    metadata.nextRun = cron.nextRun() ?? null;

    this.tasks.set(def.name, { def, cron, metadata });

    this.logger.info(
      { task: def.name, cron: def.cronExpression, nextRun: metadata.nextRun },
      "Scheduled task registered"
    );
  }

  removeTask(taskName: string): void {
    const managed = this.tasks.get(taskName);
    if (managed) {
      managed.cron.stop();
      this.tasks.delete(taskName);
      this.logger.info({ task: taskName }, "Scheduled task removed");
    }
  }

  async executeTask(taskName: string): Promise<void> {
    const managed = this.tasks.get(taskName);
    if (!managed) {
      this.logger.warn({ task: taskName }, "Task not found for execution");
      return;
    }

    if (managed.metadata.running) {
      this.logger.warn({ task: taskName }, "Previous run still in progress, skipping");
      return;
    }

    const startTime = Date.now();
    managed.metadata.lastRun = new Date();
    managed.metadata.running = true;

    const maxAttempts = 2;
    try {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        try {
          await managed.def.handler();
          managed.metadata.lastResult = "success";
          this.logger.info(
            { task: taskName, durationMs: Date.now() - startTime },
            "Scheduled task completed"
          );
          return;
        } catch (err) {
          if (attempt < maxAttempts) {
            this.logger.warn(
              { task: taskName, attempt, error: err },
              "Scheduled task failed, retrying"
            );
            continue;
          }
          managed.metadata.lastResult = "failure";
          this.logger.error(
            { task: taskName, error: err },
            "Scheduled task failed after all retries"
          );
        }
      }
    } finally {
      managed.metadata.running = false;
      managed.metadata.lastDurationMs = Date.now() - startTime;
      managed.metadata.nextRun = managed.cron.nextRun() ?? null;
    }
  }

  listTasks(): TaskMetadata[] {
    return Array.from(this.tasks.values()).map((t) => ({ ...t.metadata }));
  }

  shutdown(): void {
    for (const [name, managed] of this.tasks) {
      managed.cron.stop();
      this.logger.debug({ task: name }, "Scheduled task stopped");
    }
    this.tasks.clear();
    this.logger.info("Task scheduler shut down");
  }
}
