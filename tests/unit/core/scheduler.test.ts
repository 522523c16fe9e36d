import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
  SCHEDULE_PRESETS,
  TaskScheduler,
  resolveCronExpression,
} from "../../../src/core/scheduler.js";
import { createMockLogger } from "../../helpers/mocks.js";

describe("resolveCronExpression", () => {
  it("maps presets to 09:00 schedules", () => {
    expect(resolveCronExpression("daily")).toBe("0 9 * * *");
    expect(resolveCronExpression("weekly")).toBe(SCHEDULE_PRESETS.weekly);
  });

  it("prefers an explicit cron expression", () => {
    expect(resolveCronExpression("daily", "30 7 * * 1-5")).toBe("30 7 * * 1-5");
  });
});

describe("TaskScheduler", () => {
  let scheduler: TaskScheduler;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    vi.useFakeTimers();
    logger = createMockLogger();
    scheduler = new TaskScheduler(logger);
  });

  afterEach(() => {
    scheduler.shutdown();
    vi.useRealTimers();
  });

  describe("registerTask", () => {
    it("registers a task and appears in listTasks()", () => {
      scheduler.registerTask({
        name: "triage",
        cronExpression: "0 9 * * *",
        handler: async () => {},
        description: "Daily triage",
      });

      const tasks = scheduler.listTasks();
      expect(tasks).toHaveLength(1);
      expect(tasks[0]!.name).toBe("triage");
      expect(tasks[0]!.cronExpression).toBe("0 9 * * *");
      expect(tasks[0]!.description).toBe("Daily triage");
      expect(tasks[0]!.nextRun).toBeInstanceOf(Date);
      expect(tasks[0]!.running).toBe(false);
    });

    it("replaces existing task with same name", () => {
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler: async () => {} });
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * 1", handler: async () => {} });

      const tasks = scheduler.listTasks();
      expect(tasks).toHaveLength(1);
      expect(tasks[0]!.cronExpression).toBe("0 9 * * 1");
    });
  });

  describe("executeTask", () => {
    it("executes handler and records success", async () => {
      const handler = vi.fn(async () => {});
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler });

      await scheduler.executeTask("triage");

      expect(handler).toHaveBeenCalledOnce();
      const tasks = scheduler.listTasks();
      expect(tasks[0]!.lastResult).toBe("success");
      expect(tasks[0]!.lastDurationMs).toBeGreaterThanOrEqual(0);
      expect(tasks[0]!.lastRun).toBeInstanceOf(Date);
    });

    it("retries once on failure", async () => {
      let callCount = 0;
      const handler = vi.fn(async () => {
        callCount++;
        if (callCount === 1) throw new Error("Gmail hiccup");
      });
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler });

      await scheduler.executeTask("triage");

      expect(handler).toHaveBeenCalledTimes(2);
      expect(scheduler.listTasks()[0]!.lastResult).toBe("success");
    });

    it("records failure after the retry also fails", async () => {
      const handler = vi.fn(async () => {
        throw new Error("Permanent failure");
      });
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler });

      await scheduler.executeTask("triage");

      expect(handler).toHaveBeenCalledTimes(2);
      expect(scheduler.listTasks()[0]!.lastResult).toBe("failure");
      expect(logger.error).toHaveBeenCalledOnce();
    });

    it("skips a run while the previous one is still going", async () => {
      let release: () => void = () => {};
      const handler = vi.fn(
        () =>
          new Promise<void>((resolve) => {
            release = resolve;
          })
      );
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler });

      const first = scheduler.executeTask("triage");
      await scheduler.executeTask("triage");
      release();
      await first;

      expect(handler).toHaveBeenCalledOnce();
      expect(logger.warn).toHaveBeenCalledWith(
        { task: "triage" },
        "Previous run still in progress, skipping"
      );
    });

    it("logs warning for unknown task", async () => {
      await scheduler.executeTask("nonexistent");
      expect(logger.warn).toHaveBeenCalled();
    });
  });

  describe("removeTask", () => {
    it("removes a registered task", () => {
      scheduler.registerTask({ name: "triage", cronExpression: "0 9 * * *", handler: async () => {} });
      scheduler.removeTask("triage");
      expect(scheduler.listTasks()).toHaveLength(0);
    });
  });

  describe("shutdown", () => {
    it("stops all tasks and clears the list", () => {
      scheduler.registerTask({ name: "a", cronExpression: "0 9 * * *", handler: async () => {} });
      scheduler.registerTask({ name: "b", cronExpression: "0 9 * * 1", handler: async () => {} });

      scheduler.shutdown();
      expect(scheduler.listTasks()).toHaveLength(0);
    });
  });
});
