/**
 * Run context using AsyncLocalStorage.
 * Propagates the runId of a triage pass through the async call stack so
 * every log line of one scan/apply can be grouped together.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export interface RunContext {
  runId: string;
  mode?: string;
  trigger?: "cli" | "schedule";
}

const runContext = new AsyncLocalStorage<RunContext>();

export function withRunContext<T>(
  ctx: RunContext,
  fn: () => Promise<T>
): Promise<T> {
  return runContext.run(ctx, fn);
}

export function getCurrentRunContext(): RunContext | undefined {
  return runContext.getStore();
}

/** base36(timestamp) + "-" + 8 hex chars, so ids sort by start time. */
export function createRunId(): string {
  return `${Date.now().toString(36)}-${randomBytes(4).toString("hex")}`;
}
