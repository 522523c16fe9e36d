import { InvalidArgumentError, type Command } from "commander";
import { loadConfig } from "../utils/config.js";
import { isTriageMode } from "../triage/orchestrator.js";
import type { AppConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import type { TriageMode } from "../triage/types.js";

/** What every command needs: the parsed config and a logger. */
export interface CliContext {
  logger: Logger;
  config(): AppConfig;
}

export function createCliContext(program: Command, logger: Logger): CliContext {
  let cached: AppConfig | undefined;
  return {
    logger,
    config() {
      cached ??= loadConfig(program.opts<{ config?: string }>().config);
      return cached;
    },
  };
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive whole number.");
  }
  return parsed;
}

export function parseMode(value: string): TriageMode {
  if (!isTriageMode(value)) {
    throw new InvalidArgumentError(
      "Expected one of: all, delete-old, unsubscribe, organize, duplicates."
    );
  }
  return value;
}

/** Progress line on stderr, rewritten in place. */
export function progressPrinter(label: string): (done: number, total: number) => void {
  return (done, total) => {
    if (done % 50 === 0 || done === total) {
      process.stderr.write(`\r  ${label}: ${done}/${total}`);
      if (done === total) process.stderr.write("\n");
    }
  };
}
