/**
 * Utility for executing remote calls with timeout, bounded retries,
 * exponential backoff and transient error classification.
 */
import type { Logger } from "../utils/logger.js";

export interface ExecutionOptions {
  timeout: number;
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  /** Label used in retry log lines. */
  operation?: string;
}

const TRANSIENT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ECONNABORTED",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

export class ResilientExecutor {
  static async execute<T>(
    fn: () => Promise<T>,
    options: ExecutionOptions,
    logger: Logger,
    sleep: (ms: number) => Promise<void> = delay
  ): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= options.attempts; attempt++) {
      let timer: ReturnType<typeof setTimeout> | undefined;
      try {
        return await Promise.race([
          fn(),
          new Promise<never>((_, reject) => {
            timer = setTimeout(
              () => reject(new Error(`Remote call timed out after ${options.timeout}ms`)),
              options.timeout
            );
          }),
        ]);
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err));

        if (attempt < options.attempts && this.isTransient(err)) {
          const backoffMs = options.baseDelayMs * 2 ** (attempt - 1);
          logger.debug(
            {
              operation: options.operation,
              attempt,
              backoffMs,
              error: lastError.message,
            },
            "Retrying after transient error"
          );
          await sleep(backoffMs);
          continue;
        }

        break;
      } finally {
        clearTimeout(timer);
      }
    }

    throw lastError;
  }

  static isTransient(error: unknown): boolean {
    const status = extractStatus(error);
    if (status !== null) {
      return status === 408 || status === 429 || status >= 500;
    }

    const code = extractCode(error);
    if (code && TRANSIENT_CODES.has(code)) return true;

    const message = error instanceof Error ? error.message.toLowerCase() : "";
    if (message.includes("timeout")) return true;
    if (message.includes("timed out")) return true;
    if (message.includes("socket hang up")) return true;
    if (message.includes("network")) return true;

    return false;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** HTTP status carried by a googleapis (gaxios) or fetch-style error, if any. */
export function extractStatus(err: unknown): number | null {
  if (!isRecord(err)) return null;
  if (isHttpStatus(err.status)) return err.status;
  // DOMException also carries a numeric code (AbortError is 20)
  if (isHttpStatus(err.code)) return err.code;
  if (typeof err.code === "string" && /^\d{3}$/.test(err.code)) {
    const parsed = parseInt(err.code, 10);
    if (isHttpStatus(parsed)) return parsed;
  }
  if (isRecord(err.response) && isHttpStatus(err.response.status)) {
    return err.response.status;
  }
  return null;
}

function isHttpStatus(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 100 && value <= 599;
}

function extractCode(err: unknown): string | null {
  if (!isRecord(err)) return null;
  if (typeof err.code === "string") return err.code;
  if (isRecord(err.cause) && typeof err.cause.code === "string") return err.cause.code;
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
