/**
 * Structured logging with secret redaction and run context.
 *
 * Redaction policy:
 * - Never logs OAuth tokens or client secrets
 * - Message headers are logged by id only; subjects appear at debug level
 * - All paths listed in `redact.paths` are replaced with "[REDACTED]"
 */
import pino from "pino";
import { getCurrentRunContext } from "../core/correlation.js";

export function createLogger(name?: string) {
  const pretty = process.env.NODE_ENV !== "production";
  const options: pino.LoggerOptions = {
    name: name ?? "mailbox-triage",
    level: process.env.LOG_LEVEL ?? "info",
    serializers: {
      // Pino only serializes Error objects for the `err` key by default.
      // Add `error` so logger.error({ error: someError }) shows message + stack.
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: [
        "accessToken",
        "refreshToken",
        "clientSecret",
        "client_secret",
        "token",
        "*.accessToken",
        "*.refreshToken",
        "*.clientSecret",
        "*.client_secret",
        "*.token",
      ],
      censor: "[REDACTED]",
    },
    mixin() {
      const ctx = getCurrentRunContext();
      if (ctx) {
        return {
          runId: ctx.runId,
          ...(ctx.mode ? { mode: ctx.mode } : {}),
        };
      }
      return {};
    },
    transport: pretty
      ? { target: "pino-pretty", options: { colorize: true, destination: 2 } }
      : undefined,
  };

  // stdout is reserved for command output
  return pretty ? pino(options) : pino(options, pino.destination(2));
}

export type Logger = pino.Logger;
