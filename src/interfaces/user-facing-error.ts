import { ConfigError } from "../utils/config.js";
import { extractStatus } from "../core/resilient-executor.js";

/**
 * Convert internal errors into concise terminal messages with a next step.
 * Avoids printing stack traces, tokens, or raw API payloads.
 */
export function formatUserFacingError(err: unknown): string {
  if (err instanceof ConfigError) {
    return err.remediation ? `${err.message}\n\n${err.remediation}` : err.message;
  }

  const statusCode = extractStatus(err);
  const msg = extractMessage(err).toLowerCase();

  if (msg.includes("no oauth tokens found")) {
    return "You are not signed in. Run: mailbox-triage login";
  }

  if (
    msg.includes("invalid_grant") ||
    msg.includes("token has been expired or revoked") ||
    msg.includes("failed to refresh access token")
  ) {
    return "Your Gmail sign-in has expired or was revoked. Run: mailbox-triage login";
  }

  if (statusCode === 401 || msg.includes("invalid credentials") || msg.includes("unauthorized")) {
    return "Gmail rejected the stored credentials. Run: mailbox-triage login";
  }

  if (statusCode === 403 && msg.includes("insufficient")) {
    return "The Gmail sign-in is missing the gmail.modify permission. Run: mailbox-triage login";
  }

  if (statusCode === 429 || msg.includes("rate limit") || msg.includes("quota")) {
    return "Gmail is rate limiting this account. Please try again in a few minutes.";
  }

  if (
    msg.includes("timeout") ||
    msg.includes("timed out") ||
    msg.includes("econnreset") ||
    msg.includes("enotfound") ||
    msg.includes("econnrefused") ||
    (statusCode !== null && statusCode >= 500)
  ) {
    return "Could not reach Gmail right now. Check your connection and try again.";
  }

  return `Something went wrong: ${extractMessage(err) || "unknown error"}`;
}

function extractMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (!err || typeof err !== "object") return String(err ?? "");

  if ("message" in err && typeof err.message === "string") return err.message;
  return String(err);
}
