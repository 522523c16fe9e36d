import { describe, it, expect } from "vitest";
import { formatUserFacingError } from "../../../src/interfaces/user-facing-error.js";
import { ConfigError } from "../../../src/utils/config.js";

describe("formatUserFacingError", () => {
  it("prints config errors with their remediation", () => {
    const err = new ConfigError("Gmail OAuth client credentials are not configured", "Set them.");
    expect(formatUserFacingError(err)).toBe(
      "Gmail OAuth client credentials are not configured\n\nSet them."
    );
  });

  it("maps a missing sign-in", () => {
    const err = new Error("No OAuth tokens found. Please run: mailbox-triage login");
    expect(formatUserFacingError(err)).toBe("You are not signed in. Run: mailbox-triage login");
  });

  it("maps revoked tokens", () => {
    expect(formatUserFacingError(new Error("invalid_grant"))).toContain("expired or was revoked");
  });

  it("maps auth failures", () => {
    const err = Object.assign(new Error("Request had invalid authentication"), { status: 401 });
    expect(formatUserFacingError(err)).toContain("rejected the stored credentials");
  });

  it("maps missing permissions", () => {
    const err = Object.assign(new Error("Request had insufficient authentication scopes."), {
      code: 403,
    });
    expect(formatUserFacingError(err)).toContain("gmail.modify");
  });

  it("maps rate limits", () => {
    const err = Object.assign(new Error("User-rate limit exceeded"), { status: 429 });
    expect(formatUserFacingError(err)).toContain("rate limiting");
  });

  it("maps connectivity failures", () => {
    const err = Object.assign(new Error("getaddrinfo ENOTFOUND gmail.googleapis.com"), {
      code: "ENOTFOUND",
    });
    expect(formatUserFacingError(err)).toContain("Could not reach Gmail");
  });

  it("falls back to the error message", () => {
    expect(formatUserFacingError(new Error("unexpected issue"))).toBe(
      "Something went wrong: unexpected issue"
    );
    expect(formatUserFacingError("plain text")).toBe("Something went wrong: plain text");
  });
});
