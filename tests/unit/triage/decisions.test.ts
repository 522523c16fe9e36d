import { describe, it, expect } from "vitest";
import { PolicyDecisionSource } from "../../../src/triage/decisions.js";

describe("PolicyDecisionSource", () => {
  it("uses per-category overrides, then the default", async () => {
    const policy = new PolicyDecisionSource({ default: "label", overrides: { Promos: "delete" } });

    expect(await policy.decide("Promos")).toBe("delete");
    expect(await policy.decide("Shopping")).toBe("label");
    expect(policy.defaultFor("Promos")).toBe("delete");
  });
});
