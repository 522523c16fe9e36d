import { describe, it, expect } from "vitest";
import {
  buildClassifierRules,
  defaultCategoryRules,
  defaultPriorityKeywords,
  loadRuleData,
} from "../../../src/triage/rules.js";
import type { RulesConfig } from "../../../src/utils/config.js";

function rulesConfig(overrides: Partial<RulesConfig> = {}): RulesConfig {
  return {
    delete_older_than_days: 90,
    priority_keywords: [],
    priority_senders: [],
    protect_job_related: false,
    strict_duplicate_dates: false,
    ...overrides,
  };
}

describe("shipped rule data", () => {
  it("lists categories in evaluation order", () => {
    expect(defaultCategoryRules().map((rule) => rule.label)).toEqual([
      "Shopping",
      "Store Promos",
      "Dev Tools",
      "Newsletters",
      "Billing & Payments",
      "Finance",
    ]);
  });

  it("includes the built-in priority keywords", () => {
    expect(defaultPriorityKeywords()).toContain("security alert");
    expect(loadRuleData().jobSenders).toContain("linkedin");
  });
});

describe("buildClassifierRules", () => {
  it("extends the built-in priority keywords with configured ones", () => {
    const rules = buildClassifierRules(rulesConfig({ priority_keywords: ["board meeting"] }));

    expect(rules.priorityKeywords.at(-1)).toBe("board meeting");
    expect(rules.priorityKeywords).toHaveLength(defaultPriorityKeywords().length + 1);
  });

  it("replaces built-in lists when configured", () => {
    const rules = buildClassifierRules(
      rulesConfig({
        default_priority_keywords: ["urgent"],
        categories: [{ label: "Receipts", keywords: ["receipt"] }],
      })
    );

    expect(rules.priorityKeywords).toEqual(["urgent"]);
    expect(rules.categoryRules).toEqual([{ label: "Receipts", keywords: ["receipt"] }]);
  });

  it("drops empty sender entries and carries the job protection flag", () => {
    const rules = buildClassifierRules(
      rulesConfig({ priority_senders: ["", "boss@work.example"], protect_job_related: true })
    );

    expect(rules.prioritySenders).toEqual(["boss@work.example"]);
    expect(rules.protectJobRelated).toBe(true);
  });
});
