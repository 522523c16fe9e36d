import { readFileSync } from "node:fs";
import { z } from "zod";
import type { RulesConfig } from "../utils/config.js";
import type { CategoryRule, ClassifierRules } from "./types.js";

const RuleDataSchema = z.object({
  priorityKeywords: z.array(z.string()),
  categories: z.array(z.object({ label: z.string(), keywords: z.array(z.string()) })),
  jobKeywords: z.array(z.string()),
  jobSenders: z.array(z.string()),
  automatedSenderPatterns: z.array(z.string()),
});

export type RuleData = z.infer<typeof RuleDataSchema>;

const RULES_FILE = new URL("../../data/rules.json", import.meta.url);

let cached: RuleData | null = null;

/** Built-in keyword lists shipped in data/rules.json. */
export function loadRuleData(): RuleData {
  if (!cached) {
    cached = RuleDataSchema.parse(JSON.parse(readFileSync(RULES_FILE, "utf-8")));
  }
  return cached;
}

export function defaultCategoryRules(): CategoryRule[] {
  return loadRuleData().categories;
}

export function defaultPriorityKeywords(): string[] {
  return loadRuleData().priorityKeywords;
}

/**
 * Merge the shipped rule data with the `rules` config section.
 * Configured priority keywords extend the built-in list; configured
 * categories and default keywords replace theirs outright.
 */
export function buildClassifierRules(config: RulesConfig): ClassifierRules {
  const data = loadRuleData();
  const builtIn = config.default_priority_keywords ?? data.priorityKeywords;

  return {
    priorityKeywords: [...builtIn, ...config.priority_keywords],
    prioritySenders: config.priority_senders.filter((s) => s.length > 0),
    categoryRules: config.categories ?? data.categories,
    jobKeywords: data.jobKeywords,
    jobSenders: data.jobSenders,
    automatedSenderPatterns: data.automatedSenderPatterns,
    protectJobRelated: config.protect_job_related,
  };
}
