import { getHeader, parseMessageDate } from "./headers.js";
import { extractUnsubscribeLinks } from "./unsubscribe.js";
import { defaultCategoryRules, defaultPriorityKeywords, loadRuleData } from "./rules.js";
import type {
  CategoryRule,
  ClassificationResult,
  ClassifierRules,
  MessageHeader,
} from "./types.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const BULK_PRECEDENCE = new Set(["bulk", "list", "junk"]);

export { getHeader, parseMessageDate };

/**
 * Rules-based classification. No network, no body parsing.
 *
 * Priority checks:
 * 1. Configured priority senders (substring of From)
 * 2. Built-in + configured keywords (substring of Subject)
 */
export function isPriority(
  headers: readonly MessageHeader[],
  extraKeywords: readonly string[] = [],
  prioritySenders: readonly string[] = [],
  builtInKeywords: readonly string[] = defaultPriorityKeywords()
): boolean {
  const subject = getHeader(headers, "Subject").toLowerCase();
  const sender = getHeader(headers, "From").toLowerCase();

  for (const s of prioritySenders) {
    if (s && sender.includes(s.toLowerCase())) {
      return true;
    }
  }

  for (const keyword of [...builtInKeywords, ...extraKeywords]) {
    if (keyword && subject.includes(keyword.toLowerCase())) {
      return true;
    }
  }

  return false;
}

export function isNewsletter(headers: readonly MessageHeader[]): boolean {
  return getHeader(headers, "List-Unsubscribe").trim().length > 0;
}

export function isJobEmail(
  headers: readonly MessageHeader[],
  keywords: readonly string[] = loadRuleData().jobKeywords,
  senders: readonly string[] = loadRuleData().jobSenders
): boolean {
  const combined = subjectAndSender(headers);
  return (
    keywords.some((k) => combined.includes(k)) ||
    senders.some((s) => combined.includes(s))
  );
}

/** True when the mail looks like it was written directly by a person. */
export function isPersonalEmail(
  headers: readonly MessageHeader[],
  automatedPatterns: readonly string[] = loadRuleData().automatedSenderPatterns
): boolean {
  // Any list header means bulk mail
  if (getHeader(headers, "List-Unsubscribe")) return false;
  if (getHeader(headers, "List-Id")) return false;

  const precedence = getHeader(headers, "Precedence").trim().toLowerCase();
  if (BULK_PRECEDENCE.has(precedence)) return false;

  const sender = getHeader(headers, "From").toLowerCase();
  return !automatedPatterns.some((p) => sender.includes(p));
}

/**
 * Evaluate category rules in declaration order against subject + sender.
 * Earlier rules win when keyword sets overlap.
 */
export function categorize(
  headers: readonly MessageHeader[],
  rules: readonly CategoryRule[] = defaultCategoryRules()
): string | null {
  const combined = subjectAndSender(headers);

  for (const rule of rules) {
    if (rule.keywords.some((k) => combined.includes(k.toLowerCase()))) {
      return rule.label;
    }
  }
  return null;
}

/** Whole days since the Date header; 0 when absent, unparsable or in the future. */
export function getAgeDays(headers: readonly MessageHeader[], now: Date = new Date()): number {
  const date = parseMessageDate(getHeader(headers, "Date"));
  if (!date) return 0;
  const days = Math.floor((now.getTime() - date.getTime()) / MS_PER_DAY);
  return days > 0 ? days : 0;
}

export function classify(
  headers: readonly MessageHeader[],
  rules: ClassifierRules,
  now: Date = new Date()
): ClassificationResult {
  const isJobRelated = isJobEmail(headers, rules.jobKeywords, rules.jobSenders);
  const priority =
    isPriority(headers, [], rules.prioritySenders, rules.priorityKeywords) ||
    (rules.protectJobRelated && isJobRelated);

  return {
    isPriority: priority,
    isNewsletter: isNewsletter(headers),
    isJobRelated,
    isPersonal: isPersonalEmail(headers, rules.automatedSenderPatterns),
    category: categorize(headers, rules.categoryRules),
    ageDays: getAgeDays(headers, now),
    unsubscribe: extractUnsubscribeLinks(headers),
  };
}

function subjectAndSender(headers: readonly MessageHeader[]): string {
  const subject = getHeader(headers, "Subject").toLowerCase();
  const sender = getHeader(headers, "From").toLowerCase();
  return `${subject} ${sender}`;
}
