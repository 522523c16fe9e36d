import type {
  ClassifierRules,
  Message,
  MessageHeader,
  ScanResult,
} from "../../src/triage/types.js";

export const NOW = new Date("2026-03-15T12:00:00Z");

export interface HeaderFields {
  subject?: string;
  from?: string;
  date?: string;
  messageId?: string;
  listUnsubscribe?: string;
  listUnsubscribePost?: string;
  listId?: string;
  precedence?: string;
}

export function createHeaders(fields: HeaderFields = {}): MessageHeader[] {
  const headers: MessageHeader[] = [
    { name: "Subject", value: fields.subject ?? "Hello" },
    { name: "From", value: fields.from ?? "Alice <alice@example.com>" },
    { name: "Date", value: fields.date ?? "Sun, 15 Mar 2026 10:00:00 +0000" },
  ];
  if (fields.messageId !== undefined) headers.push({ name: "Message-ID", value: fields.messageId });
  if (fields.listUnsubscribe !== undefined) {
    headers.push({ name: "List-Unsubscribe", value: fields.listUnsubscribe });
  }
  if (fields.listUnsubscribePost !== undefined) {
    headers.push({ name: "List-Unsubscribe-Post", value: fields.listUnsubscribePost });
  }
  if (fields.listId !== undefined) headers.push({ name: "List-Id", value: fields.listId });
  if (fields.precedence !== undefined) headers.push({ name: "Precedence", value: fields.precedence });
  return headers;
}

export function createMessage(id: string, fields: HeaderFields = {}): Message {
  return { id, headers: createHeaders(fields) };
}

/** Small, predictable rule set so tests don't depend on the shipped lists. */
export function createTestRules(overrides: Partial<ClassifierRules> = {}): ClassifierRules {
  return {
    priorityKeywords: ["urgent", "invoice"],
    prioritySenders: ["boss@work.example"],
    categoryRules: [
      { label: "Shopping", keywords: ["your order", "receipt"] },
      { label: "Promos", keywords: ["% off", "sale"] },
      { label: "Dev Tools", keywords: ["github"] },
    ],
    jobKeywords: ["interview", "recruiter"],
    jobSenders: ["jobs.example"],
    automatedSenderPatterns: ["no-reply", "noreply"],
    protectJobRelated: false,
    ...overrides,
  };
}

export function createScan(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    toTrash: [],
    toPriority: [],
    categoryGroups: new Map(),
    duplicateGroups: [],
    duplicateIds: [],
    newsletterItems: [],
    skippedReviewed: 0,
    personalCount: 0,
    scannedCount: 0,
    deleteOlderThanDays: 90,
    scope: ["priority", "expired", "duplicates", "newsletters", "categories"],
    ...overrides,
  };
}

export function ids(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}
