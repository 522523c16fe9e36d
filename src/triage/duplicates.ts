import { getHeader, parseMessageDate } from "./headers.js";
import type { DuplicateGroup, Message } from "./types.js";

const MS_PER_MINUTE = 60_000;

export interface DuplicateOptions {
  /**
   * When false (the default), a message whose Date cannot be parsed is
   * keyed on sender + subject alone, which can merge unrelated mail from
   * one automated sender. When true such messages are never grouped.
   */
  strictDates?: boolean;
}

/**
 * Detect duplicate messages using two strategies:
 *   1. Same Message-ID header (definitive)
 *   2. Same From + Subject + Date truncated to the minute, for messages
 *      without a Message-ID
 *
 * Each group lists mailbox ids in input order; the first id is the keeper.
 */
export function findDuplicates(
  messages: readonly Message[],
  options: DuplicateOptions = {}
): DuplicateGroup[] {
  const seen = new Set<string>();
  const byMessageId = new Map<string, string[]>();
  const byFuzzyKey = new Map<string, string[]>();

  for (const message of messages) {
    // A mailbox id listed twice must not land in two groups
    if (seen.has(message.id)) continue;
    seen.add(message.id);

    const messageId = getHeader(message.headers, "Message-ID").trim();
    if (messageId) {
      append(byMessageId, messageId, message.id);
      continue;
    }

    const key = fuzzyKey(message, options.strictDates ?? false);
    if (key !== null) {
      append(byFuzzyKey, key, message.id);
    }
  }

  return [...byMessageId.values(), ...byFuzzyKey.values()].filter(
    (ids) => ids.length > 1
  );
}

/** Redundant ids across all groups (every member except the keeper). */
export function redundantIds(groups: readonly DuplicateGroup[]): string[] {
  return groups.flatMap((group) => group.slice(1));
}

function fuzzyKey(message: Message, strictDates: boolean): string | null {
  const sender = getHeader(message.headers, "From");
  const subject = getHeader(message.headers, "Subject");
  const date = parseMessageDate(getHeader(message.headers, "Date"));

  if (!date) {
    return strictDates ? null : JSON.stringify([sender, subject, ""]);
  }
  const minute = Math.floor(date.getTime() / MS_PER_MINUTE);
  return JSON.stringify([sender, subject, minute]);
}

function append(map: Map<string, string[]>, key: string, id: string): void {
  const bucket = map.get(key);
  if (bucket) {
    bucket.push(id);
  } else {
    map.set(key, [id]);
  }
}
