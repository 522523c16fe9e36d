import type { MessageHeader } from "./types.js";

/** Case-insensitive header lookup; the first match wins, "" when absent. */
export function getHeader(headers: readonly MessageHeader[], name: string): string {
  const wanted = name.toLowerCase();
  for (const header of headers) {
    if (header.name.toLowerCase() === wanted) {
      return header.value;
    }
  }
  return "";
}

const ZONE_SUFFIX = /(?:[+-]\d{2}:?\d{2}|Z|UTC?|GMT|[ECMP][SD]T)$/i;
const ISO_DATE_TIME = /^\d{4}-\d{2}-\d{2}T[\d:.]+$/;

/**
 * Parse an RFC 5322 Date header. Comments such as "(UTC)" are dropped
 * before parsing, and a value without a zone is read as UTC.
 * Returns null when the value cannot be read.
 */
export function parseMessageDate(value: string): Date | null {
  const cleaned = value.replace(/\([^)]*\)/g, " ").replace(/\s+/g, " ").trim();
  if (!cleaned) return null;
  const ms = Date.parse(withZone(cleaned));
  return Number.isNaN(ms) ? null : new Date(ms);
}

function withZone(value: string): string {
  if (ZONE_SUFFIX.test(value) || !/\d{1,2}:\d{2}/.test(value)) return value;
  return ISO_DATE_TIME.test(value) ? `${value}Z` : `${value} +0000`;
}
