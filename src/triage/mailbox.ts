import type { MessageHeader, MessageRef } from "./types.js";

/** Headers requested per message; anything else stays on the server. */
export const METADATA_HEADERS = [
  "Subject",
  "From",
  "Date",
  "List-Unsubscribe",
  "List-Unsubscribe-Post",
  "Message-ID",
  "Precedence",
  "List-Id",
] as const;

export const STARRED_LABEL = "STARRED";

/**
 * Remote mailbox operations the triage pipeline needs. Each method is a
 * single remote call (listing pages internally) and rejects once the
 * implementation's own retry policy gives up.
 */
export interface MailboxClient {
  listMessages(query: string, maxResults: number): Promise<MessageRef[]>;
  fetchMetadata(id: string): Promise<MessageHeader[]>;
  modifyLabels(id: string, addLabels?: string[], removeLabels?: string[]): Promise<void>;
  trash(id: string): Promise<void>;
  resolveOrCreateLabel(name: string): Promise<string>;
  send(to: string, subject: string, body: string): Promise<void>;
}
