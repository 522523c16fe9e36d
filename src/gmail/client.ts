import { google, type gmail_v1 } from "googleapis";
import { ResilientExecutor } from "../core/resilient-executor.js";
import { METADATA_HEADERS } from "../triage/mailbox.js";
import type { OAuthManager } from "../auth/oauth-manager.js";
import type { TokenStorage } from "../auth/token-storage.js";
import type { MailboxClient } from "../triage/mailbox.js";
import type { MessageHeader, MessageRef } from "../triage/types.js";
import type { Logger } from "../utils/logger.js";

const PAGE_SIZE_LIMIT = 500;

export interface GmailClientOptions {
  retry: {
    attempts: number;
    baseDelayMs: number;
    timeoutMs: number;
  };
}

export class GmailClient implements MailboxClient {
  private oauthManager: OAuthManager;
  private tokenStorage: TokenStorage;
  private options: GmailClientOptions;
  private logger: Logger;
  private api: { gmail: gmail_v1.Gmail; expiryDate: Date } | null = null;

  constructor(
    oauthManager: OAuthManager,
    tokenStorage: TokenStorage,
    options: GmailClientOptions,
    logger: Logger
  ) {
    this.oauthManager = oauthManager;
    this.tokenStorage = tokenStorage;
    this.options = options;
    this.logger = logger;
  }

  private async getGmailApi(): Promise<gmail_v1.Gmail> {
    if (this.api && this.oauthManager.isTokenValid(this.api.expiryDate)) {
      return this.api.gmail;
    }

    const stored = await this.tokenStorage.getTokens();
    if (!stored) {
      throw new Error("No OAuth tokens found. Please run: mailbox-triage login");
    }

    let tokens = stored;
    if (!this.oauthManager.isTokenValid(stored.expiryDate)) {
      tokens = await this.oauthManager.refreshAccessToken(stored.refreshToken);
      await this.tokenStorage.saveTokens(tokens);
      this.logger.debug("Refreshed Gmail access token");
    }

    const auth = this.oauthManager.getAuthenticatedClient(tokens.accessToken);
    const gmail = google.gmail({ version: "v1", auth });
    this.api = { gmail, expiryDate: tokens.expiryDate };
    return gmail;
  }

  private call<T>(operation: string, fn: (gmail: gmail_v1.Gmail) => Promise<T>): Promise<T> {
    return ResilientExecutor.execute(
      async () => fn(await this.getGmailApi()),
      {
        attempts: this.options.retry.attempts,
        baseDelayMs: this.options.retry.baseDelayMs,
        timeout: this.options.retry.timeoutMs,
        operation,
      },
      this.logger
    );
  }

  async listMessages(query: string, maxResults: number): Promise<MessageRef[]> {
    const refs: MessageRef[] = [];
    let pageToken: string | undefined;

    do {
      const remaining = maxResults - refs.length;
      const res = await this.call("messages.list", (gmail) =>
        gmail.users.messages.list({
          userId: "me",
          q: query,
          maxResults: Math.min(remaining, PAGE_SIZE_LIMIT),
          pageToken,
        })
      );

      for (const message of res.data.messages ?? []) {
        if (message.id) {
          refs.push({ id: message.id, ...(message.threadId ? { threadId: message.threadId } : {}) });
        }
      }
      pageToken = res.data.nextPageToken ?? undefined;
    } while (pageToken && refs.length < maxResults);

    return refs.slice(0, maxResults);
  }

  async fetchMetadata(id: string): Promise<MessageHeader[]> {
    const res = await this.call("messages.get", (gmail) =>
      gmail.users.messages.get({
        userId: "me",
        id,
        format: "metadata",
        metadataHeaders: [...METADATA_HEADERS],
      })
    );

    const headers: MessageHeader[] = [];
    for (const header of res.data.payload?.headers ?? []) {
      if (header.name) {
        headers.push({ name: header.name, value: header.value ?? "" });
      }
    }
    return headers;
  }

  async modifyLabels(id: string, addLabels?: string[], removeLabels?: string[]): Promise<void> {
    await this.call("messages.modify", (gmail) =>
      gmail.users.messages.modify({
        userId: "me",
        id,
        requestBody: {
          addLabelIds: addLabels,
          removeLabelIds: removeLabels,
        },
      })
    );
  }

  async trash(id: string): Promise<void> {
    await this.call("messages.trash", (gmail) =>
      gmail.users.messages.trash({ userId: "me", id })
    );
  }

  /** Label id for `name` (case-insensitive match), creating the label if needed. */
  async resolveOrCreateLabel(name: string): Promise<string> {
    const res = await this.call("labels.list", (gmail) =>
      gmail.users.labels.list({ userId: "me" })
    );
    const wanted = name.toLowerCase();
    for (const label of res.data.labels ?? []) {
      if (label.id && label.name?.toLowerCase() === wanted) {
        return label.id;
      }
    }

    const created = await this.call("labels.create", (gmail) =>
      gmail.users.labels.create({
        userId: "me",
        requestBody: {
          name,
          labelListVisibility: "labelShow",
          messageListVisibility: "show",
        },
      })
    );
    if (!created.data.id) {
      throw new Error(`Gmail did not return an id for new label "${name}"`);
    }
    this.logger.info({ label: name }, "Created Gmail label");
    return created.data.id;
  }

  /** Send a plain-text message from the signed-in account. */
  async send(to: string, subject: string, body: string): Promise<void> {
    const raw = Buffer.from(buildPlainTextMessage(to, subject, body)).toString("base64url");
    await this.call("messages.send", (gmail) =>
      gmail.users.messages.send({ userId: "me", requestBody: { raw } })
    );
  }
}

export function buildPlainTextMessage(to: string, subject: string, body: string): string {
  return [
    `To: ${stripLineBreaks(to)}`,
    `Subject: ${encodeHeaderValue(stripLineBreaks(subject))}`,
    "MIME-Version: 1.0",
    'Content-Type: text/plain; charset="UTF-8"',
    "",
    body,
  ].join("\r\n");
}

function stripLineBreaks(value: string): string {
  return value.replace(/[\r\n]+/g, " ").trim();
}

function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}
