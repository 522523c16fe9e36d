/**
 * List-Unsubscribe handling (RFC 2369 links, RFC 8058 one-click).
 *
 * Attempt order: HTTP (one-click POST, else GET), then mailto. Any HTTP
 * response is final; only a transport failure falls through to mailto.
 */
import { getHeader } from "./headers.js";
import { extractStatus } from "../core/resilient-executor.js";
import { sleep as defaultSleep } from "../utils/async.js";
import type { Logger } from "../utils/logger.js";
import type {
  MessageHeader,
  NewsletterItem,
  UnsubscribeAttempt,
  UnsubscribeLinks,
} from "./types.js";

export const ONE_CLICK_BODY = "List-Unsubscribe=One-Click";
const DEFAULT_MAILTO_SUBJECT = "Unsubscribe";

export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  body?: string;
  headers?: Record<string, string>;
}

export interface HttpResponse {
  status: number;
}

export type HttpRequester = (request: HttpRequest) => Promise<HttpResponse>;

export interface MailSender {
  send(to: string, subject: string, body: string): Promise<void>;
}

export interface UnsubscribeResolverOptions {
  http: HttpRequester;
  mailer: MailSender;
  logger: Logger;
  /** Pause before a mailto send that follows another one. */
  mailtoDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface ParsedMailto {
  address: string;
  subject: string;
  body: string;
}

export function extractUnsubscribeLinks(
  headers: readonly MessageHeader[]
): UnsubscribeLinks | null {
  const header = getHeader(headers, "List-Unsubscribe");
  if (!header) return null;

  const mailto = /<(mailto:[^>]+)>/i.exec(header)?.[1]?.trim();
  const http = /<(https?:\/\/[^>]+)>/i.exec(header)?.[1]?.trim();
  if (!mailto && !http) return null;

  const post = getHeader(headers, "List-Unsubscribe-Post").toLowerCase();
  return {
    ...(mailto ? { mailto } : {}),
    ...(http ? { http } : {}),
    oneClick: post.includes(ONE_CLICK_BODY.toLowerCase()),
  };
}

export function parseMailto(uri: string): ParsedMailto | null {
  const withoutScheme = uri.replace(/^mailto:/i, "");
  const queryStart = withoutScheme.indexOf("?");
  const rawAddress = queryStart === -1 ? withoutScheme : withoutScheme.slice(0, queryStart);
  const query = queryStart === -1 ? "" : withoutScheme.slice(queryStart + 1);

  let address: string;
  try {
    address = decodeURIComponent(rawAddress).trim();
  } catch {
    address = rawAddress.trim();
  }
  if (!address) return null;

  const params = new URLSearchParams(query);
  return {
    address,
    subject: params.get("subject") || DEFAULT_MAILTO_SUBJECT,
    body: params.get("body") ?? DEFAULT_MAILTO_SUBJECT,
  };
}

/** HTTP requester backed by the global fetch with an abort timeout. */
export function createFetchRequester(timeoutMs: number): HttpRequester {
  return async (request) => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        redirect: "follow",
        signal: controller.signal,
      });
      // Drain so the connection can be reused
      await res.arrayBuffer().catch(() => undefined);
      return { status: res.status };
    } finally {
      clearTimeout(timer);
    }
  };
}

function isAbort(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

export class UnsubscribeResolver {
  private readonly http: HttpRequester;
  private readonly mailer: MailSender;
  private readonly logger: Logger;
  private readonly mailtoDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: UnsubscribeResolverOptions) {
    this.http = options.http;
    this.mailer = options.mailer;
    this.logger = options.logger;
    this.mailtoDelayMs = options.mailtoDelayMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async attempt(links: UnsubscribeLinks): Promise<UnsubscribeAttempt> {
    if (links.http) {
      const request: HttpRequest = links.oneClick
        ? {
            method: "POST",
            url: links.http,
            body: ONE_CLICK_BODY,
            headers: { "Content-Type": "application/x-www-form-urlencoded" },
          }
        : { method: "GET", url: links.http };

      try {
        const res = await this.http(request);
        return { method: "http", status: isSuccess(res.status) ? "ok" : "manual" };
      } catch (err) {
        const status = isAbort(err) ? null : extractStatus(err);
        if (status !== null) {
          return { method: "http", status: isSuccess(status) ? "ok" : "manual" };
        }
        this.logger.debug(
          { url: links.http, error: err instanceof Error ? err.message : String(err) },
          "Unsubscribe request failed in transport"
        );
        if (!links.mailto) {
          return { method: "http", status: "failed" };
        }
      }
    }

    if (links.mailto) {
      const parsed = parseMailto(links.mailto);
      if (!parsed) return { method: "mailto", status: "failed" };
      try {
        await this.mailer.send(parsed.address, parsed.subject, parsed.body);
        return { method: "mailto", status: "ok" };
      } catch (err) {
        this.logger.warn(
          { to: parsed.address, error: err instanceof Error ? err.message : String(err) },
          "Unsubscribe mail could not be sent"
        );
        return { method: "mailto", status: "failed" };
      }
    }

    return { method: "unknown", status: "failed" };
  }

  /**
   * Attempt every distinct link set once. Items sharing the same link are
   * reported with the result of the first attempt.
   */
  async attemptAll(
    items: readonly NewsletterItem[],
    onResult?: (item: NewsletterItem, result: UnsubscribeAttempt) => void
  ): Promise<Array<{ item: NewsletterItem; result: UnsubscribeAttempt }>> {
    const byLink = new Map<string, UnsubscribeAttempt>();
    const results: Array<{ item: NewsletterItem; result: UnsubscribeAttempt }> = [];
    let lastUsedMailto = false;

    for (const item of items) {
      const key = item.links.http ?? item.links.mailto ?? "";
      let result = byLink.get(key);

      if (!result) {
        if (lastUsedMailto && item.links.mailto && this.mailtoDelayMs > 0) {
          await this.sleep(this.mailtoDelayMs);
        }
        result = await this.attempt(item.links);
        lastUsedMailto = result.method === "mailto";
        byLink.set(key, result);
      }

      results.push({ item, result });
      onResult?.(item, result);
    }

    return results;
  }
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
