import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { GmailClient, buildPlainTextMessage } from "../../../src/gmail/client.js";
import { createMockLogger } from "../../helpers/mocks.js";
import type { OAuthManager } from "../../../src/auth/oauth-manager.js";
import type { StoredTokens, TokenStorage } from "../../../src/auth/token-storage.js";

const { gmailApi } = vi.hoisted(() => ({
  gmailApi: {
    users: {
      messages: {
        list: vi.fn(),
        get: vi.fn(),
        modify: vi.fn(),
        trash: vi.fn(),
        send: vi.fn(),
      },
      labels: {
        list: vi.fn(),
        create: vi.fn(),
      },
    },
  },
}));

vi.mock("googleapis", () => ({
  google: { gmail: vi.fn(() => gmailApi) },
}));

function tokens(expiryDate: Date): StoredTokens {
  return {
    accessToken: "test-access-token",
    refreshToken: "test-refresh-token",
    tokenType: "Bearer",
    expiryDate,
    scope: "https://www.googleapis.com/auth/gmail.modify",
  };
}

describe("GmailClient", () => {
  let stored: StoredTokens | null;
  let tokenStorage: {
    getTokens: Mock<() => Promise<StoredTokens | null>>;
    saveTokens: Mock<(tokens: StoredTokens) => Promise<void>>;
  };
  let oauthManager: {
    isTokenValid: Mock<(expiry: Date) => boolean>;
    refreshAccessToken: Mock<(refreshToken: string) => Promise<StoredTokens>>;
    getAuthenticatedClient: Mock<(accessToken: string) => object>;
  };
  let client: GmailClient;

  beforeEach(() => {
    vi.clearAllMocks();
    stored = tokens(new Date(Date.now() + 3600_000));
    tokenStorage = {
      getTokens: vi.fn<() => Promise<StoredTokens | null>>(async () => stored),
      saveTokens: vi.fn<(tokens: StoredTokens) => Promise<void>>(async () => {}),
    };
    oauthManager = {
      isTokenValid: vi.fn<(expiry: Date) => boolean>((expiry) => expiry.getTime() > Date.now()),
      refreshAccessToken: vi.fn<(refreshToken: string) => Promise<StoredTokens>>(async () =>
        tokens(new Date(Date.now() + 3600_000))
      ),
      getAuthenticatedClient: vi.fn<(accessToken: string) => object>(() => ({})),
    };
    client = new GmailClient(
      oauthManager as unknown as OAuthManager,
      tokenStorage as unknown as TokenStorage,
      { retry: { attempts: 3, baseDelayMs: 0, timeoutMs: 1000 } },
      createMockLogger()
    );
  });

  it("asks the user to sign in when no tokens are stored", async () => {
    stored = null;
    await expect(client.trash("m1")).rejects.toThrow("No OAuth tokens found");
    expect(gmailApi.users.messages.trash).not.toHaveBeenCalled();
  });

  it("refreshes and saves expired tokens before calling Gmail", async () => {
    stored = tokens(new Date(0));
    gmailApi.users.messages.trash.mockResolvedValue({ data: {} });

    await client.trash("m1");

    expect(oauthManager.refreshAccessToken).toHaveBeenCalledWith("test-refresh-token");
    expect(tokenStorage.saveTokens).toHaveBeenCalledOnce();
    expect(gmailApi.users.messages.trash).toHaveBeenCalledWith({ userId: "me", id: "m1" });
  });

  it("reuses the authorized client while the token is valid", async () => {
    gmailApi.users.messages.trash.mockResolvedValue({ data: {} });

    await client.trash("m1");
    await client.trash("m2");

    expect(tokenStorage.getTokens).toHaveBeenCalledOnce();
  });

  it("retries transient Gmail errors", async () => {
    gmailApi.users.messages.trash
      .mockRejectedValueOnce(Object.assign(new Error("Backend Error"), { status: 503 }))
      .mockResolvedValue({ data: {} });

    await client.trash("m1");

    expect(gmailApi.users.messages.trash).toHaveBeenCalledTimes(2);
  });

  describe("listMessages", () => {
    it("follows page tokens", async () => {
      gmailApi.users.messages.list
        .mockResolvedValueOnce({ data: { messages: [{ id: "a", threadId: "t1" }], nextPageToken: "p2" } })
        .mockResolvedValueOnce({ data: { messages: [{ id: "b" }] } });

      expect(await client.listMessages("in:inbox", 10)).toEqual([{ id: "a", threadId: "t1" }, { id: "b" }]);
      expect(gmailApi.users.messages.list).toHaveBeenNthCalledWith(2, {
        userId: "me",
        q: "in:inbox",
        maxResults: 9,
        pageToken: "p2",
      });
    });

    it("stops at maxResults", async () => {
      gmailApi.users.messages.list.mockResolvedValueOnce({
        data: { messages: [{ id: "a" }, { id: "b" }, { id: "c" }], nextPageToken: "p2" },
      });

      expect(await client.listMessages("in:inbox", 2)).toEqual([{ id: "a" }, { id: "b" }]);
      expect(gmailApi.users.messages.list).toHaveBeenCalledOnce();
    });
  });

  it("fetches metadata headers only", async () => {
    gmailApi.users.messages.get.mockResolvedValue({
      data: {
        payload: {
          headers: [
            { name: "Subject", value: "Hi" },
            { name: null, value: "ignored" },
            { name: "From", value: null },
          ],
        },
      },
    });

    expect(await client.fetchMetadata("m1")).toEqual([
      { name: "Subject", value: "Hi" },
      { name: "From", value: "" },
    ]);
    expect(gmailApi.users.messages.get).toHaveBeenCalledWith(
      expect.objectContaining({ id: "m1", format: "metadata" })
    );
  });

  it("adds and removes labels", async () => {
    gmailApi.users.messages.modify.mockResolvedValue({ data: {} });

    await client.modifyLabels("m1", ["STARRED"]);

    expect(gmailApi.users.messages.modify).toHaveBeenCalledWith({
      userId: "me",
      id: "m1",
      requestBody: { addLabelIds: ["STARRED"], removeLabelIds: undefined },
    });
  });

  describe("resolveOrCreateLabel", () => {
    it("matches existing labels case-insensitively", async () => {
      gmailApi.users.labels.list.mockResolvedValue({
        data: { labels: [{ id: "Label_7", name: "newsletters" }] },
      });

      expect(await client.resolveOrCreateLabel("Newsletters")).toBe("Label_7");
      expect(gmailApi.users.labels.create).not.toHaveBeenCalled();
    });

    it("creates a missing label", async () => {
      gmailApi.users.labels.list.mockResolvedValue({ data: { labels: [] } });
      gmailApi.users.labels.create.mockResolvedValue({ data: { id: "Label_9" } });

      expect(await client.resolveOrCreateLabel("Shopping")).toBe("Label_9");
      expect(gmailApi.users.labels.create).toHaveBeenCalledWith({
        userId: "me",
        requestBody: { name: "Shopping", labelListVisibility: "labelShow", messageListVisibility: "show" },
      });
    });
  });

  it("sends base64url-encoded plain text", async () => {
    gmailApi.users.messages.send.mockResolvedValue({ data: {} });

    await client.send("leave@news.example", "Unsubscribe", "Unsubscribe");

    const [request] = gmailApi.users.messages.send.mock.calls[0]!;
    expect(Buffer.from(request.requestBody.raw, "base64url").toString("utf-8")).toBe(
      buildPlainTextMessage("leave@news.example", "Unsubscribe", "Unsubscribe")
    );
  });
});

describe("buildPlainTextMessage", () => {
  it("writes CRLF-separated headers and body", () => {
    expect(buildPlainTextMessage("a@news.example", "Stop", "Remove me")).toBe(
      "To: a@news.example\r\nSubject: Stop\r\nMIME-Version: 1.0\r\n" +
        'Content-Type: text/plain; charset="UTF-8"\r\n\r\nRemove me'
    );
  });

  it("strips line breaks from header values", () => {
    const message = buildPlainTextMessage("a@news.example\r\nBcc: x@evil.example", "Hi", "");
    expect(message.split("\r\n")[0]).toBe("To: a@news.example Bcc: x@evil.example");
  });

  it("encodes non-ASCII subjects", () => {
    const message = buildPlainTextMessage("a@news.example", "Désabonner", "");
    expect(message.split("\r\n")[1]).toBe(
      `Subject: =?UTF-8?B?${Buffer.from("Désabonner", "utf-8").toString("base64")}?=`
    );
  });
});
