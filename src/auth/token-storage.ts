import { readFile, writeFile, rename, rm, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";

export interface StoredTokens {
  accessToken: string;
  refreshToken: string;
  tokenType: string;
  expiryDate: Date;
  scope: string;
}

const TokenFileSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  tokenType: z.string().default("Bearer"),
  expiryDate: z.string(),
  scope: z.string().default(""),
});

/**
 * OAuth tokens for the signed-in Gmail account, kept in a local JSON file.
 * Only the permission token is stored, never the account password.
 */
export class TokenStorage {
  constructor(private path: string) {}

  async getTokens(): Promise<StoredTokens | null> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return null;
    }
    const parsed = TokenFileSchema.safeParse(raw);
    if (!parsed.success) return null;

    const expiryDate = new Date(parsed.data.expiryDate);
    return {
      accessToken: parsed.data.accessToken,
      refreshToken: parsed.data.refreshToken,
      tokenType: parsed.data.tokenType,
      // An unreadable expiry forces a refresh on first use
      expiryDate: Number.isNaN(expiryDate.getTime()) ? new Date(0) : expiryDate,
      scope: parsed.data.scope,
    };
  }

  async saveTokens(tokens: StoredTokens): Promise<void> {
    const body = JSON.stringify(
      {
        accessToken: tokens.accessToken,
        refreshToken: tokens.refreshToken,
        tokenType: tokens.tokenType,
        expiryDate: tokens.expiryDate.toISOString(),
        scope: tokens.scope,
      },
      null,
      2
    );
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tmpPath, body, { encoding: "utf-8", mode: 0o600 });
    await rename(tmpPath, this.path);
  }

  /** Returns false when there was nothing to delete. */
  async deleteTokens(): Promise<boolean> {
    const existed = (await this.getTokens()) !== null;
    await rm(this.path, { force: true });
    return existed;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
