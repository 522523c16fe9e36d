import { readFile, writeFile, rename, rm, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { Logger } from "../utils/logger.js";

const LedgerFileSchema = z.array(z.string());

/**
 * Durable set of message ids the user already decided on.
 * Stored as a sorted JSON array; a missing or unreadable file is an
 * empty ledger. Writes replace the whole file through a rename so a
 * reader never sees a partial array. Concurrent writers are not supported.
 */
export class ReviewLedger {
  constructor(
    private readonly path: string,
    private readonly logger: Logger
  ) {}

  async load(): Promise<Set<string>> {
    let content: string;
    try {
      content = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return new Set();
      this.logger.warn({ path: this.path, error: err }, "Review ledger unreadable, treating as empty");
      return new Set();
    }

    try {
      const parsed = LedgerFileSchema.safeParse(JSON.parse(content));
      if (parsed.success) return new Set(parsed.data);
      this.logger.warn({ path: this.path }, "Review ledger has unexpected shape, treating as empty");
    } catch (err) {
      this.logger.warn({ path: this.path, error: err }, "Review ledger is corrupt, treating as empty");
    }
    return new Set();
  }

  async mark(ids: Iterable<string>): Promise<number> {
    const existing = await this.load();
    const before = existing.size;
    for (const id of ids) existing.add(id);

    if (existing.size === before) return 0;

    const sorted = [...existing].sort();
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tmpPath, JSON.stringify(sorted), "utf-8");
    await rename(tmpPath, this.path);

    const added = existing.size - before;
    this.logger.debug({ path: this.path, added, total: existing.size }, "Review ledger updated");
    return added;
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
    this.logger.info({ path: this.path }, "Review ledger cleared");
  }

  async count(): Promise<number> {
    return (await this.load()).size;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
