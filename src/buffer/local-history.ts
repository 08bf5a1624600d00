import { appendFile, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { isMissingFile } from "../config/loader.js";
import { ensureDir, getHistoryDir } from "../config/paths.js";
import type { ConversationTurn } from "../collaborators/types.js";
import type { Logger } from "../logging/logger.js";
import { withFileLock, type FileLockOptions } from "../utils/file-lock.js";
import type { SessionKey } from "../utils/types.js";

// Appends wait out a compaction in progress
const LOCK_OPTIONS: FileLockOptions = { retries: 10, minTimeoutMs: 20 };

const entrySchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.number(),
  accepted: z.boolean().optional(),
});

export type HistoryEntry = z.infer<typeof entrySchema>;

/**
 * Best-effort, append-only per-session log of everything the engine saw or
 * said. Not the durable record: it feeds fallback context when the
 * conversation store cannot be read.
 */
export class LocalHistoryLog {
  private readonly dir: string;
  private readonly appendsSinceCompact = new Map<string, number>();

  constructor(
    dataDir: string,
    private readonly limit: number,
    private readonly logger: Logger,
  ) {
    this.dir = ensureDir(getHistoryDir(dataDir));
  }

  async append(session: SessionKey, entries: readonly HistoryEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const path = this.pathFor(session);
    const lines = entries.map((e) => JSON.stringify(e)).join("\n") + "\n";
    await withFileLock(path, () => appendFile(path, lines, "utf-8"), LOCK_OPTIONS);

    const pending = (this.appendsSinceCompact.get(session) ?? 0) + entries.length;
    if (pending >= this.limit) {
      this.appendsSinceCompact.set(session, 0);
      await this.compact(session);
    } else {
      this.appendsSinceCompact.set(session, pending);
    }
  }

  /** Up to `limit` most recent entries, oldest first. Unreadable lines are skipped. */
  async recent(session: SessionKey, limit = this.limit): Promise<HistoryEntry[]> {
    const entries = await this.readAll(session);
    return entries.slice(-limit);
  }

  async recentTurns(session: SessionKey, limit?: number): Promise<ConversationTurn[]> {
    const entries = await this.recent(session, limit);
    return entries.map((e) => ({ role: e.role, content: e.content }));
  }

  private async compact(session: SessionKey): Promise<void> {
    const path = this.pathFor(session);
    await withFileLock(
      path,
      async () => {
        const entries = await this.readAll(session);
        if (entries.length <= this.limit) return;
        const kept = entries.slice(-this.limit);
        await writeFile(path, kept.map((e) => JSON.stringify(e)).join("\n") + "\n", "utf-8");
        this.logger.debug({ session, dropped: entries.length - kept.length }, "Local history compacted");
      },
      LOCK_OPTIONS,
    );
  }

  private async readAll(session: SessionKey): Promise<HistoryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(session), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw err;
    }

    const entries: HistoryEntry[] = [];
    let skipped = 0;
    for (const line of raw.split("\n")) {
      if (line.trim().length === 0) continue;
      const parsed = entrySchema.safeParse(parseLine(line));
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      this.logger.warn({ session, skipped }, "Skipped unreadable local history lines");
    }
    return entries;
  }

  /** One file per key; percent-encoding keeps distinct keys in distinct files. */
  private pathFor(session: SessionKey): string {
    return join(this.dir, `${encodeURIComponent(session)}.jsonl`);
  }
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line) as unknown;
  } catch {
    // Torn write; reported by the caller as an unreadable line
    return null;
  }
}
