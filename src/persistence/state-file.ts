import { readFile, writeFile } from "node:fs/promises";
import { mkdirSync } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import type { AttentionStore } from "../attention/store.js";
import type { AttentionSnapshot } from "../attention/types.js";
import { isMissingFile } from "../config/loader.js";
import type { Logger } from "../logging/logger.js";
import type { ProactiveStateStore } from "../proactive/state.js";
import type { ProactiveSnapshot } from "../proactive/types.js";
import { withFileLock } from "../utils/file-lock.js";
import { Mutex } from "../utils/lock.js";

export const ATTENTION_FILE = "attention.json";
export const PROACTIVE_FILE = "proactive.json";

const attentionProfileSchema = z.object({
  userId: z.string(),
  userName: z.string(),
  attentionScore: z.number(),
  emotion: z.number(),
  lastInteraction: z.number(),
  interactionCount: z.number().int().nonnegative(),
  lastMessagePreview: z.string(),
  updatedAt: z.number(),
});

export const attentionFileSchema = z.record(z.record(attentionProfileSchema));

const proactiveStateSchema = z.object({
  lastBotReplyTime: z.number(),
  lastUserMessageTime: z.number(),
  lastProactiveTime: z.number(),
  consecutiveFailures: z.number().int().nonnegative(),
  cooldownUntil: z.number(),
  userMessageTimestamps: z.array(z.number()),
  tempBoost: z.object({
    value: z.number(),
    until: z.number(),
    armedAt: z.number(),
  }).optional(),
});

export const proactiveFileSchema = z.record(proactiveStateSchema);

interface StateSnapshotterDeps {
  dataDir: string;
  attention: AttentionStore;
  proactive: ProactiveStateStore;
  logger: Logger;
  debounceMs: number;
}

/**
 * Persists the attention and proactive tables. Writes are debounced after
 * a change and forced by {@link flush} at shutdown.
 */
export class StateSnapshotter {
  private readonly attentionPath: string;
  private readonly proactivePath: string;
  private readonly attention: AttentionStore;
  private readonly proactive: ProactiveStateStore;
  private readonly logger: Logger;
  private readonly debounceMs: number;
  private readonly writeLock = new Mutex();
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(deps: StateSnapshotterDeps) {
    mkdirSync(deps.dataDir, { recursive: true });
    this.attentionPath = join(deps.dataDir, ATTENTION_FILE);
    this.proactivePath = join(deps.dataDir, PROACTIVE_FILE);
    this.attention = deps.attention;
    this.proactive = deps.proactive;
    this.logger = deps.logger;
    this.debounceMs = deps.debounceMs;
  }

  /** Restore both tables. Missing files mean a cold start; corrupt ones an empty table. */
  async load(): Promise<void> {
    const attention = await this.readTable(this.attentionPath, attentionFileSchema);
    await this.attention.restore(attention ?? {});

    const proactive = await this.readTable(this.proactivePath, proactiveFileSchema);
    this.proactive.restore(proactive ?? {});

    this.logger.info(
      { attentionSessions: Object.keys(attention ?? {}).length, proactiveSessions: Object.keys(proactive ?? {}).length },
      "Engine state loaded",
    );
  }

  markDirty(): void {
    if (this.timer) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flush().catch((err) => {
        this.logger.error({ err }, "State save failed");
      });
    }, this.debounceMs);
    this.timer.unref();
  }

  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.writeLock.runExclusive(async () => {
      const attention: AttentionSnapshot = await this.attention.snapshot();
      const proactive: ProactiveSnapshot = this.proactive.snapshot();
      await this.writeTable(this.attentionPath, attention);
      await this.writeTable(this.proactivePath, proactive);
      this.logger.debug(
        { attentionSessions: Object.keys(attention).length, proactiveSessions: Object.keys(proactive).length },
        "Engine state saved",
      );
    });
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async readTable<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let raw: string;
    try {
      raw = await withFileLock(path, () => readFile(path, "utf-8"));
    } catch (err) {
      if (isMissingFile(err)) return null;
      this.logger.warn({ err, path }, "State file unreadable, starting empty");
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw) as unknown;
    } catch (err) {
      this.logger.warn({ err, path }, "State file is not valid JSON, starting empty");
      return null;
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn({ path, issues: parsed.error.issues.length }, "State file failed validation, starting empty");
      return null;
    }
    return parsed.data;
  }

  private async writeTable(path: string, data: unknown): Promise<void> {
    await withFileLock(path, async () => {
      await writeFile(path, JSON.stringify(data, null, 2) + "\n", "utf-8");
    });
  }
}

export type TableRead<T> =
  | { readonly status: "ok"; readonly data: T }
  | { readonly status: "missing" }
  | { readonly status: "invalid"; readonly error: string };

/** Read-only view of a state directory, for inspection tooling. */
export async function inspectStateDir(dataDir: string): Promise<{
  attention: TableRead<AttentionSnapshot>;
  proactive: TableRead<ProactiveSnapshot>;
}> {
  return {
    attention: await inspectTable(join(dataDir, ATTENTION_FILE), attentionFileSchema),
    proactive: await inspectTable(join(dataDir, PROACTIVE_FILE), proactiveFileSchema),
  };
}

async function inspectTable<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<TableRead<T>> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) return { status: "missing" };
    throw err;
  }
  try {
    const parsed = schema.safeParse(JSON.parse(raw) as unknown);
    if (!parsed.success) {
      return { status: "invalid", error: parsed.error.issues[0]?.message ?? "validation failed" };
    }
    return { status: "ok", data: parsed.data };
  } catch (err) {
    return { status: "invalid", error: err instanceof Error ? err.message : String(err) };
  }
}
