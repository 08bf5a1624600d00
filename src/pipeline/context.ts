import type { ConversationStore, ConversationTurn } from "../collaborators/types.js";
import type { LocalHistoryLog } from "../buffer/local-history.js";
import type { Logger } from "../logging/logger.js";
import type { SessionRef } from "../session/key.js";
import { settleWithin } from "../utils/timeout.js";

interface ContextLoaderDeps {
  store: ConversationStore;
  history: LocalHistoryLog;
  logger: Logger;
  timeoutMs: number;
}

/**
 * Turns for prompting. Reads the durable record; when that fails or times
 * out, falls back to the local history log. Callers trim to their window
 * after deduplicating against the full result.
 */
export class ContextLoader {
  constructor(private readonly deps: ContextLoaderDeps) {}

  async load(session: SessionRef): Promise<ConversationTurn[]> {
    const { store, timeoutMs } = this.deps;
    const result = await settleWithin(
      async () => {
        const id = await store.getCurrentId(session);
        return id ? store.read(session, id) : [];
      },
      timeoutMs,
      "history read",
    );
    if (result.ok) return result.value;

    this.deps.logger.warn(
      { err: result.error, session: session.key, timedOut: result.timedOut },
      "Conversation store unreadable, using local history",
    );
    return this.fallback(session);
  }

  private async fallback(session: SessionRef): Promise<ConversationTurn[]> {
    try {
      return await this.deps.history.recentTurns(session.key);
    } catch (err) {
      this.deps.logger.warn({ err, session: session.key }, "Local history unreadable");
      return [];
    }
  }
}
