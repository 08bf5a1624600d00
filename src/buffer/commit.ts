import type { ConversationStore, ConversationTurn } from "../collaborators/types.js";
import type { Logger } from "../logging/logger.js";
import type { SessionRef } from "../session/key.js";
import { KeyedMutex } from "../utils/lock.js";
import { withTimeout } from "../utils/timeout.js";
import type { PendingBuffer } from "./pending-buffer.js";
import { committedContent } from "./turn-format.js";
import type { BufferedTurn } from "./types.js";

export interface CommitRequest {
  /** Earlier buffered turns to merge ahead of the current exchange. */
  readonly pending: readonly BufferedTurn[];
  readonly userContent: string;
  readonly replyContent: string;
  /** Buffer entries dropped once the write is confirmed. */
  readonly release: readonly BufferedTurn[];
}

export type CommitResult =
  | {
      readonly ok: true;
      readonly conversationId: string;
      readonly merged: number;
      readonly skippedDuplicates: number;
    }
  | { readonly ok: false; readonly error: unknown };

interface CommitProtocolDeps {
  store: ConversationStore;
  buffer: PendingBuffer;
  logger: Logger;
  timeoutMs: number;
  titleFor?: (session: SessionRef) => string;
}

/**
 * Merges buffered turns plus the current exchange into the durable record.
 * Dedup is by exact content; the buffer only shrinks after the store
 * confirmed the write. Commits for one session never interleave.
 *
 * An exchange whose write failed was already delivered, so its turns are
 * carried into the next commit for the session ahead of anything new.
 */
export class CommitProtocol {
  private readonly store: ConversationStore;
  private readonly buffer: PendingBuffer;
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly titleFor: (session: SessionRef) => string;
  private readonly sessionLock = new KeyedMutex<string>();
  private readonly unconfirmed = new Map<string, ConversationTurn[]>();

  constructor(deps: CommitProtocolDeps) {
    this.store = deps.store;
    this.buffer = deps.buffer;
    this.logger = deps.logger;
    this.timeoutMs = deps.timeoutMs;
    this.titleFor = deps.titleFor ?? ((s) => `${s.platform}:${s.kind}:${s.conversationId}`);
  }

  async commit(session: SessionRef, request: CommitRequest): Promise<CommitResult> {
    return this.sessionLock.runExclusive(session.key, async () => {
      const earlier = [
        ...(this.unconfirmed.get(session.key) ?? []),
        ...request.pending.map((t): ConversationTurn => ({ role: "user", content: committedContent(t) })),
      ];
      const exchange: ConversationTurn[] = [
        { role: "user", content: request.userContent },
        { role: "assistant", content: request.replyContent },
      ];
      try {
        const result = await this.write(session, earlier, exchange, request.release);
        this.unconfirmed.delete(session.key);
        return result;
      } catch (err) {
        this.unconfirmed.set(session.key, [...earlier, ...exchange]);
        this.logger.error(
          { err, session: session.key, carried: earlier.length + exchange.length },
          "Commit failed, turns retained for the next commit",
        );
        return { ok: false, error: err };
      }
    });
  }

  /** Settles once every in-flight commit has finished. */
  async drain(): Promise<void> {
    await this.sessionLock.drain();
  }

  private async write(
    session: SessionRef,
    earlier: readonly ConversationTurn[],
    exchange: readonly ConversationTurn[],
    release: readonly BufferedTurn[],
  ): Promise<CommitResult> {
    const conversationId = await this.resolveConversation(session);
    const existing = await this.bounded(this.store.read(session, conversationId), "store read");

    const seen = new Set(existing.map((t) => t.content));
    const extended: ConversationTurn[] = [...existing];
    let merged = 0;
    let skippedDuplicates = 0;

    for (const turn of earlier) {
      if (seen.has(turn.content)) {
        skippedDuplicates++;
        continue;
      }
      extended.push(turn);
      seen.add(turn.content);
      merged++;
    }
    extended.push(...exchange);

    const written = await this.bounded(
      this.store.update(session, conversationId, extended),
      "store update",
    );
    if (!written) {
      throw new Error(`Conversation store rejected update for ${conversationId}`);
    }

    if (release.length > 0) {
      this.buffer.remove(session.key, release);
    }

    this.logger.debug(
      { session: session.key, conversationId, merged, skippedDuplicates },
      "Committed turns",
    );
    return { ok: true, conversationId, merged, skippedDuplicates };
  }

  private async resolveConversation(session: SessionRef): Promise<string> {
    const current = await this.bounded(this.store.getCurrentId(session), "store lookup");
    if (current) return current;

    const created = await this.bounded(
      this.store.create(session, this.titleFor(session)),
      "store create",
    );
    this.logger.info({ session: session.key, conversationId: created }, "Conversation created");
    return created;
  }

  private bounded<T>(work: Promise<T>, label: string): Promise<T> {
    return withTimeout(work, this.timeoutMs, label);
  }
}
