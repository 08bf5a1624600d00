import { vi } from "vitest";
import type {
  ConversationStore,
  ConversationTurn,
  ReplyHints,
} from "../../src/collaborators/types.js";
import type { SessionRef } from "../../src/session/key.js";

/** Conversation store kept in memory, with switches for failure injection. */
export class InMemoryConversationStore implements ConversationStore {
  readonly conversations = new Map<string, ConversationTurn[]>();
  readonly titles = new Map<string, string>();
  private readonly current = new Map<string, string>();
  private nextId = 1;

  /** Number of upcoming updates that report failure. */
  failUpdates = 0;
  throwOnRead = false;
  updateCalls = 0;

  async getCurrentId(session: SessionRef): Promise<string | null> {
    return this.current.get(session.key) ?? null;
  }

  async create(session: SessionRef, title: string): Promise<string> {
    const id = `conv-${this.nextId++}`;
    this.current.set(session.key, id);
    this.conversations.set(id, []);
    this.titles.set(id, title);
    return id;
  }

  async read(_session: SessionRef, conversationId: string): Promise<ConversationTurn[]> {
    if (this.throwOnRead) throw new Error("store offline");
    return [...(this.conversations.get(conversationId) ?? [])];
  }

  async update(
    _session: SessionRef,
    conversationId: string,
    turns: readonly ConversationTurn[],
  ): Promise<boolean> {
    this.updateCalls++;
    if (this.failUpdates > 0) {
      this.failUpdates--;
      return false;
    }
    this.conversations.set(conversationId, [...turns]);
    return true;
  }

  /** Turns of the session's current conversation. */
  turnsFor(session: SessionRef): ConversationTurn[] {
    const id = this.current.get(session.key);
    return id ? [...(this.conversations.get(id) ?? [])] : [];
  }

  seed(session: SessionRef, turns: ConversationTurn[]): void {
    const id = `conv-${this.nextId++}`;
    this.current.set(session.key, id);
    this.conversations.set(id, [...turns]);
  }
}

export function fakeGenerator(reply: string | null = "Sure thing") {
  const generate = vi.fn(async (_context: string, _hints: ReplyHints): Promise<string | null> => reply);
  return { generate };
}

export function fakeTransport(delivered = true) {
  const send = vi.fn(async (_session: SessionRef, _content: string): Promise<boolean> => delivered);
  return { send };
}

/** Deterministic stand-in for Math.random that replays the given values. */
export function sequenceRandom(...values: number[]): () => number {
  let i = 0;
  return () => {
    const value = values[Math.min(i, values.length - 1)] ?? 0;
    i++;
    return value;
  };
}
