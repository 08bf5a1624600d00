import { describe, it, expect, beforeEach } from "vitest";
import { CommitProtocol } from "../../src/buffer/commit.js";
import { PendingBuffer } from "../../src/buffer/pending-buffer.js";
import type { BufferedTurn } from "../../src/buffer/types.js";
import type { ConversationStore } from "../../src/collaborators/types.js";
import { TimeoutError } from "../../src/utils/timeout.js";
import { InMemoryConversationStore } from "../helpers/fakes.js";
import { groupSession, testLogger } from "../helpers/fixtures.js";

const session = groupSession();

function turn(content: string, mediaDescription?: string): BufferedTurn {
  return { role: "user", content, timestamp: Date.now(), senderId: "u1", senderName: "Alex", mediaDescription };
}

describe("CommitProtocol", () => {
  let store: InMemoryConversationStore;
  let buffer: PendingBuffer;
  let commit: CommitProtocol;

  beforeEach(() => {
    store = new InMemoryConversationStore();
    buffer = new PendingBuffer();
    commit = new CommitProtocol({ store, buffer, logger: testLogger(), timeoutMs: 1000 });
  });

  /** Buffer the given turns and commit the last one as the current message. */
  function bufferAndCommit(...contents: string[]) {
    for (const content of contents) buffer.append(session.key, turn(content));
    const snapshot = buffer.snapshot(session.key);
    return commit.commit(session, {
      pending: snapshot.slice(0, -1),
      userContent: contents[contents.length - 1] ?? "",
      replyContent: "reply",
      release: snapshot,
    });
  }

  it("creates a conversation on first commit", async () => {
    const result = await commit.commit(session, {
      pending: [],
      userContent: "hi",
      replyContent: "hello",
      release: [],
    });

    expect(result).toEqual({ ok: true, conversationId: "conv-1", merged: 0, skippedDuplicates: 0 });
    expect(store.titles.get("conv-1")).toBe("mock:group:chat-1");
    expect(store.turnsFor(session)).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
    ]);
  });

  it("merges earlier buffered turns and releases the buffer", async () => {
    const result = await bufferAndCommit("one", "two", "three");

    expect(result).toMatchObject({ ok: true, merged: 2, skippedDuplicates: 0 });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["one", "two", "three", "reply"]);
    expect(buffer.size(session.key)).toBe(0);
  });

  it("skips turns already in the record", async () => {
    store.seed(session, [{ role: "user", content: "one" }]);
    const result = await bufferAndCommit("one", "two", "three");

    expect(result).toMatchObject({ ok: true, merged: 1, skippedDuplicates: 1 });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["one", "two", "three", "reply"]);
  });

  it("does not duplicate pending turns when the same request commits twice", async () => {
    const pending = [turn("one"), turn("two")];
    const request = { pending, userContent: "now", replyContent: "ok", release: [] };
    await commit.commit(session, request);
    const second = await commit.commit(session, request);

    expect(second).toMatchObject({ ok: true, merged: 0, skippedDuplicates: 2 });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["one", "two", "now", "ok", "now", "ok"]);
  });

  it("retains the buffer when the store rejects the write", async () => {
    store.failUpdates = 1;
    const failed = await bufferAndCommit("one", "two");

    expect(failed.ok).toBe(false);
    expect(buffer.size(session.key)).toBe(2);
    expect(store.turnsFor(session)).toEqual([]);

    buffer.append(session.key, turn("three"));
    const snapshot = buffer.snapshot(session.key);
    const retried = await commit.commit(session, {
      pending: snapshot.slice(0, -1),
      userContent: "three",
      replyContent: "reply",
      release: snapshot,
    });

    // The failed exchange comes first, so the re-buffered "one" is a duplicate
    expect(retried).toMatchObject({ ok: true, merged: 3, skippedDuplicates: 2 });
    expect(store.turnsFor(session)).toEqual([
      { role: "user", content: "one" },
      { role: "user", content: "two" },
      { role: "assistant", content: "reply" },
      { role: "user", content: "three" },
      { role: "assistant", content: "reply" },
    ]);
    expect(buffer.size(session.key)).toBe(0);
  });

  it("carries a delivered exchange past a failed commit", async () => {
    store.failUpdates = 1;
    await commit.commit(session, { pending: [], userContent: "q1", replyContent: "a1", release: [] });
    const next = await commit.commit(session, { pending: [], userContent: "q2", replyContent: "a2", release: [] });

    expect(next).toMatchObject({ ok: true, merged: 2, skippedDuplicates: 0 });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["q1", "a1", "q2", "a2"]);

    await commit.commit(session, { pending: [], userContent: "q3", replyContent: "a3", release: [] });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["q1", "a1", "q2", "a2", "q3", "a3"]);
  });

  it("does not repeat carried turns the store already holds", async () => {
    store.throwOnRead = true;
    await commit.commit(session, { pending: [], userContent: "q1", replyContent: "a1", release: [] });
    store.throwOnRead = false;
    store.seed(session, [
      { role: "user", content: "q1" },
      { role: "assistant", content: "a1" },
    ]);

    const next = await commit.commit(session, { pending: [], userContent: "q2", replyContent: "a2", release: [] });
    expect(next).toMatchObject({ ok: true, merged: 0, skippedDuplicates: 2 });
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["q1", "a1", "q2", "a2"]);
  });

  it("reports a read failure without touching the buffer", async () => {
    store.seed(session, []);
    store.throwOnRead = true;
    const result = await bufferAndCommit("one");

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(Error);
    expect(buffer.size(session.key)).toBe(1);
    expect(store.updateCalls).toBe(0);
  });

  it("keeps turns buffered after the snapshot", async () => {
    buffer.append(session.key, turn("one"));
    const snapshot = buffer.snapshot(session.key);
    buffer.append(session.key, turn("late"));

    await commit.commit(session, { pending: [], userContent: "one", replyContent: "r", release: snapshot });

    expect(buffer.snapshot(session.key).map((t) => t.content)).toEqual(["late"]);
  });

  it("commits media turns with their description", async () => {
    await commit.commit(session, {
      pending: [turn("[Time: t] [Sender: A(ID: 1)] [photo]", "a red bicycle")],
      userContent: "what is this",
      replyContent: "a bike",
      release: [],
    });

    expect(store.turnsFor(session)[0]).toEqual({
      role: "user",
      content: "[Time: t] [Sender: A(ID: 1)] a red bicycle",
    });
  });

  it("times out a stalled store", async () => {
    const stalled: ConversationStore = {
      getCurrentId: () => new Promise<string | null>(() => {}),
      create: async () => "never",
      read: async () => [],
      update: async () => true,
    };
    const slow = new CommitProtocol({ store: stalled, buffer, logger: testLogger(), timeoutMs: 20 });
    const result = await slow.commit(session, { pending: [], userContent: "a", replyContent: "b", release: [] });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(TimeoutError);
  });

  it("serializes concurrent commits for one session", async () => {
    const [a, b] = await Promise.all([
      commit.commit(session, { pending: [], userContent: "q1", replyContent: "a1", release: [] }),
      commit.commit(session, { pending: [], userContent: "q2", replyContent: "a2", release: [] }),
    ]);

    expect(a.ok && b.ok).toBe(true);
    expect(store.turnsFor(session).map((t) => t.content)).toEqual(["q1", "a1", "q2", "a2"]);
    await commit.drain();
  });
});
