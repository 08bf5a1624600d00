import { describe, it, expect } from "vitest";
import {
  committedContent,
  formatTimestamp,
  formatTurnContent,
  renderContext,
  spliceMediaDescription,
} from "../../src/buffer/turn-format.js";
import type { BufferedTurn } from "../../src/buffer/types.js";

const TS = Date.UTC(2026, 0, 2, 3, 4, 5);
const META = { text: "hi", timestamp: TS, senderId: "u1", senderName: "Alex" };

function pending(content: string, mediaDescription?: string): BufferedTurn {
  return { role: "user", content, timestamp: TS, senderId: "u1", senderName: "Alex", mediaDescription };
}

describe("formatTurnContent", () => {
  it("formats timestamps in UTC", () => {
    expect(formatTimestamp(TS)).toBe("2026-01-02 03:04:05");
  });

  it("prefixes time and sender", () => {
    expect(formatTurnContent(META, { includeTimestamp: true, includeSender: true })).toBe(
      "[Time: 2026-01-02 03:04:05] [Sender: Alex(ID: u1)] hi",
    );
  });

  it("omits disabled segments", () => {
    expect(formatTurnContent(META, { includeTimestamp: false, includeSender: true })).toBe(
      "[Sender: Alex(ID: u1)] hi",
    );
    expect(formatTurnContent(META, { includeTimestamp: false, includeSender: false })).toBe("hi");
  });
});

describe("spliceMediaDescription", () => {
  it("keeps the metadata prefix and swaps the body", () => {
    expect(spliceMediaDescription("[Time: t] [Sender: A(ID: 1)] [image]", "a cat on a mat")).toBe(
      "[Time: t] [Sender: A(ID: 1)] a cat on a mat",
    );
  });

  it("adds the separating space when the body was empty", () => {
    expect(spliceMediaDescription("[Time: t] [Sender: A(ID: 1)]", "a cat")).toBe(
      "[Time: t] [Sender: A(ID: 1)] a cat",
    );
  });

  it("falls back to the description alone without a two-segment prefix", () => {
    expect(spliceMediaDescription("plain photo", "a cat")).toBe("a cat");
    expect(spliceMediaDescription("[Sender: A(ID: 1)] photo", "a cat")).toBe("a cat");
  });

  it("uses the description only for turns that carry one", () => {
    expect(committedContent(pending("[Time: t] [Sender: A(ID: 1)] [photo]", "a dog"))).toBe(
      "[Time: t] [Sender: A(ID: 1)] a dog",
    );
    expect(committedContent(pending("plain text"))).toBe("plain text");
  });
});

describe("renderContext", () => {
  it("renders history, unanswered turns and the current message", () => {
    const text = renderContext({
      history: [
        { role: "user", content: "a" },
        { role: "assistant", content: "b" },
      ],
      pending: [pending("a"), pending("c"), pending("d")],
      current: "d",
      maxMessages: 20,
    });

    expect(text).toBe(
      "[Conversation history]\nuser: a\nassistant: b\n\n[Unanswered messages]\nc\n\n[Current message]\nd",
    );
  });

  it("trims history to the newest turns but still dedups against all of it", () => {
    const text = renderContext({
      history: [
        { role: "user", content: "a" },
        { role: "assistant", content: "b" },
      ],
      pending: [pending("a")],
      current: "now",
      maxMessages: 1,
      currentLabel: "[Task]",
    });

    expect(text).toBe("[Conversation history]\nassistant: b\n\n[Task]\nnow");
  });

  it("renders only the current message when nothing else exists", () => {
    expect(renderContext({ history: [], pending: [], current: "x", maxMessages: 5 })).toBe(
      "[Current message]\nx",
    );
  });
});
