import type { ConversationTurn } from "../collaborators/types.js";
import type { BufferedTurn } from "./types.js";

export interface MetadataOptions {
  readonly includeTimestamp: boolean;
  readonly includeSender: boolean;
}

export interface MessageMetadata {
  readonly text: string;
  readonly timestamp: number;
  readonly senderId: string;
  readonly senderName: string;
}

const METADATA_PREFIX = /^\[[^\]]*\]\s*\[[^\]]*\]\s?/;

/** "YYYY-MM-DD HH:mm:ss" in UTC. */
export function formatTimestamp(ts: number): string {
  return new Date(ts).toISOString().replace("T", " ").slice(0, 19);
}

/** `[Time: …] [Sender: name(ID: id)] text`, with either segment optional. */
export function formatTurnContent(meta: MessageMetadata, options: MetadataOptions): string {
  const segments: string[] = [];
  if (options.includeTimestamp) {
    segments.push(`[Time: ${formatTimestamp(meta.timestamp)}]`);
  }
  if (options.includeSender) {
    segments.push(`[Sender: ${meta.senderName}(ID: ${meta.senderId})]`);
  }
  segments.push(meta.text);
  return segments.join(" ");
}

/**
 * Replace the body of a metadata-prefixed turn with a media description,
 * keeping the first two bracketed segments. Content without that prefix
 * becomes the description alone.
 */
export function spliceMediaDescription(content: string, description: string): string {
  const match = METADATA_PREFIX.exec(content);
  if (!match) return description;
  const prefix = match[0].endsWith(" ") ? match[0] : `${match[0]} `;
  return prefix + description;
}

/** Content a buffered turn commits as. */
export function committedContent(turn: BufferedTurn): string {
  return turn.mediaDescription !== undefined
    ? spliceMediaDescription(turn.content, turn.mediaDescription)
    : turn.content;
}

export interface ContextParts {
  readonly history: readonly ConversationTurn[];
  readonly pending: readonly BufferedTurn[];
  readonly current: string;
  readonly maxMessages: number;
  readonly currentLabel?: string;
}

/**
 * Render the text handed to generators and judges: the tail of the durable
 * history, buffered turns not already in it, then the current message.
 */
export function renderContext(parts: ContextParts): string {
  const history = parts.history.slice(-parts.maxMessages);
  const seen = new Set(parts.history.map((t) => t.content));
  const unanswered = parts.pending
    .map(committedContent)
    .filter((content) => content !== parts.current && !seen.has(content));

  const sections: string[] = [];
  if (history.length > 0) {
    sections.push(
      ["[Conversation history]", ...history.map((t) => `${t.role}: ${t.content}`)].join("\n"),
    );
  }
  if (unanswered.length > 0) {
    sections.push(["[Unanswered messages]", ...unanswered].join("\n"));
  }
  sections.push(`${parts.currentLabel ?? "[Current message]"}\n${parts.current}`);
  return sections.join("\n\n");
}
