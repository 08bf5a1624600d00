import type { SessionRef } from "../session/key.js";

// ── Conversation record ──

export type TurnRole = "user" | "assistant";

export interface ConversationTurn {
  readonly role: TurnRole;
  readonly content: string;
}

/**
 * Durable per-session conversation record. One contract: implementations
 * are never probed for alternative method names.
 */
export interface ConversationStore {
  getCurrentId(session: SessionRef): Promise<string | null>;
  create(session: SessionRef, title: string): Promise<string>;
  read(session: SessionRef, conversationId: string): Promise<ConversationTurn[]>;
  /** Replace the full content. Resolves `true` only when the write landed. */
  update(
    session: SessionRef,
    conversationId: string,
    turns: readonly ConversationTurn[],
  ): Promise<boolean>;
}

// ── Language-model collaborators ──

export interface ReplyHints {
  readonly proactive: boolean;
  readonly senderName?: string;
  readonly memory?: string;
  readonly extra?: string;
}

export interface ReplyGenerator {
  /** Resolves `null` when nothing should be said. */
  generate(context: string, hints: ReplyHints): Promise<string | null>;
}

export type JudgeVerdict = "accept" | "reject";

export interface EngagementJudge {
  decide(context: string): Promise<JudgeVerdict>;
}

export type FrequencyJudgment = "too_frequent" | "too_quiet" | "normal";

export interface FrequencyJudge {
  judge(recentContext: string): Promise<FrequencyJudgment | null>;
}

// ── Transport ──

export interface DeliveryTransport {
  send(session: SessionRef, content: string): Promise<boolean>;
}

// ── Optional capabilities ──

export interface MemoryProvider {
  /** Explicit capability query; recall is skipped when false. */
  isAvailable(): boolean;
  recall(session: SessionRef, userId: string): Promise<string | null>;
}

export interface Collaborators {
  readonly store: ConversationStore;
  readonly generator: ReplyGenerator;
  readonly transport: DeliveryTransport;
  readonly judge?: EngagementJudge;
  readonly frequencyJudge?: FrequencyJudge;
  readonly memory?: MemoryProvider;
}
