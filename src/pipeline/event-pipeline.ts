import type { AdmissionController, AdmissionDecision } from "../admission/controller.js";
import type { FrequencyAdjuster } from "../admission/frequency.js";
import type { CommitProtocol } from "../buffer/commit.js";
import type { HistoryEntry, LocalHistoryLog } from "../buffer/local-history.js";
import type { PendingBuffer } from "../buffer/pending-buffer.js";
import { committedContent, formatTurnContent, renderContext } from "../buffer/turn-format.js";
import type { BufferedTurn } from "../buffer/types.js";
import type { Collaborators, ReplyHints } from "../collaborators/types.js";
import type { AdmissionConfig, ReplyConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ProactiveStateStore } from "../proactive/state.js";
import { sessionRef, type ChatKind, type SessionRef } from "../session/key.js";
import { settleWithin } from "../utils/timeout.js";
import type { ContextLoader } from "./context.js";

export interface InboundEvent {
  readonly platform: string;
  readonly kind: ChatKind;
  readonly conversationId: string;
  readonly senderId: string;
  readonly senderName?: string;
  readonly text: string;
  readonly timestamp?: number;
  readonly mentionsBot?: boolean;
  readonly alreadyAnswered?: boolean;
  /** Message text with media already described by the host. */
  readonly mediaDescription?: string;
}

export type NoReplyReason = "generation_failed" | "empty_reply" | "delivery_failed";

export type PipelineOutcome =
  | {
      readonly status: "replied";
      readonly decision: AdmissionDecision;
      readonly reply: string;
      readonly committed: boolean;
    }
  | { readonly status: "rejected"; readonly decision: AdmissionDecision; readonly vetoed: boolean }
  | { readonly status: "no_reply"; readonly decision: AdmissionDecision; readonly reason: NoReplyReason }
  | { readonly status: "error"; readonly error: unknown };

interface EventPipelineDeps {
  admission: AdmissionController;
  frequency: FrequencyAdjuster;
  buffer: PendingBuffer;
  commit: CommitProtocol;
  proactive: ProactiveStateStore;
  history: LocalHistoryLog;
  context: ContextLoader;
  collaborators: Collaborators;
  config: {
    admission: AdmissionConfig;
    reply: ReplyConfig;
  };
  logger: Logger;
}

/**
 * The event-driven path: buffer, decide, reply, commit. Every call settles
 * on a terminal outcome; nothing thrown here reaches the host.
 */
export class EventPipeline {
  private readonly deps: EventPipelineDeps;
  private readonly logger: Logger;

  constructor(deps: EventPipelineDeps) {
    this.deps = deps;
    this.logger = deps.logger;
  }

  async handle(event: InboundEvent): Promise<PipelineOutcome> {
    let log = this.logger.child({ sender: event.senderId });
    try {
      const session = sessionRef(event.platform, event.kind, event.conversationId);
      log = log.child({ session: session.key });
      return await this.process(event, session, log);
    } catch (err) {
      log.error({ err }, "Event processing failed");
      return { status: "error", error: err };
    }
  }

  private async process(
    event: InboundEvent,
    session: SessionRef,
    log: Logger,
  ): Promise<PipelineOutcome> {
    const { admission, buffer, proactive, config } = this.deps;
    const timestamp = event.timestamp ?? Date.now();
    const senderName = event.senderName ?? event.senderId;

    const turn: BufferedTurn = {
      role: "user",
      content: formatTurnContent(
        { text: event.text, timestamp, senderId: event.senderId, senderName },
        config.reply,
      ),
      timestamp,
      senderId: event.senderId,
      senderName,
      ...(event.mediaDescription !== undefined ? { mediaDescription: event.mediaDescription } : {}),
    };
    buffer.append(session.key, turn);
    const userContent = committedContent(turn);

    // The temp boost still counts for this event; the event itself disarms it
    const decision = await admission.decide({
      session,
      userId: event.senderId,
      text: event.text,
      mentionsBot: event.mentionsBot,
      alreadyAnswered: event.alreadyAnswered,
    });
    if (proactive.recordUserMessage(session.key)) {
      log.info("Reply to proactive message observed");
    }

    await this.maybeSampleFrequency(session, log);

    if (!decision.accept) {
      log.debug({ reason: decision.reason, probability: decision.probability }, "Event not admitted");
      await this.logLocal(session, [{ role: "user", content: userContent, timestamp, accepted: false }], log);
      return { status: "rejected", decision, vetoed: false };
    }

    const snapshot = buffer.snapshot(session.key);
    const earlier = snapshot.filter((t) => t !== turn);
    const history = await this.deps.context.load(session);
    const context = renderContext({
      history,
      pending: earlier,
      current: userContent,
      maxMessages: config.reply.maxContextMessages,
    });

    if (decision.reason === "probability" && !(await this.judgeApproves(context, log))) {
      await this.logLocal(session, [{ role: "user", content: userContent, timestamp, accepted: false }], log);
      return { status: "rejected", decision, vetoed: true };
    }

    const hints = await this.buildHints(session, event.senderId, senderName, log);
    const { generator, transport } = this.deps.collaborators;
    const generated = await settleWithin(
      () => generator.generate(context, hints),
      config.reply.timeoutMs,
      "reply generation",
    );
    if (!generated.ok) {
      log.warn({ err: generated.error, timedOut: generated.timedOut }, "Reply generation failed");
      return { status: "no_reply", decision, reason: "generation_failed" };
    }
    const reply = generated.value?.trim() ?? "";
    if (reply.length === 0) {
      log.info("Generator produced no reply");
      return { status: "no_reply", decision, reason: "empty_reply" };
    }

    const sent = await settleWithin(
      () => transport.send(session, reply),
      config.reply.deliveryTimeoutMs,
      "delivery",
    );
    if (!sent.ok || !sent.value) {
      log.warn(
        sent.ok ? { delivered: false } : { err: sent.error, timedOut: sent.timedOut },
        "Reply delivery failed",
      );
      return { status: "no_reply", decision, reason: "delivery_failed" };
    }

    const committed = await this.deps.commit.commit(session, {
      pending: earlier,
      userContent,
      replyContent: reply,
      release: snapshot,
    });

    await admission.onReplied(session, {
      userId: event.senderId,
      userName: senderName,
      preview: event.text,
    });
    await this.logLocal(
      session,
      [
        { role: "user", content: userContent, timestamp, accepted: true },
        { role: "assistant", content: reply, timestamp: Date.now() },
      ],
      log,
    );

    log.info(
      { reason: decision.reason, probability: decision.probability, committed: committed.ok },
      "Replied",
    );
    return { status: "replied", decision, reply, committed: committed.ok };
  }

  private async judgeApproves(context: string, log: Logger): Promise<boolean> {
    const judge = this.deps.collaborators.judge;
    const settings = this.deps.config.admission.judge;
    if (!judge || !settings.enabled) return true;

    const verdict = await settleWithin(() => judge.decide(context), settings.timeoutMs, "engagement judge");
    if (!verdict.ok) {
      log.warn({ err: verdict.error, timedOut: verdict.timedOut }, "Engagement judge failed, not replying");
      return false;
    }
    if (verdict.value === "reject") {
      log.debug("Engagement judge vetoed reply");
      return false;
    }
    return true;
  }

  private async buildHints(
    session: SessionRef,
    userId: string,
    senderName: string,
    log: Logger,
  ): Promise<ReplyHints> {
    const extra = this.deps.config.reply.extraHints || undefined;
    const memory = this.deps.collaborators.memory;
    if (!memory?.isAvailable()) {
      return { proactive: false, senderName, extra };
    }

    const recalled = await settleWithin(
      () => memory.recall(session, userId),
      this.deps.config.reply.storeTimeoutMs,
      "memory recall",
    );
    if (!recalled.ok) {
      log.warn({ err: recalled.error }, "Memory recall failed");
      return { proactive: false, senderName, extra };
    }
    return { proactive: false, senderName, extra, memory: recalled.value ?? undefined };
  }

  private async maybeSampleFrequency(session: SessionRef, log: Logger): Promise<void> {
    const { frequency, config } = this.deps;
    if (!frequency.enabled) return;

    frequency.recordMessage(session.key);
    if (!frequency.shouldSample(session.key)) return;

    const recent = await this.deps.context.load(session);
    const unanswered = this.deps.buffer.snapshot(session.key);
    const context = renderContext({
      history: recent,
      pending: unanswered,
      current: "",
      maxMessages: config.reply.maxContextMessages,
      currentLabel: "[Judge the responder's speaking frequency]",
    });
    const band = await frequency.sample(session.key, context, config.admission.initialProbability);
    log.debug({ band }, "Frequency sample complete");
  }

  private async logLocal(session: SessionRef, entries: HistoryEntry[], log: Logger): Promise<void> {
    try {
      await this.deps.history.append(session.key, entries);
    } catch (err) {
      log.warn({ err }, "Local history append failed");
    }
  }
}
