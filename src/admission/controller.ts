import type { AttentionStore } from "../attention/store.js";
import type { AdmissionConfig, AttentionConfig, IdentityConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ProactiveStateStore } from "../proactive/state.js";
import type { SessionRef } from "../session/key.js";
import { clamp01 } from "../utils/decay.js";
import type { FrequencyAdjuster } from "./frequency.js";
import type { ProbabilityState } from "./probability.js";
import { detectTrigger } from "./triggers.js";

export interface AdmissionInput {
  readonly session: SessionRef;
  readonly userId: string;
  readonly text: string;
  readonly mentionsBot?: boolean;
  /** Another responder already answered this exact event. */
  readonly alreadyAnswered?: boolean;
}

export type AdmissionReason =
  | "direct_address"
  | "trigger_phrase"
  | "probability"
  | "already_answered"
  | "not_allowed"
  | "rejected";

export interface AdmissionDecision {
  readonly accept: boolean;
  readonly reason: AdmissionReason;
  /** Effective probability; absent when no draw happened. */
  readonly probability?: number;
  readonly roll?: number;
}

interface AdmissionControllerDeps {
  admission: AdmissionConfig;
  attention: AttentionConfig;
  identity: IdentityConfig;
  probability: ProbabilityState;
  attentionStore: AttentionStore;
  frequency: FrequencyAdjuster;
  proactive: ProactiveStateStore;
  logger: Logger;
  random?: () => number;
}

/**
 * Decides whether the responder engages with an inbound event. Explicit
 * triggers bypass the draw; otherwise one uniform draw against the
 * effective probability. Rejections mutate nothing.
 */
export class AdmissionController {
  private readonly admission: AdmissionConfig;
  private readonly attention: AttentionConfig;
  private readonly identity: IdentityConfig;
  private readonly probability: ProbabilityState;
  private readonly attentionStore: AttentionStore;
  private readonly frequency: FrequencyAdjuster;
  private readonly proactive: ProactiveStateStore;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly allowed: ReadonlySet<string>;

  constructor(deps: AdmissionControllerDeps) {
    this.admission = deps.admission;
    this.attention = deps.attention;
    this.identity = deps.identity;
    this.probability = deps.probability;
    this.attentionStore = deps.attentionStore;
    this.frequency = deps.frequency;
    this.proactive = deps.proactive;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
    this.allowed = new Set(deps.admission.enabledSessions);
  }

  isSessionAllowed(session: SessionRef): boolean {
    if (session.kind === "private" && !this.admission.allowPrivate) return false;
    return this.allowed.size === 0 || this.allowed.has(session.key);
  }

  async decide(input: AdmissionInput): Promise<AdmissionDecision> {
    const { session } = input;
    if (!this.isSessionAllowed(session)) {
      return { accept: false, reason: "not_allowed" };
    }

    const trigger = detectTrigger(
      { text: input.text, mentionsBot: input.mentionsBot },
      this.identity,
      this.admission.triggerPhrases,
    );
    if (trigger === "direct_address" && input.alreadyAnswered) {
      this.logger.debug({ session: session.key }, "Direct address already answered");
      return { accept: false, reason: "already_answered" };
    }
    if (trigger) {
      return { accept: true, reason: trigger };
    }

    const probability = await this.effectiveProbability(session, input.userId);
    const roll = this.random();
    const accept = roll < probability;

    this.logger.debug(
      { session: session.key, user: input.userId, probability, roll, accept },
      "Admission draw",
    );
    return { accept, reason: accept ? "probability" : "rejected", probability, roll };
  }

  /** Probability the next draw for this user would be made against. */
  async effectiveProbability(session: SessionRef, userId: string): Promise<number> {
    const base = this.frequency.baseFor(session.key, this.admission.initialProbability);
    let p = await this.probability.getCurrent(session.key, base);

    if (this.attention.enabled) {
      p = await this.attentionStore.computeAdjustedProbability(
        session.key,
        userId,
        p,
        this.attention.maxBoost,
        this.attention.minFloor,
      );
    }

    return clamp01(p + this.proactive.getTempBoost(session.key));
  }

  /** Bookkeeping after a reply was produced and delivered. */
  async onReplied(
    session: SessionRef,
    target: { userId: string; userName?: string; preview?: string },
  ): Promise<void> {
    await this.probability.boost(
      session.key,
      this.admission.afterReplyProbability,
      this.admission.boostDurationSec,
    );
    if (this.attention.enabled) {
      await this.attentionStore.recordInteraction(session.key, target.userId, {
        boostStep: this.attention.boostStep,
        decayStepForOthers: this.attention.decayStepForOthers,
        emotionStep: this.attention.emotionStep,
        userName: target.userName,
        preview: target.preview,
      });
    }
    this.proactive.recordBotReply(session.key, false);
  }
}
