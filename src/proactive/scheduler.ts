import { setTimeout as sleep } from "node:timers/promises";
import type { CommitProtocol } from "../buffer/commit.js";
import type { LocalHistoryLog } from "../buffer/local-history.js";
import type { PendingBuffer } from "../buffer/pending-buffer.js";
import { renderContext } from "../buffer/turn-format.js";
import type { DeliveryTransport, ReplyGenerator } from "../collaborators/types.js";
import type { ProactiveConfig, ReplyConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { ContextLoader } from "../pipeline/context.js";
import { parseSessionKey, type SessionRef } from "../session/key.js";
import { clamp01 } from "../utils/decay.js";
import { settleWithin } from "../utils/timeout.js";
import type { SessionKey } from "../utils/types.js";
import type { ProactiveStateStore } from "./state.js";
import { dynamicTimeFactor, minuteOfDay, quietHoursFactor } from "./time-factors.js";
import type { Evaluation, OriginationOutcome } from "./types.js";

const PROMPT_HEADER = "[Proactive topic]";

interface ProactiveSchedulerDeps {
  config: ProactiveConfig;
  reply: ReplyConfig;
  state: ProactiveStateStore;
  buffer: PendingBuffer;
  commit: CommitProtocol;
  context: ContextLoader;
  history: LocalHistoryLog;
  generator: ReplyGenerator;
  transport: DeliveryTransport;
  logger: Logger;
  random?: () => number;
}

/**
 * Background loop that starts a conversation in sessions that went quiet.
 * One pass per interval; each session is evaluated in isolation so one
 * failure never aborts the pass.
 */
export class ProactiveScheduler {
  private readonly config: ProactiveConfig;
  private readonly reply: ReplyConfig;
  private readonly state: ProactiveStateStore;
  private readonly buffer: PendingBuffer;
  private readonly commit: CommitProtocol;
  private readonly context: ContextLoader;
  private readonly history: LocalHistoryLog;
  private readonly generator: ReplyGenerator;
  private readonly transport: DeliveryTransport;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly allowed: ReadonlySet<string>;

  private abort: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(deps: ProactiveSchedulerDeps) {
    this.config = deps.config;
    this.reply = deps.reply;
    this.state = deps.state;
    this.buffer = deps.buffer;
    this.commit = deps.commit;
    this.context = deps.context;
    this.history = deps.history;
    this.generator = deps.generator;
    this.transport = deps.transport;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
    this.allowed = new Set(deps.config.enabledSessions);
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (!this.config.enabled || this.loop) return;
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal);
    this.logger.info({ intervalSec: this.config.checkIntervalSec }, "Proactive scheduler started");
  }

  /** Interrupts the sleep and waits for an in-flight pass to finish. */
  async stop(): Promise<void> {
    if (!this.abort || !this.loop) return;
    this.abort.abort();
    await this.loop;
    this.abort = null;
    this.loop = null;
    this.logger.info("Proactive scheduler stopped");
  }

  async tick(signal?: AbortSignal): Promise<void> {
    for (const session of this.state.takeExpiredBoosts()) {
      this.logger.debug({ session }, "Proactive message went unanswered");
      this.recordFailure(session, "unanswered");
    }

    for (const session of this.state.sessions()) {
      if (signal?.aborted) break;
      try {
        const evaluation = this.evaluate(session);
        if (evaluation.action === "skip") {
          this.logger.debug(
            { session, reason: evaluation.reason, probability: evaluation.probability },
            "Proactive check skipped",
          );
          continue;
        }
        this.logger.info(
          { session, probability: evaluation.probability, roll: evaluation.roll },
          "Proactive origination triggered",
        );
        await this.originate(session);
      } catch (err) {
        this.logger.error({ err, session }, "Proactive check failed");
      }
    }
  }

  /**
   * Gate checks in order: allow-list, cooldown, silence, activity, time of
   * day, then one draw. A failed draw restarts the silence timer.
   */
  evaluate(session: SessionKey): Evaluation {
    if (!this.config.enabled) return { action: "skip", reason: "disabled" };
    if (!this.isSessionAllowed(session)) return { action: "skip", reason: "not_allowed" };
    if (this.state.isInCooldown(session)) return { action: "skip", reason: "cooldown" };

    const now = Date.now();
    const current = this.state.get(session);
    if (now - current.lastBotReplyTime < this.config.silenceThresholdSec * 1000) {
      return { action: "skip", reason: "silence" };
    }

    if (this.config.requireUserActivity) {
      const activity = this.state.activity(session, this.config.activityWindowSec);
      const needed = this.config.minUserMessages;
      if (activity.total < needed || activity.recent < needed) {
        return { action: "skip", reason: "inactive" };
      }
    }

    const minute = minuteOfDay(new Date(now), this.config.timezone);
    const quiet = quietHoursFactor(minute, this.config.quietHours);
    if (quiet === 0) return { action: "skip", reason: "quiet_hours", probability: 0 };

    const probability = clamp01(
      this.config.probability * quiet * dynamicTimeFactor(minute, this.config.timePeriods),
    );
    const roll = this.random();
    if (roll >= probability) {
      this.state.resetSilenceTimer(session);
      return { action: "skip", reason: "roll_failed", probability };
    }
    return { action: "trigger", probability, roll };
  }

  async originate(session: SessionKey): Promise<OriginationOutcome> {
    const ref = parseSessionKey(session);
    if (!ref) {
      this.logger.warn({ session }, "Unparseable session key");
      return { status: "failed", reason: "no_reply" };
    }
    const log = this.logger.child({ session });

    const history = await this.context.load(ref);
    const pending = this.buffer.snapshot(session);
    const prompt = `${PROMPT_HEADER}\n${this.config.prompt}`;
    const context = renderContext({
      history,
      pending,
      current: prompt,
      maxMessages: this.reply.maxContextMessages,
      currentLabel: "[Task]",
    });

    const generated = await settleWithin(
      () => this.generator.generate(context, { proactive: true, extra: this.reply.extraHints || undefined }),
      this.reply.timeoutMs,
      "proactive generation",
    );
    if (!generated.ok) {
      log.warn({ err: generated.error, timedOut: generated.timedOut }, "Proactive generation failed");
      return this.recordFailure(session, "generation_failed");
    }
    const content = generated.value?.trim() ?? "";
    if (content.length === 0) {
      log.info("Generator declined to start a topic");
      return this.recordFailure(session, "no_reply");
    }

    const sent = await settleWithin(
      () => this.transport.send(ref, content),
      this.reply.deliveryTimeoutMs,
      "proactive delivery",
    );
    if (!sent.ok || !sent.value) {
      log.warn(sent.ok ? { delivered: false } : { err: sent.error }, "Proactive delivery failed");
      return this.recordFailure(session, "delivery_failed");
    }

    const committed = await this.commit.commit(ref, {
      pending,
      userContent: prompt,
      replyContent: content,
      release: [],
    });

    this.state.recordBotReply(session, true);
    this.state.armTempBoost(session, this.config.tempBoost.value, this.config.tempBoost.durationSec);
    await this.logLocal(ref, content, log);

    log.info({ committed: committed.ok }, "Proactive message sent");
    return { status: "sent", content, committed: committed.ok };
  }

  isSessionAllowed(session: SessionKey): boolean {
    return this.allowed.size === 0 || this.allowed.has(session);
  }

  private recordFailure(
    session: SessionKey,
    reason: "no_reply" | "generation_failed" | "delivery_failed" | "unanswered",
  ): OriginationOutcome {
    const result = this.state.recordFailure(session, this.config.maxFailures, this.config.cooldownSec);
    this.logger.debug({ session, reason, failures: result.failures }, "Proactive failure recorded");
    return { status: "failed", reason: reason === "unanswered" ? "no_reply" : reason };
  }

  private async logLocal(ref: SessionRef, content: string, log: Logger): Promise<void> {
    try {
      await this.history.append(ref.key, [{ role: "assistant", content, timestamp: Date.now() }]);
    } catch (err) {
      log.warn({ err }, "Local history append failed");
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.config.checkIntervalSec * 1000;
    while (!signal.aborted) {
      try {
        await sleep(intervalMs, undefined, { signal, ref: false });
      } catch (err) {
        if (signal.aborted) return;
        this.logger.error({ err }, "Proactive scheduler sleep failed");
        return;
      }
      try {
        await this.tick(signal);
      } catch (err) {
        this.logger.error({ err }, "Proactive tick error");
      }
    }
  }
}
