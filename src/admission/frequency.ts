import type { FrequencyConfig } from "../config/types.js";
import type { FrequencyJudge, FrequencyJudgment } from "../collaborators/types.js";
import type { Logger } from "../logging/logger.js";
import { clamp } from "../utils/decay.js";
import { settleWithin } from "../utils/timeout.js";
import type { SessionKey } from "../utils/types.js";

interface SampleWindow {
  lastCheckTime: number;
  messageCount: number;
}

interface FrequencyAdjusterDeps {
  config: FrequencyConfig;
  logger: Logger;
  judge?: FrequencyJudge;
}

/** Longest free-text verdict still treated as an answer. */
const MAX_VERDICT_LENGTH = 20;

/**
 * Periodic "is the bot talking too much?" feedback. Each completed sample
 * nudges the session's base probability band by a multiplicative factor.
 */
export class FrequencyAdjuster {
  private readonly windows = new Map<string, SampleWindow>();
  private readonly bands = new Map<string, number>();
  private readonly config: FrequencyConfig;
  private readonly logger: Logger;
  private readonly judge: FrequencyJudge | undefined;

  constructor(deps: FrequencyAdjusterDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.judge = deps.judge;
  }

  get enabled(): boolean {
    return this.config.enabled && this.judge !== undefined;
  }

  recordMessage(session: SessionKey): number {
    const window = this.windowFor(session);
    window.messageCount++;
    return window.messageCount;
  }

  /**
   * True only when the sampling interval has elapsed and enough messages
   * arrived since the last sample. Never mutates on false.
   */
  shouldSample(session: SessionKey, messagesSinceLastCheck?: number): boolean {
    const window = this.windowFor(session);
    const count = messagesSinceLastCheck ?? window.messageCount;
    const elapsed = Date.now() - window.lastCheckTime;
    return elapsed > this.config.checkIntervalSec * 1000 && count >= this.config.minMessages;
  }

  adjust(current: number, judgment: FrequencyJudgment): number {
    let next = current;
    if (judgment === "too_frequent") {
      next = current * this.config.decreaseFactor;
    } else if (judgment === "too_quiet") {
      next = current * this.config.increaseFactor;
    }
    return clamp(next, this.config.minProbability, this.config.maxProbability);
  }

  completeSample(session: SessionKey): void {
    this.windows.set(session, { lastCheckTime: Date.now(), messageCount: 0 });
  }

  /** The session's adjusted base probability, or `configured` before any sample moved it. */
  baseFor(session: SessionKey, configured: number): number {
    return this.bands.get(session) ?? configured;
  }

  /**
   * Ask the judge about recent traffic and fold the answer into the band.
   * Judge failures and timeouts still complete the sample.
   */
  async sample(session: SessionKey, recentContext: string, configured: number): Promise<number> {
    const current = this.baseFor(session, configured);
    if (!this.judge) {
      this.completeSample(session);
      return current;
    }

    const judge = this.judge;
    const result = await settleWithin(
      () => judge.judge(recentContext),
      this.config.timeoutMs,
      "frequency judge",
    );
    this.completeSample(session);

    if (!result.ok) {
      this.logger.warn(
        { session, err: result.error, timedOut: result.timedOut },
        "Frequency judgment failed",
      );
      return current;
    }
    if (result.value === null) {
      this.logger.debug({ session }, "Frequency judge gave no verdict");
      return current;
    }

    const next = this.adjust(current, result.value);
    this.bands.set(session, next);
    this.logger.info(
      { session, judgment: result.value, from: current, to: next },
      "Frequency band adjusted",
    );
    return next;
  }

  private windowFor(session: SessionKey): SampleWindow {
    let window = this.windows.get(session);
    if (!window) {
      window = { lastCheckTime: Date.now(), messageCount: 0 };
      this.windows.set(session, window);
    }
    return window;
  }
}

/** Map free-text judge output onto a judgment; `null` when unreadable. */
export function parseFrequencyJudgment(text: string): FrequencyJudgment | null {
  const cleaned = text
    .trim()
    .toLowerCase()
    .replace(/[.!。！]+$/u, "")
    .replace(/[\s-]+/g, "_");

  if (cleaned === "too_frequent" || cleaned === "too_quiet" || cleaned === "normal") {
    return cleaned;
  }
  if (cleaned.length > MAX_VERDICT_LENGTH) return null;

  if (cleaned.includes("frequent")) return "too_frequent";
  if (cleaned.includes("quiet") || cleaned.includes("rare")) return "too_quiet";
  if (cleaned.includes("normal")) return "normal";
  return null;
}
