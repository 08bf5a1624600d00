import type { Logger } from "../logging/logger.js";
import { SessionKey } from "../utils/types.js";
import type { ProactiveSessionState, ProactiveSnapshot } from "./types.js";

const ACTIVITY_RETENTION_MS = 24 * 3_600_000;
const STALE_SESSION_MS = 7 * 86_400_000;

interface ProactiveStateStoreDeps {
  logger: Logger;
  onChange?: () => void;
}

export interface FailureResult {
  readonly failures: number;
  readonly enteredCooldown: boolean;
}

/**
 * Per-session silence, activity and cooldown bookkeeping for proactive
 * origination. Mutations contain no awaits, so each one is atomic.
 */
export class ProactiveStateStore {
  private readonly states = new Map<SessionKey, ProactiveSessionState>();
  private readonly logger: Logger;
  private readonly onChange: (() => void) | undefined;

  constructor(deps: ProactiveStateStoreDeps) {
    this.logger = deps.logger;
    this.onChange = deps.onChange;
  }

  get(session: SessionKey): ProactiveSessionState {
    return this.states.get(session) ?? this.blank();
  }

  has(session: SessionKey): boolean {
    return this.states.has(session);
  }

  sessions(): SessionKey[] {
    return [...this.states.keys()];
  }

  /**
   * Count a user message. A user event also disarms any pending temp boost
   * and clears the failure streak; returns whether a boost was disarmed.
   */
  recordUserMessage(session: SessionKey): boolean {
    const now = Date.now();
    const state = this.get(session);
    const timestamps = [...state.userMessageTimestamps, now].filter(
      (ts) => now - ts <= ACTIVITY_RETENTION_MS,
    );
    const disarmed = state.tempBoost !== undefined;

    this.put(session, {
      ...state,
      lastUserMessageTime: now,
      userMessageTimestamps: timestamps,
      consecutiveFailures: disarmed ? 0 : state.consecutiveFailures,
      tempBoost: undefined,
    });

    if (disarmed) {
      this.logger.debug({ session }, "User replied, temp boost disarmed");
    }
    return disarmed;
  }

  /** A delivered origination also ends the failure streak. */
  recordBotReply(session: SessionKey, proactive: boolean): void {
    const now = Date.now();
    const state = this.get(session);
    this.put(session, {
      ...state,
      lastBotReplyTime: now,
      lastProactiveTime: proactive ? now : state.lastProactiveTime,
      consecutiveFailures: proactive ? 0 : state.consecutiveFailures,
      userMessageTimestamps: [],
    });
  }

  recordFailure(session: SessionKey, maxFailures: number, cooldownSec: number): FailureResult {
    const state = this.get(session);
    const failures = state.consecutiveFailures + 1;

    if (failures >= maxFailures) {
      this.put(session, {
        ...state,
        consecutiveFailures: 0,
        cooldownUntil: Date.now() + cooldownSec * 1000,
        userMessageTimestamps: [],
      });
      this.logger.info({ session, failures, cooldownSec }, "Proactive cooldown entered");
      return { failures, enteredCooldown: true };
    }

    this.put(session, { ...state, consecutiveFailures: failures, userMessageTimestamps: [] });
    return { failures, enteredCooldown: false };
  }

  /** True while cooling down; an elapsed cooldown is cleared on read. */
  isInCooldown(session: SessionKey): boolean {
    const state = this.states.get(session);
    if (!state || state.cooldownUntil === 0) return false;
    if (Date.now() < state.cooldownUntil) return true;

    this.put(session, { ...state, cooldownUntil: 0 });
    this.logger.debug({ session }, "Proactive cooldown elapsed");
    return false;
  }

  resetSilenceTimer(session: SessionKey): void {
    const state = this.get(session);
    this.put(session, { ...state, lastBotReplyTime: Date.now() });
  }

  armTempBoost(session: SessionKey, value: number, durationSec: number): void {
    const now = Date.now();
    const state = this.get(session);
    this.put(session, {
      ...state,
      tempBoost: { value, until: now + durationSec * 1000, armedAt: now },
    });
  }

  /** Additive boost for the interactive gate; 0 when none is live. */
  getTempBoost(session: SessionKey): number {
    const boost = this.states.get(session)?.tempBoost;
    if (!boost || Date.now() >= boost.until) return 0;
    return boost.value;
  }

  /**
   * Drop boosts that ran out without a user reply and return their
   * sessions. Each one counts as an unanswered origination.
   */
  takeExpiredBoosts(): SessionKey[] {
    const now = Date.now();
    const expired: SessionKey[] = [];
    for (const [session, state] of this.states) {
      if (state.tempBoost && now >= state.tempBoost.until) {
        this.states.set(session, { ...state, tempBoost: undefined });
        expired.push(session);
      }
    }
    if (expired.length > 0) this.onChange?.();
    return expired;
  }

  /** User messages since the last bot reply, and how many fall in the window. */
  activity(session: SessionKey, windowSec: number): { total: number; recent: number } {
    const now = Date.now();
    const timestamps = this.get(session).userMessageTimestamps;
    const recent = timestamps.filter((ts) => now - ts <= windowSec * 1000).length;
    return { total: timestamps.length, recent };
  }

  /** Persistable copy; sessions without a user message in 7 days are left out. */
  snapshot(): ProactiveSnapshot {
    const now = Date.now();
    const out: ProactiveSnapshot = {};
    for (const [session, state] of this.states) {
      if (now - state.lastUserMessageTime < STALE_SESSION_MS) {
        out[session] = state;
      }
    }
    return out;
  }

  restore(snapshot: ProactiveSnapshot): void {
    this.states.clear();
    for (const [session, state] of Object.entries(snapshot)) {
      this.states.set(SessionKey.make(session), state);
    }
    this.logger.debug({ sessions: this.states.size }, "Proactive state restored");
  }

  private put(session: SessionKey, state: ProactiveSessionState): void {
    this.states.set(session, state);
    this.onChange?.();
  }

  private blank(): ProactiveSessionState {
    return {
      lastBotReplyTime: 0,
      lastUserMessageTime: 0,
      lastProactiveTime: 0,
      consecutiveFailures: 0,
      cooldownUntil: 0,
      userMessageTimestamps: [],
    };
  }
}
