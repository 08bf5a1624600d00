import type { Logger } from "../logging/logger.js";
import { clamp, clamp01, decay } from "../utils/decay.js";
import { Mutex } from "../utils/lock.js";
import type { SessionKey } from "../utils/types.js";
import type {
  AttentionProfile,
  AttentionSettings,
  AttentionSnapshot,
  InteractionInput,
} from "./types.js";

/** Attention above this bends the base probability toward `maxBoost`. */
const FOCUS_THRESHOLD = 0.1;
const EMOTION_WEIGHT = 0.3;
const PROBABILITY_CEILING = 0.98;
const UNFOCUSED_FACTOR = 0.8;

interface AttentionStoreDeps {
  settings: AttentionSettings;
  logger: Logger;
  onChange?: () => void;
}

/**
 * Per-session, per-user attention and emotion scores. Scores decay lazily
 * on access; every operation runs under one coarse table lock.
 */
export class AttentionStore {
  private readonly sessions = new Map<string, Map<string, AttentionProfile>>();
  private readonly lock = new Mutex();
  private readonly settings: AttentionSettings;
  private readonly logger: Logger;
  private readonly onChange: (() => void) | undefined;

  constructor(deps: AttentionStoreDeps) {
    this.settings = deps.settings;
    this.logger = deps.logger;
    this.onChange = deps.onChange;
  }

  get enabled(): boolean {
    return this.settings.enabled;
  }

  async recordInteraction(
    session: SessionKey,
    userId: string,
    input: InteractionInput,
  ): Promise<AttentionProfile> {
    return this.lock.runExclusive(() => {
      const now = Date.now();
      const profiles = this.profilesFor(session);
      const current = profiles.get(userId) ?? this.blankProfile(userId, now);
      const decayed = this.applyDecay(current, now);

      const updated: AttentionProfile = {
        ...decayed,
        userName: input.userName ?? decayed.userName,
        attentionScore: clamp01(decayed.attentionScore + input.boostStep),
        emotion: clamp(decayed.emotion + input.emotionStep, -1, 1),
        lastInteraction: now,
        interactionCount: decayed.interactionCount + 1,
        lastMessagePreview: this.truncate(input.preview ?? decayed.lastMessagePreview),
      };
      profiles.set(userId, updated);

      for (const [otherId, other] of profiles) {
        if (otherId === userId) continue;
        const faded = this.applyDecay(other, now);
        profiles.set(otherId, {
          ...faded,
          attentionScore: Math.max(0, faded.attentionScore - input.decayStepForOthers),
        });
      }

      this.evict(session, profiles, now);
      this.onChange?.();
      return updated;
    });
  }

  /**
   * Bias `base` by how much attention the user currently holds. Decays the
   * profile in place but never creates one.
   */
  async computeAdjustedProbability(
    session: SessionKey,
    userId: string,
    base: number,
    maxBoost: number,
    minFloor: number,
  ): Promise<number> {
    if (!this.settings.enabled) return base;

    return this.lock.runExclusive(() => {
      const profiles = this.sessions.get(session);
      const profile = profiles?.get(userId);
      if (!profiles || !profile) return base;

      const decayed = this.applyDecay(profile, Date.now());
      profiles.set(userId, decayed);

      if (decayed.attentionScore > FOCUS_THRESHOLD) {
        let p = base + (maxBoost - base) * decayed.attentionScore;
        p *= 1 + EMOTION_WEIGHT * decayed.emotion;
        p = Math.min(p, PROBABILITY_CEILING);
        p = Math.max(p, minFloor);
        return clamp01(p);
      }
      return clamp01(Math.max(base * UNFOCUSED_FACTOR, minFloor));
    });
  }

  async getProfile(session: SessionKey, userId: string): Promise<AttentionProfile | null> {
    return this.lock.runExclusive(() => {
      const profiles = this.sessions.get(session);
      const profile = profiles?.get(userId);
      if (!profiles || !profile) return null;
      const decayed = this.applyDecay(profile, Date.now());
      profiles.set(userId, decayed);
      return decayed;
    });
  }

  /** Profiles ordered by attention, strongest first. */
  async listProfiles(session: SessionKey): Promise<AttentionProfile[]> {
    return this.lock.runExclusive(() => {
      const profiles = this.sessions.get(session);
      if (!profiles) return [];
      const now = Date.now();
      for (const [id, profile] of profiles) {
        profiles.set(id, this.applyDecay(profile, now));
      }
      return [...profiles.values()].sort((a, b) => b.attentionScore - a.attentionScore);
    });
  }

  async clearSession(session: SessionKey): Promise<boolean> {
    return this.lock.runExclusive(() => {
      const removed = this.sessions.delete(session);
      if (removed) this.onChange?.();
      return removed;
    });
  }

  async snapshot(): Promise<AttentionSnapshot> {
    return this.lock.runExclusive(() => {
      const out: AttentionSnapshot = {};
      for (const [session, profiles] of this.sessions) {
        out[session] = Object.fromEntries(profiles);
      }
      return out;
    });
  }

  async restore(snapshot: AttentionSnapshot): Promise<void> {
    await this.lock.runExclusive(() => {
      this.sessions.clear();
      let count = 0;
      for (const [session, profiles] of Object.entries(snapshot)) {
        const map = new Map<string, AttentionProfile>();
        for (const [userId, profile] of Object.entries(profiles)) {
          map.set(userId, {
            ...profile,
            userId,
            attentionScore: clamp01(profile.attentionScore),
            emotion: clamp(profile.emotion, -1, 1),
          });
          count++;
        }
        if (map.size > 0) this.sessions.set(session, map);
      }
      this.logger.debug({ sessions: this.sessions.size, profiles: count }, "Attention state restored");
    });
  }

  private profilesFor(session: SessionKey): Map<string, AttentionProfile> {
    let profiles = this.sessions.get(session);
    if (!profiles) {
      profiles = new Map();
      this.sessions.set(session, profiles);
    }
    return profiles;
  }

  private blankProfile(userId: string, now: number): AttentionProfile {
    return {
      userId,
      userName: userId,
      attentionScore: 0,
      emotion: 0,
      lastInteraction: now,
      interactionCount: 0,
      lastMessagePreview: "",
      updatedAt: now,
    };
  }

  private applyDecay(profile: AttentionProfile, now: number): AttentionProfile {
    const elapsed = now - profile.updatedAt;
    if (elapsed <= 0) return profile;
    return {
      ...profile,
      attentionScore: clamp01(
        profile.attentionScore * decay(elapsed, this.settings.attentionHalfLifeSec * 1000),
      ),
      emotion: clamp(
        profile.emotion * decay(elapsed, this.settings.emotionHalfLifeSec * 1000),
        -1,
        1,
      ),
      updatedAt: now,
    };
  }

  private evict(session: SessionKey, profiles: Map<string, AttentionProfile>, now: number): void {
    const idleMs = this.settings.idleEvictionSec * 1000;
    let evicted = 0;

    for (const [id, profile] of profiles) {
      if (now - profile.lastInteraction > idleMs && profile.attentionScore < this.settings.nearZero) {
        profiles.delete(id);
        evicted++;
      }
    }

    const overflow = profiles.size - this.settings.maxTrackedUsers;
    if (overflow > 0) {
      const ranked = [...profiles.values()].sort(
        (a, b) => a.attentionScore - b.attentionScore || a.lastInteraction - b.lastInteraction,
      );
      for (const profile of ranked.slice(0, overflow)) {
        profiles.delete(profile.userId);
        evicted++;
      }
    }

    if (evicted > 0) {
      this.logger.debug({ session, evicted, remaining: profiles.size }, "Evicted attention profiles");
    }
  }

  private truncate(text: string): string {
    const limit = this.settings.previewLength;
    return text.length > limit ? text.slice(0, limit) : text;
  }
}
