import type { Logger } from "../logging/logger.js";
import { clamp01 } from "../utils/decay.js";
import { Mutex } from "../utils/lock.js";
import type { SessionKey } from "../utils/types.js";

export interface ProbabilityEntry {
  readonly probability: number;
  readonly boostedUntil: number;
}

/**
 * Per-session "current vs. boosted" engagement probability. A boost holds
 * until `boostedUntil`; the first read at or after that instant drops it.
 */
export class ProbabilityState {
  private readonly entries = new Map<string, ProbabilityEntry>();
  private readonly lock = new Mutex();

  constructor(private readonly logger: Logger) {}

  async getCurrent(session: SessionKey, initial: number): Promise<number> {
    return this.lock.runExclusive(() => {
      const entry = this.entries.get(session);
      if (!entry) return initial;
      if (Date.now() < entry.boostedUntil) return entry.probability;

      this.entries.delete(session);
      this.logger.debug({ session }, "Probability boost expired");
      return initial;
    });
  }

  async boost(session: SessionKey, value: number, durationSec: number): Promise<void> {
    await this.lock.runExclusive(() => {
      const boostedUntil = Date.now() + durationSec * 1000;
      this.entries.set(session, { probability: clamp01(value), boostedUntil });
      this.logger.debug({ session, probability: value, boostedUntil }, "Probability boosted");
    });
  }

  async reset(session: SessionKey): Promise<void> {
    await this.lock.runExclusive(() => {
      this.entries.delete(session);
    });
  }

  async peek(session: SessionKey): Promise<ProbabilityEntry | null> {
    return this.lock.runExclusive(() => this.entries.get(session) ?? null);
  }
}
