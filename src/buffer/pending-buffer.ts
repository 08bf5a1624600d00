import type { SessionKey } from "../utils/types.js";
import type { BufferedTurn } from "./types.js";

const DEFAULT_TTL_MS = 30 * 60_000; // 30 minutes
const DEFAULT_MAX_SIZE = 10;

/**
 * Messages seen but not yet committed to the durable record, per session.
 * Stale entries are purged before every append; overflow drops the oldest.
 */
export class PendingBuffer {
  private readonly entries = new Map<SessionKey, BufferedTurn[]>();

  constructor(
    private readonly ttlMs = DEFAULT_TTL_MS,
    private readonly maxSize = DEFAULT_MAX_SIZE,
  ) {}

  append(session: SessionKey, turn: BufferedTurn): number {
    const turns = this.purge(session);
    turns.push(turn);
    if (turns.length > this.maxSize) {
      turns.splice(0, turns.length - this.maxSize);
    }
    this.entries.set(session, turns);
    return turns.length;
  }

  /** Live entries, oldest first. The returned array is a copy. */
  snapshot(session: SessionKey): BufferedTurn[] {
    const turns = this.purge(session);
    if (turns.length === 0) this.entries.delete(session);
    return [...turns];
  }

  /**
   * Drop exactly the given entries. Anything appended after the caller took
   * its snapshot stays buffered.
   */
  remove(session: SessionKey, committed: readonly BufferedTurn[]): number {
    const turns = this.entries.get(session);
    if (!turns) return 0;
    const drop = new Set(committed);
    const kept = turns.filter((t) => !drop.has(t));
    if (kept.length === 0) {
      this.entries.delete(session);
    } else {
      this.entries.set(session, kept);
    }
    return turns.length - kept.length;
  }

  clear(session: SessionKey): void {
    this.entries.delete(session);
  }

  size(session: SessionKey): number {
    return this.purge(session).length;
  }

  private purge(session: SessionKey): BufferedTurn[] {
    const turns = this.entries.get(session);
    if (!turns) return [];
    const cutoff = Date.now() - this.ttlMs;
    const live = turns.filter((t) => t.timestamp >= cutoff);
    if (live.length !== turns.length) this.entries.set(session, live);
    return live;
  }
}
