/**
 * Exponential half-life decay factor for an elapsed interval.
 * Returns 1 for non-positive elapsed time and 0.5 after exactly one half-life.
 */
export function decay(elapsedMs: number, halfLifeMs: number): number {
  if (elapsedMs <= 0) return 1;
  if (halfLifeMs <= 0) return 0;
  return 0.5 ** (elapsedMs / halfLifeMs);
}

export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}
