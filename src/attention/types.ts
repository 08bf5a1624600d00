export interface AttentionProfile {
  readonly userId: string;
  readonly userName: string;
  readonly attentionScore: number;
  readonly emotion: number;
  readonly lastInteraction: number;
  readonly interactionCount: number;
  readonly lastMessagePreview: string;
  /** Last time decay was applied; keeps lazy decay from compounding. */
  readonly updatedAt: number;
}

export interface InteractionInput {
  readonly boostStep: number;
  readonly decayStepForOthers: number;
  readonly emotionStep: number;
  readonly userName?: string;
  readonly preview?: string;
}

export interface AttentionSettings {
  readonly enabled: boolean;
  readonly maxTrackedUsers: number;
  readonly attentionHalfLifeSec: number;
  readonly emotionHalfLifeSec: number;
  readonly idleEvictionSec: number;
  readonly nearZero: number;
  readonly previewLength: number;
}

/** session key -> user id -> profile */
export type AttentionSnapshot = Record<string, Record<string, AttentionProfile>>;
