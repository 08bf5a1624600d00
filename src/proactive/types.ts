export interface TempBoost {
  readonly value: number;
  readonly until: number;
  readonly armedAt: number;
}

export interface ProactiveSessionState {
  readonly lastBotReplyTime: number;
  readonly lastUserMessageTime: number;
  readonly lastProactiveTime: number;
  readonly consecutiveFailures: number;
  readonly cooldownUntil: number;
  /** User messages since the last bot reply, newest last. */
  readonly userMessageTimestamps: number[];
  readonly tempBoost?: TempBoost;
}

/** session key -> state */
export type ProactiveSnapshot = Record<string, ProactiveSessionState>;

export type SkipReason =
  | "disabled"
  | "not_allowed"
  | "cooldown"
  | "silence"
  | "inactive"
  | "quiet_hours"
  | "roll_failed";

export type Evaluation =
  | { readonly action: "skip"; readonly reason: SkipReason; readonly probability?: number }
  | { readonly action: "trigger"; readonly probability: number; readonly roll: number };

export type OriginationOutcome =
  | { readonly status: "sent"; readonly content: string; readonly committed: boolean }
  | { readonly status: "failed"; readonly reason: "no_reply" | "generation_failed" | "delivery_failed" };
