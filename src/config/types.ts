export interface MurmurConfig {
  readonly logging?: LoggingConfig;
  readonly identity: IdentityConfig;
  readonly admission: AdmissionConfig;
  readonly attention: AttentionConfig;
  readonly frequency: FrequencyConfig;
  readonly buffer: BufferConfig;
  readonly reply: ReplyConfig;
  readonly proactive: ProactiveConfig;
  readonly persistence: PersistenceConfig;
}

export interface LoggingConfig {
  readonly level?: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface IdentityConfig {
  readonly botId: string;
  readonly botName?: string;
  readonly mentionPattern?: string;
}

export interface JudgeConfig {
  readonly enabled: boolean;
  readonly timeoutMs: number;
}

export interface AdmissionConfig {
  readonly initialProbability: number;
  readonly afterReplyProbability: number;
  readonly boostDurationSec: number;
  readonly triggerPhrases: string[];
  readonly enabledSessions: string[];
  readonly allowPrivate: boolean;
  readonly judge: JudgeConfig;
}

export interface AttentionConfig {
  readonly enabled: boolean;
  readonly maxTrackedUsers: number;
  readonly boostStep: number;
  readonly decayStepForOthers: number;
  readonly emotionStep: number;
  readonly attentionHalfLifeSec: number;
  readonly emotionHalfLifeSec: number;
  readonly maxBoost: number;
  readonly minFloor: number;
  readonly idleEvictionSec: number;
  readonly nearZero: number;
  readonly previewLength: number;
}

export interface FrequencyConfig {
  readonly enabled: boolean;
  readonly checkIntervalSec: number;
  readonly minMessages: number;
  readonly decreaseFactor: number;
  readonly increaseFactor: number;
  readonly minProbability: number;
  readonly maxProbability: number;
  readonly timeoutMs: number;
}

export interface BufferConfig {
  readonly ttlSec: number;
  readonly maxSize: number;
}

export interface ReplyConfig {
  readonly timeoutMs: number;
  readonly deliveryTimeoutMs: number;
  readonly storeTimeoutMs: number;
  readonly maxContextMessages: number;
  readonly includeTimestamp: boolean;
  readonly includeSender: boolean;
  readonly extraHints: string;
}

export interface QuietHoursConfig {
  readonly enabled: boolean;
  readonly start: string; // "HH:MM"
  readonly end: string; // "HH:MM"
  readonly transitionMinutes: number;
}

export interface TimePeriod {
  readonly start: string;
  readonly end: string;
  readonly factor: number;
}

export interface TimePeriodsConfig {
  readonly enabled: boolean;
  readonly periods: TimePeriod[];
  readonly transitionMinutes: number;
  readonly minFactor: number;
  readonly maxFactor: number;
  readonly smooth: boolean;
}

export interface ProactiveConfig {
  readonly enabled: boolean;
  readonly checkIntervalSec: number;
  readonly silenceThresholdSec: number;
  readonly requireUserActivity: boolean;
  readonly minUserMessages: number;
  readonly activityWindowSec: number;
  readonly probability: number;
  readonly maxFailures: number;
  readonly cooldownSec: number;
  readonly tempBoost: {
    readonly value: number;
    readonly durationSec: number;
  };
  readonly enabledSessions: string[];
  readonly prompt: string;
  readonly timezone?: string; // IANA timezone, host clock when absent
  readonly quietHours: QuietHoursConfig;
  readonly timePeriods: TimePeriodsConfig;
}

export interface PersistenceConfig {
  readonly saveDebounceMs: number;
  readonly historyLimit: number;
}
