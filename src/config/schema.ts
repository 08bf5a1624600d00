import { z } from "zod";
import type { MurmurConfig } from "./types.js";

const probability = z.number().min(0).max(1);
const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "expected HH:MM");

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const identitySchema = z.object({
  botId: z.string().min(1).default("murmur"),
  botName: z.string().min(1).optional(),
  mentionPattern: z.string().optional(),
});

const admissionSchema = z.object({
  initialProbability: probability.default(0.1),
  afterReplyProbability: probability.default(0.8),
  boostDurationSec: z.number().positive().default(300),
  triggerPhrases: z.array(z.string().min(1)).default([]),
  enabledSessions: z.array(z.string()).default([]),
  allowPrivate: z.boolean().default(false),
  judge: z.object({
    enabled: z.boolean().default(true),
    timeoutMs: z.number().int().positive().default(20_000),
  }).default({}),
});

const attentionSchema = z.object({
  enabled: z.boolean().default(true),
  maxTrackedUsers: z.number().int().positive().default(10),
  boostStep: probability.default(0.4),
  decayStepForOthers: probability.default(0.1),
  emotionStep: z.number().min(-1).max(1).default(0.1),
  attentionHalfLifeSec: z.number().positive().default(300),
  emotionHalfLifeSec: z.number().positive().default(1800),
  maxBoost: probability.default(0.8),
  minFloor: probability.default(0.05),
  idleEvictionSec: z.number().positive().default(3600),
  nearZero: probability.default(0.01),
  previewLength: z.number().int().nonnegative().default(50),
});

const frequencySchema = z.object({
  enabled: z.boolean().default(false),
  checkIntervalSec: z.number().positive().default(180),
  minMessages: z.number().int().positive().default(8),
  decreaseFactor: z.number().positive().max(1).default(0.85),
  increaseFactor: z.number().min(1).default(1.15),
  minProbability: z.number().gt(0).lt(1).default(0.05),
  maxProbability: z.number().gt(0).lt(1).default(0.95),
  timeoutMs: z.number().int().positive().default(20_000),
}).refine((f) => f.minProbability <= f.maxProbability, {
  message: "frequency.minProbability must not exceed frequency.maxProbability",
});

const bufferSchema = z.object({
  ttlSec: z.number().positive().default(1800),
  maxSize: z.number().int().positive().default(10),
});

const replySchema = z.object({
  timeoutMs: z.number().int().positive().default(60_000),
  deliveryTimeoutMs: z.number().int().positive().default(15_000),
  storeTimeoutMs: z.number().int().positive().default(10_000),
  maxContextMessages: z.number().int().positive().default(20),
  includeTimestamp: z.boolean().default(true),
  includeSender: z.boolean().default(true),
  extraHints: z.string().default(""),
});

const timePeriodSchema = z.object({
  start: clockTime,
  end: clockTime,
  factor: z.number().nonnegative(),
});

const proactiveSchema = z.object({
  enabled: z.boolean().default(false),
  checkIntervalSec: z.number().positive().default(60),
  silenceThresholdSec: z.number().nonnegative().default(600),
  requireUserActivity: z.boolean().default(true),
  minUserMessages: z.number().int().nonnegative().default(3),
  activityWindowSec: z.number().positive().default(300),
  probability: probability.default(0.3),
  maxFailures: z.number().int().positive().default(3),
  cooldownSec: z.number().nonnegative().default(1800),
  tempBoost: z.object({
    value: probability.default(0.5),
    durationSec: z.number().positive().default(120),
  }).default({}),
  enabledSessions: z.array(z.string()).default([]),
  prompt: z.string().min(1).default(
    "The chat has been quiet for a while. Start a light, natural topic that fits the recent conversation.",
  ),
  timezone: z.string().optional(),
  quietHours: z.object({
    enabled: z.boolean().default(false),
    start: clockTime.default("23:00"),
    end: clockTime.default("07:00"),
    transitionMinutes: z.number().int().nonnegative().default(30),
  }).default({}),
  timePeriods: z.object({
    enabled: z.boolean().default(false),
    periods: z.array(timePeriodSchema).default([]),
    transitionMinutes: z.number().int().nonnegative().default(45),
    minFactor: z.number().nonnegative().default(0),
    maxFactor: z.number().nonnegative().default(2),
    smooth: z.boolean().default(true),
  }).default({}),
});

const persistenceSchema = z.object({
  saveDebounceMs: z.number().int().nonnegative().default(5000),
  historyLimit: z.number().int().positive().default(200),
});

export const murmurConfigSchema = z.object({
  logging: loggingSchema.default({}),
  identity: identitySchema.default({}),
  admission: admissionSchema.default({}),
  attention: attentionSchema.default({}),
  frequency: frequencySchema.default({}),
  buffer: bufferSchema.default({}),
  reply: replySchema.default({}),
  proactive: proactiveSchema.default({}),
  persistence: persistenceSchema.default({}),
});

export function parseConfig(raw: unknown): MurmurConfig {
  return murmurConfigSchema.parse(raw);
}
