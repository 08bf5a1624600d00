import type { z } from "zod";
import type { MurmurConfig } from "../../src/config/types.js";
import { murmurConfigSchema, parseConfig } from "../../src/config/schema.js";
import { silentLogger, type Logger } from "../../src/logging/logger.js";
import type { InboundEvent } from "../../src/pipeline/event-pipeline.js";
import { sessionRef, type SessionRef } from "../../src/session/key.js";

export type ConfigInput = z.input<typeof murmurConfigSchema>;

/** Parsed config with defaults; overrides are the raw file shape. */
export function makeConfig(overrides: ConfigInput = {}): MurmurConfig {
  return parseConfig(overrides);
}

export function testLogger(): Logger {
  return silentLogger();
}

export function groupSession(conversationId = "chat-1", platform = "mock"): SessionRef {
  return sessionRef(platform, "group", conversationId);
}

export function makeEvent(overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    platform: "mock",
    kind: "group",
    conversationId: "chat-1",
    senderId: "user-1",
    senderName: "Alex",
    text: "Hello",
    ...overrides,
  };
}
