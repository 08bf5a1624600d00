export { startEngine, type Engine, type EngineOptions } from "./engine/lifecycle.js";
export { EventPipeline, type InboundEvent, type PipelineOutcome } from "./pipeline/event-pipeline.js";
export { AdmissionController, type AdmissionDecision } from "./admission/controller.js";
export { ProbabilityState } from "./admission/probability.js";
export { FrequencyAdjuster, parseFrequencyJudgment } from "./admission/frequency.js";
export { parseJudgeVerdict } from "./admission/verdict.js";
export { detectTrigger, isDirectAddress, matchTriggerPhrase } from "./admission/triggers.js";
export { AttentionStore } from "./attention/store.js";
export type { AttentionProfile } from "./attention/types.js";
export { PendingBuffer } from "./buffer/pending-buffer.js";
export { CommitProtocol, type CommitResult } from "./buffer/commit.js";
export { spliceMediaDescription, formatTurnContent } from "./buffer/turn-format.js";
export { ProactiveScheduler } from "./proactive/scheduler.js";
export { ProactiveStateStore } from "./proactive/state.js";
export { quietHoursFactor, dynamicTimeFactor } from "./proactive/time-factors.js";
export { buildSessionKey, parseSessionKey, sessionRef, type SessionRef } from "./session/key.js";
export { decay } from "./utils/decay.js";
export { SessionKey } from "./utils/types.js";
export { withTimeout, TimeoutError } from "./utils/timeout.js";
export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export type { MurmurConfig } from "./config/types.js";
export type * from "./collaborators/types.js";
