import { AdmissionController } from "../admission/controller.js";
import { FrequencyAdjuster } from "../admission/frequency.js";
import { ProbabilityState } from "../admission/probability.js";
import { AttentionStore } from "../attention/store.js";
import { CommitProtocol } from "../buffer/commit.js";
import { LocalHistoryLog } from "../buffer/local-history.js";
import { PendingBuffer } from "../buffer/pending-buffer.js";
import type { Collaborators } from "../collaborators/types.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getStateDir } from "../config/paths.js";
import type { MurmurConfig } from "../config/types.js";
import { componentLogger, createLogger, type Logger } from "../logging/logger.js";
import { StateSnapshotter } from "../persistence/state-file.js";
import { ContextLoader } from "../pipeline/context.js";
import { EventPipeline } from "../pipeline/event-pipeline.js";
import { ProactiveScheduler } from "../proactive/scheduler.js";
import { ProactiveStateStore } from "../proactive/state.js";

export interface EngineOptions {
  readonly collaborators: Collaborators;
  /** Parsed config; loaded from disk when omitted. */
  readonly config?: MurmurConfig;
  readonly configPath?: string;
  readonly stateDir?: string;
  readonly logger?: Logger;
  readonly random?: () => number;
  /** Register SIGTERM/SIGINT handlers that stop the engine. */
  readonly handleSignals?: boolean;
}

export interface Engine {
  readonly config: MurmurConfig;
  readonly logger: Logger;
  readonly pipeline: EventPipeline;
  readonly admission: AdmissionController;
  readonly attention: AttentionStore;
  readonly probability: ProbabilityState;
  readonly frequency: FrequencyAdjuster;
  readonly buffer: PendingBuffer;
  readonly commit: CommitProtocol;
  readonly proactiveState: ProactiveStateStore;
  readonly scheduler: ProactiveScheduler;
  readonly snapshotter: StateSnapshotter;
  stop(): Promise<void>;
}

export async function startEngine(options: EngineOptions): Promise<Engine> {
  // 1. Config + logger
  const config = options.config ?? loadConfig(options.configPath);
  const logger = options.logger ?? createLogger(config.logging);
  const stateDir = ensureDir(getStateDir(options.stateDir));
  const { collaborators } = options;

  // 2. State tables; changes schedule a debounced save
  let markDirty = (): void => {};
  const attention = new AttentionStore({
    settings: config.attention,
    logger: componentLogger(logger, "attention"),
    onChange: () => markDirty(),
  });
  const proactiveState = new ProactiveStateStore({
    logger: componentLogger(logger, "proactive-state"),
    onChange: () => markDirty(),
  });
  const snapshotter = new StateSnapshotter({
    dataDir: stateDir,
    attention,
    proactive: proactiveState,
    logger: componentLogger(logger, "persistence"),
    debounceMs: config.persistence.saveDebounceMs,
  });
  await snapshotter.load();
  markDirty = () => snapshotter.markDirty();

  // 3. Admission
  const probability = new ProbabilityState(componentLogger(logger, "probability"));
  const frequency = new FrequencyAdjuster({
    config: config.frequency,
    logger: componentLogger(logger, "frequency"),
    judge: collaborators.frequencyJudge,
  });
  const admission = new AdmissionController({
    admission: config.admission,
    attention: config.attention,
    identity: config.identity,
    probability,
    attentionStore: attention,
    frequency,
    proactive: proactiveState,
    logger: componentLogger(logger, "admission"),
    random: options.random,
  });

  // 4. Buffer + commit
  const buffer = new PendingBuffer(config.buffer.ttlSec * 1000, config.buffer.maxSize);
  const commit = new CommitProtocol({
    store: collaborators.store,
    buffer,
    logger: componentLogger(logger, "commit"),
    timeoutMs: config.reply.storeTimeoutMs,
  });
  const history = new LocalHistoryLog(
    stateDir,
    config.persistence.historyLimit,
    componentLogger(logger, "history"),
  );
  const context = new ContextLoader({
    store: collaborators.store,
    history,
    logger: componentLogger(logger, "context"),
    timeoutMs: config.reply.storeTimeoutMs,
  });

  // 5. Event path
  const pipeline = new EventPipeline({
    admission,
    frequency,
    buffer,
    commit,
    proactive: proactiveState,
    history,
    context,
    collaborators,
    config: { admission: config.admission, reply: config.reply },
    logger: componentLogger(logger, "pipeline"),
  });

  // 6. Proactive path
  const scheduler = new ProactiveScheduler({
    config: config.proactive,
    reply: config.reply,
    state: proactiveState,
    buffer,
    commit,
    context,
    history,
    generator: collaborators.generator,
    transport: collaborators.transport,
    logger: componentLogger(logger, "scheduler"),
    random: options.random,
  });
  scheduler.start();

  // 7. Shutdown (use 'once' to avoid handler accumulation)
  let stopping: Promise<void> | null = null;
  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      logger.info("Stopping engine");
      await scheduler.stop();
      await commit.drain();
      try {
        await snapshotter.flush();
      } catch (err) {
        logger.error({ err }, "Final state save failed");
      }
      snapshotter.dispose();
      logger.info("Engine stopped");
    })();
    return stopping;
  };

  if (options.handleSignals) {
    const onSignal = () => {
      stop().catch((err) => {
        logger.error({ err }, "Shutdown failed");
      });
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }

  logger.info(
    { stateDir, proactive: config.proactive.enabled, frequency: frequency.enabled },
    "Engine started",
  );

  return {
    config,
    logger,
    pipeline,
    admission,
    attention,
    probability,
    frequency,
    buffer,
    commit,
    proactiveState,
    scheduler,
    snapshotter,
    stop,
  };
}
