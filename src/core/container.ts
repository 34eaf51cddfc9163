/**
 * Composition root.
 *
 * Builds every component from the runtime config and wires them together:
 * ingress → router → distillers → (impressions) → higher distillers / Will
 * → motor executor → (outcome sensations) → router. All long-running parts
 * are registered with the supervisor as units.
 */

import { join, resolve } from 'node:path';
import type { Logger } from '../types/logger.js';
import type { Impression, Sensation } from '../types/entities.js';
import { compareLevels } from '../types/entities.js';
import { createLogger, createTranscriptLogger, setTranscriptLogger } from './logger.js';
import { type EventBus, createEventBus } from './event-bus.js';
import { type HealthMonitor, createHealthMonitor } from './system-health.js';
import { type Supervisor, createSupervisor } from './supervisor.js';
import { errorMessage } from './errors.js';
import { type RuntimeConfig, loadConfig } from '../config/index.js';
import type { Storage } from '../storage/storage.js';
import { createJSONStorage } from '../storage/json-storage.js';
import { type DeferredStorage, createDeferredStorage } from '../storage/deferred-storage.js';
import { type MemoryStore, createJsonMemoryStore } from '../memory/index.js';
import type { LLMProvider } from '../llm/provider.js';
import { createVercelAIProvider } from '../llm/vercel-ai-provider.js';
import {
  type MotorExecutor,
  type SpeechSink,
  LogMotor,
  ReadSourceMotor,
  RecallMotor,
  SpeakMotor,
  createLogSpeechSink,
  createMotorExecutor,
  createMotorRegistry,
} from '../motor/index.js';
import { type Distiller, createDistiller } from '../wit/index.js';
import { type DecisionEngine, createDecisionEngine } from '../will/index.js';
import {
  type PipeReader,
  type SensationRouter,
  type SocketIngress,
  type IngressAddress,
  createPipeReader,
  createSensationRouter,
  createSocketIngress,
} from '../ingress/index.js';

/**
 * Replacements for the parts that touch the outside world.
 */
export interface ContainerOverrides {
  logger?: Logger;
  storage?: Storage;
  /** Builds the model client for a unit (called on every unit start) */
  llmFactory?: (unit: string) => LLMProvider;
  speechSink?: SpeechSink;
  /** Skip the socket ingress and pipes */
  disableIngress?: boolean;
}

/**
 * Container holding all runtime components.
 */
export interface Container {
  config: RuntimeConfig;
  logger: Logger;
  bus: EventBus;
  health: HealthMonitor;
  storage: Storage;
  memory: MemoryStore;
  executor: MotorExecutor;
  router: SensationRouter;
  distillers: Map<string, Distiller>;
  /** null when the Will is disabled */
  will: DecisionEngine | null;
  supervisor: Supervisor;
  ingress: SocketIngress | null;
  pipes: PipeReader[];
  start(): void;
  shutdown(): Promise<void>;
}

function ingressAddress(config: RuntimeConfig): IngressAddress | null {
  if (config.ingress.socketPath) {
    return { socketPath: config.ingress.socketPath };
  }
  if (config.ingress.port !== null) {
    return { port: config.ingress.port, host: config.ingress.host };
  }
  return null;
}

/**
 * Model client factory from config: a local OpenAI-compatible server when
 * `baseUrl` is set, OpenRouter otherwise.
 */
function createLLMFactory(config: RuntimeConfig, logger: Logger): (unit: string) => LLMProvider {
  const { baseUrl, openRouterApiKey, model } = config.llm;
  if (!baseUrl && !openRouterApiKey) {
    logger.warn('No LLM configured (set OPENROUTER_API_KEY or LLM_BASE_URL); model calls will fail');
  }
  return (unit) => {
    const unitLogger = logger.child({ unit });
    if (baseUrl) {
      return createVercelAIProvider({ baseUrl, model }, unitLogger);
    }
    return createVercelAIProvider({ apiKey: openRouterApiKey ?? '', model }, unitLogger);
  };
}

/**
 * Build the runtime from a loaded config. Nothing runs until start().
 */
export function createContainer(config: RuntimeConfig, overrides: ContainerOverrides = {}): Container {
  const logger: Logger =
    overrides.logger ??
    createLogger({
      logDir: config.logging.logDir,
      maxFiles: config.logging.maxFiles,
      level: config.logging.level,
      pretty: config.logging.pretty,
    });
  if (!overrides.logger && config.logging.transcript) {
    setTranscriptLogger(createTranscriptLogger(config.logging.logDir));
  }

  const bus = createEventBus(logger);
  const health = createHealthMonitor(logger, bus, { degradedThreshold: config.health.degradedThreshold });

  // Strict durability writes through; best-effort batches writes in memory
  let deferred: DeferredStorage | null = null;
  let storage: Storage;
  if (overrides.storage) {
    storage = overrides.storage;
  } else {
    const fileStorage = createJSONStorage(join(config.paths.state, 'memory'), { logger });
    if (config.memory.durability === 'strict') {
      storage = fileStorage;
    } else {
      deferred = createDeferredStorage(fileStorage, logger, {
        flushIntervalMs: config.memory.flushIntervalMs,
        onFlushError: (error) => {
          health.recordFailure('storage', 'store', errorMessage(error));
        },
        onFlushSuccess: () => {
          health.recordSuccess('storage', 'store');
        },
      });
      storage = deferred;
    }
  }

  const memory = createJsonMemoryStore(logger, {
    storage,
    durability: config.memory.durability,
    unit: 'runtime',
    health,
  });
  const llmFactory = overrides.llmFactory ?? createLLMFactory(config, logger);
  const router = createSensationRouter(memory.handle('router'), logger);

  const feedback = (sensation: Sensation): void => {
    void router.deliver(sensation).catch((error: unknown) => {
      logger.error({ error: errorMessage(error) }, 'Failed to deliver motor feedback');
    });
  };

  const executor = createMotorExecutor(createMotorRegistry(), memory.handle('motor'), logger, {
    bus,
    config: {
      defaultTimeoutMs: config.motor.defaultTimeoutMs,
      dispatchPerSecond: config.motor.dispatchPerSecond,
    },
  });
  executor.register(
    new SpeakMotor(overrides.speechSink ?? createLogSpeechSink(logger), { timeoutMs: config.motor.speakTimeoutMs })
  );
  executor.register(new LogMotor(logger));
  executor.register(new ReadSourceMotor(resolve(config.motor.sourceRoot), feedback));
  executor.register(new RecallMotor(memory.handle('recall'), feedback));

  const will = config.will.enabled
    ? createDecisionEngine(
        {
          level: config.will.level,
          instructions: config.will.instructions,
          minIntervalMs: config.will.minIntervalMs,
          recallLimit: config.will.recallLimit,
          recentActions: config.will.recentActions,
          temperature: config.will.temperature,
          retry: config.will.retry,
        },
        { executor, logger, bus, health, llm: llmFactory('will'), memory: memory.handle('will') }
      )
    : null;

  const distillers = new Map<string, Distiller>();

  // An impression goes to every other distiller that takes its level, and to the Will
  const publish = (impression: Impression): void => {
    for (const [name, distiller] of distillers) {
      const takes = config.distillers.find((d) => d.name === name)?.levels ?? [];
      if (name !== impression.producer && takes.includes(impression.level)) {
        distiller.enqueue(impression);
      }
    }
    will?.notify(impression);
  };

  for (const distillerConfig of config.distillers) {
    const distiller = createDistiller(
      {
        name: distillerConfig.name,
        level: distillerConfig.level,
        instructions: distillerConfig.instructions,
        promptTemplate: distillerConfig.promptTemplate,
        batchSize: distillerConfig.batchSize,
        quiescenceMs: distillerConfig.quiescenceMs,
        recall: distillerConfig.recall,
        feedback: distillerConfig.feedback,
        temperature: distillerConfig.temperature,
        retry: distillerConfig.retry,
      },
      {
        logger,
        bus,
        health,
        llm: llmFactory(distillerConfig.name),
        memory: memory.handle(distillerConfig.name),
        route: (target, item) => distillers.get(target)?.enqueue(item) ?? false,
        onImpression: publish,
      }
    );
    distillers.set(distillerConfig.name, distiller);
    for (const path of distillerConfig.paths) {
      router.addRoute(path, distiller);
    }
  }

  const supervisor = createSupervisor({ logger, memory: memory.handle('supervisor'), bus }, config.supervisor);

  for (const distiller of distillers.values()) {
    supervisor.register({
      name: distiller.name,
      resources: () => ({ llm: llmFactory(distiller.name), memory: memory.handle(distiller.name) }),
      run: ({ signal, resources }) => distiller.run(signal, resources),
    });
  }

  if (will) {
    supervisor.register({
      name: 'will',
      resources: () => ({ llm: llmFactory('will'), memory: memory.handle('will') }),
      run: ({ signal, resources }) => will.run(signal, resources),
    });
  }

  let ingress: SocketIngress | null = null;
  const pipes: PipeReader[] = [];
  const address = overrides.disableIngress ? null : ingressAddress(config);
  if (address) {
    const socketIngress = createSocketIngress(
      address,
      (frame, device) => router.ingest(frame.path, frame.text, { device }),
      logger
    );
    ingress = socketIngress;
    supervisor.register({
      name: 'ingress',
      resources: () => undefined,
      run: ({ signal }) => socketIngress.run(signal),
    });
  }
  if (!overrides.disableIngress) {
    for (const pipeConfig of config.ingress.pipes) {
      const pipe = createPipeReader(
        pipeConfig,
        (path, text, device) => router.ingest(path, text, { device }),
        logger
      );
      pipes.push(pipe);
      supervisor.register({
        name: `pipe:${pipeConfig.name}`,
        resources: () => undefined,
        run: ({ signal }) => pipe.run(signal),
      });
    }
  }

  let started = false;
  let stopping: Promise<void> | null = null;

  const start = (): void => {
    if (started) return;
    started = true;
    deferred?.startAutoFlush();
    supervisor.start();
    logger.info(
      {
        distillers: [...distillers.keys()],
        will: will ? config.will.level : null,
        motors: executor.manifest().split('\n').length,
        routes: router.paths(),
      },
      'Runtime started'
    );
  };

  const stop = async (): Promise<void> => {
    logger.info('Shutting down...');
    await supervisor.shutdown();

    // Partial windows, lowest level first so higher levels see what it produced
    const ordered = [...distillers.values()].sort((a, b) => compareLevels(a.level, b.level));
    const flushSignal = AbortSignal.timeout(config.supervisor.shutdownTimeoutMs);
    for (const distiller of ordered) {
      distiller.close();
      try {
        await distiller.flush(
          { llm: llmFactory(distiller.name), memory: memory.handle(distiller.name) },
          flushSignal
        );
      } catch (error) {
        logger.error({ distiller: distiller.name, error: errorMessage(error) }, 'Final flush failed');
      }
    }
    will?.close();

    const cancelled = await executor.cancelAll('cancelled', 'Shutdown');
    if (cancelled.length > 0) {
      logger.info({ cancelled: cancelled.length }, 'Cancelled in-flight motor calls');
    }

    if (deferred) {
      await deferred.shutdown();
    }
    logger.info('Shutdown complete');
  };

  const shutdown = (): Promise<void> => {
    stopping ??= stop();
    return stopping;
  };

  return {
    config,
    logger,
    bus,
    health,
    storage,
    memory,
    executor,
    router,
    distillers,
    will,
    supervisor,
    ingress,
    pipes,
    start,
    shutdown,
  };
}

/**
 * Load config from disk and build the runtime.
 */
export async function createContainerAsync(
  configPath?: string,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const config = await loadConfig(configPath);
  return createContainer(config, overrides);
}
