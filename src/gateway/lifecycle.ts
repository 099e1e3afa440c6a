import { loadConfig } from "../config/loader.js";
import { prepareStateDir } from "../config/paths.js";
import type { PacerConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { CoachingDB } from "../store/db.js";
import { PromptStore } from "../prompts/store.js";
import { PreferenceStore } from "../preferences/store.js";
import { FrequencyController } from "../frequency/controller.js";
import { TimingDetector } from "../detection/detector.js";
import type { ActivitySource, HeuristicDetector } from "../detection/types.js";
import { HttpContentSynthesizer } from "../synthesis/http-synthesizer.js";
import { TemplateContentSynthesizer } from "../synthesis/template-synthesizer.js";
import type { ContentSynthesizer } from "../synthesis/types.js";
import { PromptAssembler } from "../pipeline/assembler.js";
import { CoachingCycle } from "../pipeline/coaching-cycle.js";
import { InMemoryPubSub, type PubSub } from "../connections/pubsub.js";
import { SqlitePresenceStore } from "../connections/presence.js";
import { ConnectionRegistry } from "../connections/registry.js";
import { InAppSink, WebhookSink } from "../delivery/sinks.js";
import type { ChannelSink } from "../delivery/channels.js";
import { DeliveryDispatcher } from "../delivery/dispatcher.js";
import { ResponseHandler, type CoachingSideEffects } from "../response/handler.js";
import { HttpActivitySource, HttpSideEffects } from "../integrations/http.js";
import { LoggingSideEffects, StaticActivitySource } from "../integrations/local.js";
import { JobScheduler } from "../cron/service.js";
import { CoachingServer } from "./server.js";

export interface EngineOptions {
  configPath?: string;
  config?: PacerConfig;
  logger?: Logger;
  stateDir?: string;
  activitySource?: ActivitySource;
  sideEffects?: CoachingSideEffects;
  synthesizer?: ContentSynthesizer;
  heuristic?: HeuristicDetector;
  pubsub?: PubSub;
  /** Skip binding the HTTP port. */
  listen?: boolean;
  /** Install SIGTERM/SIGINT handlers. */
  handleSignals?: boolean;
}

export interface EngineContext {
  config: PacerConfig;
  logger: Logger;
  db: CoachingDB;
  store: PromptStore;
  preferences: PreferenceStore;
  controller: FrequencyController;
  registry: ConnectionRegistry;
  dispatcher: DeliveryDispatcher;
  assembler: PromptAssembler;
  cycle: CoachingCycle;
  responses: ResponseHandler;
  scheduler: JobScheduler;
  server: CoachingServer;
  shutdown(): Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 15_000;

function buildSinks(config: PacerConfig, registry: ConnectionRegistry): ChannelSink[] {
  const sinks: ChannelSink[] = [new InAppSink(registry, config.delivery.ackTimeoutMs)];
  const { push, email } = config.delivery.webhooks;
  if (push) sinks.push(new WebhookSink("push", push));
  if (email) sinks.push(new WebhookSink("email", email));
  return sinks;
}

export async function startEngine(options: EngineOptions = {}): Promise<EngineContext> {
  // 1. Config and logger
  const config = options.config ?? loadConfig(options.configPath);
  const logger = options.logger ?? createLogger(config.logging);
  logger.info("Starting coaching engine...");

  // 2. Storage
  const stateDir = prepareStateDir(options.stateDir);
  const db = new CoachingDB(stateDir);
  const store = new PromptStore(db);
  const preferences = new PreferenceStore(db, config.frequency.defaults);

  // 3. External collaborators
  const { baseUrl } = config.integrations;
  const activitySource = options.activitySource
    ?? (baseUrl ? new HttpActivitySource({ ...config.integrations, baseUrl }) : new StaticActivitySource());
  const sideEffects = options.sideEffects
    ?? (baseUrl ? new HttpSideEffects({ ...config.integrations, baseUrl }) : new LoggingSideEffects(logger));
  const synthesizer = options.synthesizer
    ?? (config.synthesis.endpoint
      ? new HttpContentSynthesizer({ url: config.synthesis.endpoint, headers: config.synthesis.headers })
      : new TemplateContentSynthesizer());
  if (!baseUrl && !options.activitySource) {
    logger.warn("No integrations.baseUrl configured; detection will see no active users");
  }

  // 4. Connections
  const registry = new ConnectionRegistry({
    pubsub: options.pubsub ?? new InMemoryPubSub(logger),
    presence: new SqlitePresenceStore(db),
    config: config.connections,
    logger: logger.child({ component: "registry" }),
  });
  await registry.start();

  // 5. Delivery
  const dispatcher = new DeliveryDispatcher({
    store,
    preferences,
    registry,
    sinks: buildSinks(config, registry),
    config: config.delivery,
    logger: logger.child({ component: "dispatcher" }),
  });
  dispatcher.start();

  // 6. Decision pipeline
  const controller = new FrequencyController({
    store,
    preferences,
    config: config.frequency,
    logger: logger.child({ component: "frequency" }),
  });
  const assembler = new PromptAssembler({
    store,
    synthesizer,
    intake: dispatcher,
    logger: logger.child({ component: "assembler" }),
    synthesisTimeoutMs: config.synthesis.timeoutMs,
    defaultTtlSeconds: config.delivery.defaultTtlSeconds,
  });
  const detector = new TimingDetector({
    source: activitySource,
    config: config.detection,
    logger: logger.child({ component: "detector" }),
    heuristic: options.heuristic,
  });
  const cycle = new CoachingCycle({ detector, controller, assembler, logger });
  const responses = new ResponseHandler({
    store,
    sideEffects,
    assembler,
    caps: controller,
    publisher: registry,
    logger: logger.child({ component: "responses" }),
  });

  // 7. Schedules
  const scheduler = new JobScheduler(logger);
  scheduler.add({ name: "coaching-cycle", schedule: config.detection.schedule, run: () => cycle.run() });
  scheduler.add({ name: "expiry-sweep", schedule: config.delivery.expirySchedule, run: () => dispatcher.sweepExpired() });

  // 8. HTTP surface
  const server = new CoachingServer({
    config: config.server,
    store,
    registry,
    responses,
    dispatcher,
    logger: logger.child({ component: "server" }),
  });
  if (options.listen !== false) await server.start();

  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    // Stop producing work, then let in-flight attempts settle.
    scheduler.stop();
    await server.stop();
    await dispatcher.stop();
    await registry.stop();
    db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  if (options.handleSignals) {
    const onSignal = (): void => {
      shutdown().catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }

  logger.info({ stateDir }, "Coaching engine started");
  return {
    config,
    logger,
    db,
    store,
    preferences,
    controller,
    registry,
    dispatcher,
    assembler,
    cycle,
    responses,
    scheduler,
    server,
    shutdown,
  };
}
