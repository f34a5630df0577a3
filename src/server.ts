/**
 * Express server configuration.
 *
 * Wires the engine's components together and assembles the API surface
 * with middleware, routes, and dependency injection. Adapters default to
 * the in-process implementations; embedders pass real ones.
 */

import express from 'express';
import {
  ArtifactRegistry,
  InfraController,
  MetricsProvider,
  NotificationChannel,
  VerificationRunner,
} from './adapters/interfaces';
import { MemoryArtifactRegistry } from './adapters/memory-registry';
import { MemoryInfraController } from './adapters/memory-infra';
import { MemoryMetricsProvider } from './adapters/memory-metrics';
import { MemoryNotificationChannel } from './adapters/memory-notifications';
import { MemoryVerificationRunner } from './adapters/memory-verification';
import { actorMiddleware, errorHandler } from './api/middleware';
import { createExecutionRoutes } from './api/executions';
import { createJudgmentRoutes } from './api/judgments';
import { createPipelineRoutes } from './api/pipelines';
import { AuditLedger } from './audit/audit-ledger';
import { CanaryAnalysisEngine } from './canary/canary-analysis';
import { Clock, systemClock } from './clock';
import { EngineConfig, mergeEngineConfig } from './config';
import { CutoverController } from './cutover/cutover-controller';
import { loadPipelineDirectory, registerPipeline } from './dsl/loader';
import { PipelineExecutor } from './engine/executor';
import { JudgmentService } from './engine/judgment-service';
import { StageHandlers } from './engine/stage-handlers';
import { Logger, logger } from './logger';
import { Notifier } from './notifications/notifier';
import { WebhookNotificationChannel } from './notifications/webhook';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { TriggerDispatcher } from './trigger/dispatcher';

const startTime = Date.now();
const VERSION = '0.1.0';

/** External collaborators; any left out get an in-process implementation. */
export interface AppAdapters {
  registry?: ArtifactRegistry;
  infra?: InfraController;
  metrics?: MetricsProvider;
  verification?: VerificationRunner;
  notifications?: NotificationChannel;
}

export interface AppContextOptions {
  config?: Partial<EngineConfig>;
  store?: Store;
  adapters?: AppAdapters;
  clock?: Clock;
  log?: Logger;
}

/** Application context containing all services. */
export interface AppContext {
  config: EngineConfig;
  store: Store;
  clock: Clock;
  log: Logger;
  registry: ArtifactRegistry;
  infra: InfraController;
  ledger: AuditLedger;
  cutover: CutoverController;
  canary: CanaryAnalysisEngine;
  judgments: JudgmentService;
  notifier: Notifier;
  executor: PipelineExecutor;
  dispatcher: TriggerDispatcher;
}

function notificationChannel(config: EngineConfig, adapters: AppAdapters): NotificationChannel {
  if (adapters.notifications) return adapters.notifications;
  if (config.webhookUrl) {
    return new WebhookNotificationChannel({ url: config.webhookUrl, signingSecret: config.webhookSecret });
  }
  return new MemoryNotificationChannel();
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = mergeEngineConfig(options.config);
  const store = options.store ?? createMemoryStore();
  const clock = options.clock ?? systemClock;
  const log = options.log ?? logger;
  const adapters = options.adapters ?? {};

  const registry = adapters.registry ?? new MemoryArtifactRegistry();
  const infra = adapters.infra ?? new MemoryInfraController();
  const metrics = adapters.metrics ?? new MemoryMetricsProvider();
  const verification = adapters.verification ?? new MemoryVerificationRunner();

  const ledger = new AuditLedger(store, clock);
  const cutover = new CutoverController(infra, store, ledger, { lockPolicy: config.cutoverLockPolicy, clock }, log);
  const canary = new CanaryAnalysisEngine(metrics, clock, log);
  const judgments = new JudgmentService(store, ledger, clock);
  const notifier = new Notifier(
    notificationChannel(config, adapters),
    ledger,
    {
      maxAttempts: config.notifyMaxAttempts,
      backoffMs: config.notifyBackoffMs,
      urgentChannel: config.urgentChannel,
      clock,
    },
    log,
  );
  const handlers = new StageHandlers({ store, infra, cutover, canary, verification, judgments, clock });
  const executor = new PipelineExecutor(
    { store, ledger, cutover, handlers, judgments, notifier, clock },
    {
      deployRetry: {
        maxAttempts: config.deployMaxAttempts,
        backoffStrategy: 'exponential',
        backoffBaseMs: config.deployBackoffMs,
      },
    },
    log,
  );
  const dispatcher = new TriggerDispatcher(registry, executor, { pollIntervalMs: config.pollIntervalMs }, log);

  return {
    config,
    store,
    clock,
    log,
    registry,
    infra,
    ledger,
    cutover,
    canary,
    judgments,
    notifier,
    executor,
    dispatcher,
  };
}

/**
 * Load the configured pipeline directory into the store and register every
 * loaded service with the dispatcher.
 */
export async function loadPipelines(ctx: AppContext): Promise<number> {
  if (!ctx.config.pipelinesDir) return 0;
  const definitions = await loadPipelineDirectory(ctx.config.pipelinesDir);
  for (const definition of definitions) {
    await registerPipeline(ctx.store.pipelines, definition, ctx.log);
    ctx.dispatcher.register(definition.service);
  }
  return definitions.length;
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check — includes uptime and version
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
      pollIntervalMs: ctx.config.pollIntervalMs,
      services: ctx.dispatcher.registeredServices(),
    });
  });

  app.use('/api', actorMiddleware());

  const v1 = express.Router();
  v1.use('/pipelines', createPipelineRoutes(ctx.store, ctx.log));
  v1.use('/', createExecutionRoutes(ctx.store, ctx.ledger, ctx.executor, ctx.dispatcher));
  v1.use('/', createJudgmentRoutes(ctx.judgments, ctx.executor));
  app.use('/api/v1', v1);

  // Error handler
  app.use(errorHandler);

  return app;
}
