/**
 * Rollout Engine — progressive delivery orchestration.
 *
 * Entry point for the engine server. Run directly, it loads configuration
 * from the environment, registers the pipeline definitions it finds,
 * resumes executions left unfinished by a previous process, and starts
 * polling for new artifacts.
 */

import { loadConfigFromEnv } from './config';
import { logger, setLogLevel } from './logger';
import { createApp, createAppContext, loadPipelines } from './server';

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  setLogLevel(config.logLevel);

  const context = createAppContext({ config });
  const pipelines = await loadPipelines(context);
  const resumed = await context.executor.recover();
  context.dispatcher.start();

  const app = createApp(context);
  const server = app.listen(config.port, () => {
    logger.info('Rollout engine listening', { port: config.port, pipelines, resumed: resumed.length });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    context.dispatcher.stop().then(
      () => process.exit(0),
      (err) => {
        logger.error('Shutdown failed', { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err) => {
    logger.error('Startup failed', { error: err instanceof Error ? err.message : String(err) });
    process.exit(1);
  });
}

// Public exports for programmatic use
export { createApp, createAppContext, loadPipelines } from './server';
export type { AppContext, AppContextOptions, AppAdapters } from './server';
export * from './adapters';
export * from './audit';
export * from './canary';
export * from './clock';
export * from './config';
export * from './cutover';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './logger';
export * from './notifications';
export * from './storage';
export * from './trigger';
