import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { createServices } from './bootstrap.js';
import { loadConfig } from './config.js';
import { ConfigError } from './errors.js';
import { errorMessage, logger, setLogLevel } from './utils/logger.js';

async function main(): Promise<void> {
  // Read environment variables once at startup
  const config = loadConfig();
  setLogLevel(config.logLevel);

  logger.info('Configuration loaded', {
    queueMode: config.queue.mode,
    model: config.model.model,
    port: config.port,
    githubAuth: config.github.appId ? 'app' : 'token',
  });

  const services = createServices(config, logger);
  const app = createApp({
    guard: services.guard,
    queue: services.queue,
    webhookSecret: config.github.webhookSecret,
    reviewDraftPullRequests: config.reviewDraftPullRequests,
    abandon: services.pipeline.abandon,
    jobProcessor: services.jobProcessor,
    logger,
  });

  await services.queue.start();

  const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Listening on port ${info.port}`, { queueMode: services.queue.mode });
  });

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    server.close();
    services.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      }
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error('Invalid configuration', { issues: error.issues });
  } else {
    logger.error('Failed to start', { error: errorMessage(error) });
  }
  process.exit(1);
});
