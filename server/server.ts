import './observability/instruments.js';

import * as Sentry from '@sentry/node';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from './config/index.js';
import { logEnvironmentInfo } from './debug-helpers.js';
import { ConfigurationError } from './errors.js';
import { createHttpServer, serverUrl } from './http-server.js';
import { logger } from './observability/logger.js';

function loadConfigOrExit(): Readonly<AppConfig> {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
      logger.error('See .env.example for the required environment variables.');
      process.exit(1);
    }
    throw error;
  }
}

function start(): void {
  const config = loadConfigOrExit();
  logEnvironmentInfo(config);

  const server = createHttpServer(createApp(config), config);
  server.listen(config.port, config.host, () => logger.info(`Server is listening on ${serverUrl(config)}`));
}

// Handle unhandled promise rejections and exceptions
process.on('unhandledRejection', (err: unknown) => {
  logger.error('Unhandled rejection', { error: err instanceof Error ? err.stack : String(err) });
  Sentry.captureException(err);
});

process.on('uncaughtException', (err: Error) => {
  logger.error('Uncaught exception', { error: err.stack });
  Sentry.captureException(err);
});

start();
