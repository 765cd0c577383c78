import type { Server } from 'http';
import { logger } from './utils/logger.js';
import { getEnv, validateEnv } from './config/env.js';
import { createServices } from './config/serviceInitialization.js';
import { createApp } from './app.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

// Validate environment variables early - fail fast if config is invalid
try {
  validateEnv();
  logger.info('Environment variables validated successfully');
} catch (error) {
  logger.fatal({ error }, 'Environment variable validation failed');
  process.exit(1);
}

const env = getEnv();
const services = createServices(env);
const app = createApp(services, env);

const httpServer: Server = app.listen(env.PORT, () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Legal document analyzer listening');
});

httpServer.on('error', (error) => {
  logger.fatal({ error }, 'HTTP server failed');
  process.exit(1);
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  const forceExit = setTimeout(() => {
    logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Forced shutdown: open connections did not close in time');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  httpServer.close((error) => {
    if (error) {
      logger.error({ error }, 'Error while closing HTTP server');
      process.exit(1);
    }
    logger.info('HTTP server closed');
    process.exit(0);
  });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
