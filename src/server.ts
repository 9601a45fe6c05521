import type { Server } from 'http';
import { loadEnv } from './config/relay.env.config';
import type { RelayEnv } from './config/relay.env.config';
import { buildRelay, createApp } from './app';
import { logger, logStartup, logShutdown } from './utils/relay.logger.utils';

let server: Server | undefined;

function startServer(): void {
  let env: RelayEnv;
  try {
    env = loadEnv();
  } catch (error: unknown) {
    logger.error('❌ Invalid configuration', {
      error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
  }

  const relay = buildRelay(env);
  const app = createApp(relay);

  logStartup(env.PORT, env.NODE_ENV);

  server = app.listen(env.PORT, '0.0.0.0', () => {
    logger.info(`🚀 Relay service running on port ${env.PORT}`, {
      port: env.PORT,
      environment: env.NODE_ENV,
      assistant: env.ASSISTANT_NAME,
      status: 'READY_TO_ACCEPT_REQUESTS'
    });
  });
}

function gracefulShutdown(signal: string): void {
  logShutdown(signal);

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      logger.error('Error during graceful shutdown', { error: error.message });
      process.exit(1);
    }
    logger.info('Graceful shutdown completed');
    process.exit(0);
  });
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Promise Rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined
  });
  process.exit(1);
});

startServer();
