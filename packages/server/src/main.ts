/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { getEnv } from './config/env.js';
import { CONNECTION_TIMING, getProtocolVersion } from './config/constants.js';
import { createLogger } from './infrastructure/logging/pino-logger.js';
import { createCableServer } from './server.js';
import { getServerVersion } from './utils/version.js';

/**
 * Bootstraps and starts the cable server.
 */
async function bootstrap(): Promise<void> {
  // Load configuration
  const env = getEnv();

  // Create logger
  const logger = createLogger({
    name: 'cablecast',
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  });

  logger.info(
    {
      version: getServerVersion(),
      protocolVersion: getProtocolVersion(),
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      readTimeoutMs: env.READ_TIMEOUT_MS,
      pingIntervalMs: env.PING_INTERVAL_MS,
    },
    'Starting cable server'
  );

  const server = createCableServer({
    logger,
    cablePath: env.CABLE_PATH,
    broadcastPath: env.BROADCAST_PATH,
    readTimeoutMs: env.READ_TIMEOUT_MS,
    pingIntervalMs: env.PING_INTERVAL_MS,
    maxMessageBytes: env.MAX_MESSAGE_BYTES,
  });

  // Start server
  try {
    await server.listen({ port: env.PORT, host: env.HOST });
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    // Force exit after timeout
    const forceExitTimer = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit');
      process.exit(1);
    }, CONNECTION_TIMING.SHUTDOWN_TIMEOUT_MS);

    try {
      await server.close();
      clearTimeout(forceExitTimer);
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Unhandled rejection handler
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  // Uncaught exception handler
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });
}

// Run the server
bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap:', error);
  process.exit(1);
});
