/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Fastify, {
  type FastifyBaseLogger,
  type FastifyError,
  type FastifyInstance,
} from 'fastify';
import type { Logger } from 'pino';

export interface AppConfig {
  logger: Logger;
}

/**
 * Creates and configures the Fastify application that hosts the broadcast
 * trigger and health routes. WebSocket upgrades bypass it entirely.
 */
export function createApp(config: AppConfig): FastifyInstance {
  const loggerInstance: FastifyBaseLogger = config.logger;
  const app = Fastify({
    loggerInstance,
    // Disable request logging since we use pino directly
    disableRequestLogging: true,
  });

  // Request logging middleware
  app.addHook('onRequest', async (request, _reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        remoteAddress: request.socket.remoteAddress,
      },
      'Incoming request'
    );
  });

  // Response logging middleware
  app.addHook('onResponse', async (request, reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request error');
    } else {
      request.log.warn({ code: error.code, message: error.message }, 'Request rejected');
    }
    const code = error.code || 'INTERNAL_ERROR';
    void reply.status(statusCode).send({
      error: error.message,
      code,
    });
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ url: request.url }, 'Route not found');
    void reply.status(404).send({
      error: 'Not Found',
      code: 'NOT_FOUND',
    });
  });

  return app;
}
