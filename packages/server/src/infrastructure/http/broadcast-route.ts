/**
 * @file broadcast-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';
import type { BroadcastMessageUseCase } from '../../application/broadcast-message.js';
import { InvalidPayloadError } from '../../domain/errors/domain-errors.js';
import { BroadcastPayload } from '../../domain/value-objects/broadcast-payload.js';
import { BroadcastRequestSchema } from '../../protocol/schemas.js';
import { createLoopbackGuard } from './ingress-guard.js';

export interface BroadcastRouteConfig {
  path: string;
}

export interface BroadcastRouteDeps {
  broadcastMessage: BroadcastMessageUseCase;
  logger: Logger;
}

/**
 * Registers the loopback-only broadcast trigger.
 *
 * POST {path} with `{ "stream": string, "data": string | object }`
 * - 200 `OK` once every subscriber has had one write attempt
 * - 400 for a body that is not valid JSON or does not match the schema
 * - 403 for any caller outside 127.0.0.0/8 and ::1
 */
export function registerBroadcastRoute(
  app: FastifyInstance,
  config: BroadcastRouteConfig,
  deps: BroadcastRouteDeps
): void {
  const log = deps.logger.child({ route: 'broadcast' });

  app.post(
    config.path,
    { onRequest: createLoopbackGuard(deps.logger) },
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = BroadcastRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        const error = new InvalidPayloadError('Body must be {"stream": string, "data": string | object}');
        log.warn({ issues: parsed.error.issues.length, code: error.code }, 'Invalid broadcast request');
        return reply
          .status(error.statusCode)
          .type('text/plain; charset=utf-8')
          .send(`Bad Request: ${error.message}`);
      }

      const { stream, data } = parsed.data;
      const result = deps.broadcastMessage.execute({
        stream,
        payload: BroadcastPayload.fromData(data),
      });

      log.info(
        { stream, subscribers: result.subscribers, delivered: result.delivered },
        'Broadcast triggered'
      );

      return reply.status(200).type('text/plain; charset=utf-8').send('OK');
    }
  );
}
