/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { SubscriptionRegistry } from '../../domain/ports/subscription-registry.js';

export interface HealthRouteConfig {
  version: string;
  protocolVersion: string;
}

export interface HealthRouteDeps {
  registry: SubscriptionRegistry;
  connectionCount: () => number;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  protocolVersion: string;
  uptime: number;
  connections: number;
  streams: number;
  timestamp: string;
}

/**
 * Registers the health check route on the Fastify server.
 */
export function registerHealthRoute(
  app: FastifyInstance,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: config.version,
      protocolVersion: config.protocolVersion,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      connections: deps.connectionCount(),
      streams: deps.registry.streamCount(),
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Simple liveness probe
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Readiness probe - checks if the server can accept connections
  app.get('/readyz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ready' });
  });
}
