/**
 * @file server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { createApp } from './app.js';
import {
  BroadcastMessageUseCase,
  ManageSubscriptionsUseCase,
  type BroadcastMessageResult,
} from './application/index.js';
import {
  CABLE_CONFIG,
  CONNECTION_TIMING,
  getProtocolVersion,
} from './config/constants.js';
import type { SubscriptionRegistry } from './domain/ports/subscription-registry.js';
import {
  BroadcastPayload,
  type JsonValue,
} from './domain/value-objects/broadcast-payload.js';
import { registerBroadcastRoute } from './infrastructure/http/broadcast-route.js';
import { registerHealthRoute } from './infrastructure/http/health-route.js';
import { InMemorySubscriptionRegistry } from './infrastructure/persistence/in-memory-registry.js';
import {
  ConnectionHandler,
  WebSocketServerWrapper,
} from './infrastructure/websocket/index.js';
import { getServerVersion } from './utils/version.js';

export interface CableServerOptions {
  logger: Logger;
  /** WebSocket upgrade path (default: /cable) */
  cablePath?: string;
  /** Loopback-only broadcast trigger path (default: /_broadcast) */
  broadcastPath?: string;
  /** Per-frame read deadline (default: 60s) */
  readTimeoutMs?: number;
  /** Interval for `ping` envelopes; 0 disables them (default: 0) */
  pingIntervalMs?: number;
  /** Largest client message accepted (default: 1 MiB) */
  maxMessageBytes?: number;
  /** Replaces the in-memory registry */
  registry?: SubscriptionRegistry;
  /** Connection id generator, for logs */
  generateId?: () => string;
}

export interface ListenOptions {
  port: number;
  host: string;
}

export interface CableServer {
  app: FastifyInstance;
  registry: SubscriptionRegistry;
  connectionHandler: ConnectionHandler;
  /**
   * Fans a payload out to the stream's subscribers in-process,
   * without going through the HTTP trigger.
   */
  broadcast(stream: string, data: JsonValue): BroadcastMessageResult;
  /**
   * Starts listening and attaches the WebSocket upgrade handler. Returns the bound address.
   */
  listen(options: ListenOptions): Promise<string>;
  /**
   * Closes WebSocket connections, then the HTTP server.
   */
  close(timeoutMs?: number): Promise<void>;
}

/**
 * Wires the registry, use cases, reader loops and HTTP routes into one
 * embeddable server.
 */
export function createCableServer(options: CableServerOptions): CableServer {
  const { logger } = options;
  const cablePath = options.cablePath ?? CABLE_CONFIG.PATH;
  const broadcastPath = options.broadcastPath ?? CABLE_CONFIG.BROADCAST_PATH;

  const registry = options.registry ?? new InMemorySubscriptionRegistry();

  // Create use cases
  const broadcastMessage = new BroadcastMessageUseCase({ registry, logger });
  const manageSubscriptions = new ManageSubscriptionsUseCase({ registry, logger });

  // Create connection handler
  const connectionHandler = new ConnectionHandler(
    {
      readTimeoutMs: options.readTimeoutMs ?? CONNECTION_TIMING.READ_TIMEOUT_MS,
      maxMessageBytes: options.maxMessageBytes ?? CABLE_CONFIG.MAX_MESSAGE_BYTES,
    },
    {
      manageSubscriptions,
      logger,
      generateId: options.generateId,
    }
  );

  const wsServer = new WebSocketServerWrapper(
    {
      path: cablePath,
      pingIntervalMs: options.pingIntervalMs ?? CONNECTION_TIMING.PING_INTERVAL_MS,
    },
    { connectionHandler, logger }
  );

  // Create Fastify app
  const app = createApp({ logger });

  registerHealthRoute(
    app,
    { version: getServerVersion(), protocolVersion: getProtocolVersion() },
    { registry, connectionCount: () => connectionHandler.connectionCount }
  );

  registerBroadcastRoute(app, { path: broadcastPath }, { broadcastMessage, logger });

  // Upgrades are handled as soon as the HTTP server exists, before listen()
  wsServer.attach(app.server);

  return {
    app,
    registry,
    connectionHandler,

    broadcast(stream: string, data: JsonValue): BroadcastMessageResult {
      return broadcastMessage.execute({ stream, payload: BroadcastPayload.fromData(data) });
    },

    async listen({ port, host }: ListenOptions): Promise<string> {
      const address = await app.listen({ port, host });
      logger.info({ address, cablePath, broadcastPath }, 'Cable server listening');
      return address;
    },

    async close(timeoutMs?: number): Promise<void> {
      await wsServer.close(timeoutMs);
      await app.close();
    },
  };
}
