/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import { CONNECTION_TIMING } from '../../config/constants.js';
import { HandshakeInvalidError } from '../../domain/errors/domain-errors.js';
import {
  buildRejectResponse,
  buildUpgradeResponse,
  computeAcceptKey,
  validateHandshake,
} from '../../protocol/handshake.js';
import type { ConnectionHandler } from './connection-handler.js';

export interface WebSocketServerConfig {
  path: string;
  /** Interval for `ping` envelopes; 0 disables them */
  pingIntervalMs: number;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionHandler;
  logger: Logger;
}

/**
 * Performs the WebSocket handshake on the HTTP server's `upgrade` event and
 * hands each upgraded socket to the connection handler. The HTTP host never
 * touches an upgraded socket again.
 */
export class WebSocketServerWrapper {
  private httpServer: Server | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  private readonly onUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
    try {
      this.handleUpgrade(request, socket, head);
    } catch (error) {
      this.logger.error({ error, url: request.url }, 'Upgrade failed');
      socket.destroy();
    }
  };

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   */
  attach(httpServer: Server): void {
    this.httpServer = httpServer;
    httpServer.on('upgrade', this.onUpgrade);

    if (this.config.pingIntervalMs > 0) {
      this.startHeartbeat();
    }

    this.logger.info(
      { path: this.config.path, pingIntervalMs: this.config.pingIntervalMs },
      'WebSocket server attached'
    );
  }

  /**
   * Handles one upgrade request. Exposed for hosts that route upgrades themselves.
   */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = parsePathname(request.url);
    if (pathname === null) {
      this.logger.warn(
        { remoteAddress: request.socket.remoteAddress, url: request.url },
        'Rejected upgrade with an invalid request target'
      );
      this.reject(socket, 400, 'Bad Request', 'Invalid request target');
      return;
    }

    if (pathname !== this.config.path) {
      // Another upgrade listener may own this path
      if ((this.httpServer?.listenerCount('upgrade') ?? 0) > 1) {
        return;
      }
      this.reject(socket, 404, 'Not Found');
      return;
    }

    let key: string;
    try {
      key = validateHandshake(request.headers);
    } catch (error) {
      if (error instanceof HandshakeInvalidError) {
        this.logger.warn(
          { remoteAddress: request.socket.remoteAddress, reason: error.message },
          'Rejected WebSocket handshake'
        );
        this.reject(socket, 400, 'Bad Request', error.message);
        return;
      }
      throw error;
    }

    socket.write(buildUpgradeResponse(computeAcceptKey(key)));
    this.logger.debug({ remoteAddress: request.socket.remoteAddress }, 'New WebSocket connection');

    void this.deps.connectionHandler.handleConnection(socket, head);
  }

  /**
   * Starts the periodic `ping` envelopes.
   */
  private startHeartbeat(): void {
    this.heartbeatInterval = setInterval(() => {
      const probed = this.deps.connectionHandler.probe();
      this.logger.trace({ probed }, 'Sent ping envelopes');
    }, this.config.pingIntervalMs);
    this.heartbeatInterval.unref();
  }

  /**
   * Returns the number of connected clients.
   */
  get connectionCount(): number {
    return this.deps.connectionHandler.connectionCount;
  }

  /**
   * Closes all connections gracefully with timeout.
   * @param timeoutMs - Maximum time to wait for graceful close (default: 5000ms)
   */
  async close(timeoutMs: number = CONNECTION_TIMING.CLOSE_TIMEOUT_MS): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    this.httpServer?.off('upgrade', this.onUpgrade);
    this.httpServer = null;

    const handler = this.deps.connectionHandler;
    const clientCount = handler.connectionCount;
    this.logger.info({ clientCount }, 'Closing WebSocket server');

    if (clientCount === 0) {
      return;
    }

    // Send close frame to all clients
    handler.closeAll();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    const graceful = await Promise.race([handler.whenIdle().then(() => true), timedOut]);
    clearTimeout(timer);

    if (graceful) {
      this.logger.info('WebSocket server closed gracefully');
      return;
    }

    this.logger.warn(
      { timeoutMs, remainingClients: handler.connectionCount },
      'WebSocket graceful close timed out, forcing termination'
    );
    handler.terminateAll();
    await handler.whenIdle();
  }

  private reject(socket: Duplex, statusCode: number, statusText: string, body?: string): void {
    socket.on('error', (error) => {
      this.logger.debug({ error }, 'Socket error on rejected upgrade');
    });
    socket.end(buildRejectResponse(statusCode, statusText, body));
  }
}

/**
 * Path of an upgrade request target, or null when the target is not a valid URL.
 */
function parsePathname(url: string | undefined): string | null {
  try {
    return new URL(url ?? '/', 'http://localhost').pathname;
  } catch {
    return null;
  }
}
