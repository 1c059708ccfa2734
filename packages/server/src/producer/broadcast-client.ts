/**
 * @file broadcast-client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import { CONNECTION_TIMING } from '../config/constants.js';
import type { JsonValue } from '../domain/value-objects/broadcast-payload.js';
import type { BroadcastRequest } from '../protocol/messages.js';

export interface BroadcastClientConfig {
  /** Broadcast trigger URL, e.g. http://localhost:3000/_broadcast */
  url: string;
  timeoutMs?: number;
}

export interface BroadcastClientDeps {
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * Posts broadcasts to a cable server's loopback trigger.
 * Fire-and-forget: a failed request is logged and reported as false, never thrown.
 */
export class BroadcastClient {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: BroadcastClientConfig, deps: BroadcastClientDeps) {
    this.url = config.url;
    this.timeoutMs = config.timeoutMs ?? CONNECTION_TIMING.BROADCAST_REQUEST_TIMEOUT_MS;
    this.fetchImpl = deps.fetch ?? fetch;
    this.logger = deps.logger.child({ component: 'BroadcastClient' });
  }

  async broadcast(stream: string, data: JsonValue): Promise<boolean> {
    const body: BroadcastRequest = { stream, data };

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      // Drained so the connection goes back to the pool
      const text = await response.text();

      if (!response.ok) {
        this.logger.error(
          { stream, status: response.status, url: this.url, body: text },
          'Broadcast failed'
        );
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error(
        { stream, url: this.url, message: error instanceof Error ? error.message : String(error) },
        'Broadcast failed'
      );
      return false;
    }
  }
}
