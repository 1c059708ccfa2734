/**
 * @file broadcast-message.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { SubscriptionRegistry } from '../domain/ports/subscription-registry.js';
import type { BroadcastPayload } from '../domain/value-objects/broadcast-payload.js';
import { createStreamMessage, encodeServerMessage } from '../protocol/envelopes.js';

export interface BroadcastMessageDeps {
  registry: SubscriptionRegistry;
  logger: Logger;
}

export interface BroadcastMessageParams {
  stream: string;
  payload: BroadcastPayload;
}

export interface BroadcastMessageResult {
  stream: string;
  /** Registry members at snapshot time */
  subscribers: number;
  /** Writes the sockets accepted */
  delivered: number;
}

/**
 * Use case for fanning a payload out to every subscriber of a stream.
 * Delivery is best-effort: a failed write is logged and left for the
 * connection's own reader loop to clean up.
 */
export class BroadcastMessageUseCase {
  private readonly registry: SubscriptionRegistry;
  private readonly logger: Logger;

  constructor(deps: BroadcastMessageDeps) {
    this.registry = deps.registry;
    this.logger = deps.logger.child({ useCase: 'BroadcastMessage' });
  }

  execute(params: BroadcastMessageParams): BroadcastMessageResult {
    const { stream, payload } = params;

    // Encoded once, shared by every write
    const frame = encodeServerMessage(createStreamMessage(stream, payload));

    const connections = this.registry.snapshot(stream);
    let delivered = 0;

    for (const connection of connections) {
      if (connection.send(frame)) {
        delivered++;
      } else {
        this.logger.warn(
          {
            stream,
            connectionId: connection.id,
            state: connection.state,
          },
          'Broadcast write failed, leaving cleanup to the reader loop'
        );
      }
    }

    this.logger.debug(
      {
        stream,
        payloadKind: payload.kind,
        frameBytes: frame.length,
        subscribers: connections.length,
        delivered,
      },
      'Broadcast dispatched'
    );

    return { stream, subscribers: connections.length, delivered };
  }
}
