/**
 * @file manage-subscriptions.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { SubscriptionRegistry } from '../domain/ports/subscription-registry.js';
import { createSubscribedMessage, encodeServerMessage } from '../protocol/envelopes.js';

export interface ManageSubscriptionsDeps {
  registry: SubscriptionRegistry;
  logger: Logger;
}

/**
 * Use case for the subscribe / unsubscribe envelopes and for releasing
 * a closed connection's subscriptions.
 */
export class ManageSubscriptionsUseCase {
  private readonly registry: SubscriptionRegistry;
  private readonly logger: Logger;

  constructor(deps: ManageSubscriptionsDeps) {
    this.registry = deps.registry;
    this.logger = deps.logger.child({ useCase: 'ManageSubscriptions' });
  }

  /**
   * Adds the connection to the stream and confirms with a `subscribed` envelope.
   * Subscribing twice is confirmed twice but registered once.
   */
  subscribe(connection: Connection, stream: string): boolean {
    const isNew = this.registry.subscribe(connection, stream);
    const sent = connection.send(encodeServerMessage(createSubscribedMessage(stream)));

    this.logger.debug(
      { connectionId: connection.id, stream, isNew, confirmed: sent },
      'Connection subscribed'
    );
    return isNew;
  }

  unsubscribe(connection: Connection, stream: string): boolean {
    const removed = this.registry.unsubscribe(connection, stream);
    this.logger.debug({ connectionId: connection.id, stream, removed }, 'Connection unsubscribed');
    return removed;
  }

  /**
   * Drops every subscription of a connection that is going away.
   */
  release(connection: Connection): string[] {
    const streams = this.registry.removeConnection(connection);
    if (streams.length > 0) {
      this.logger.debug(
        { connectionId: connection.id, streams },
        'Released connection subscriptions'
      );
    }
    return streams;
  }
}
