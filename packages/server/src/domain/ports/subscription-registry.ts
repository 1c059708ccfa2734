/**
 * @file subscription-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Connection } from '../entities/connection.js';

/**
 * Port (interface) for the stream subscription registry.
 * Maps stream names to the connections subscribed to them.
 * Implementations serialize every operation; callers hold no lock.
 */
export interface SubscriptionRegistry {
  /**
   * Adds a connection to a stream. Returns false if it was already a member.
   */
  subscribe(connection: Connection, stream: string): boolean;

  /**
   * Removes a connection from a stream, dropping the stream once empty.
   * Returns false if it was not a member.
   */
  unsubscribe(connection: Connection, stream: string): boolean;

  /**
   * Removes a connection from every stream it belongs to in one sweep.
   * Returns the streams it was removed from.
   */
  removeConnection(connection: Connection): string[];

  /**
   * Returns a copy of the subscribers of a stream.
   */
  snapshot(stream: string): Connection[];

  /**
   * Returns the number of subscribers of a stream.
   */
  subscriberCount(stream: string): number;

  /**
   * Returns the names of streams with at least one subscriber.
   */
  streams(): string[];

  /**
   * Returns the count of streams with at least one subscriber.
   */
  streamCount(): number;
}
