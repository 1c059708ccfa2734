/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Connection } from '../../domain/entities/connection.js';
import type { SubscriptionRegistry } from '../../domain/ports/subscription-registry.js';

/**
 * In-memory implementation of SubscriptionRegistry.
 * Stores subscriber sets in a Map indexed by stream name.
 *
 * Every method runs to completion without awaiting, so the event loop is the
 * single serialization point: no reader loop or broadcast can observe a
 * half-applied change.
 */
export class InMemorySubscriptionRegistry implements SubscriptionRegistry {
  private readonly subscribers = new Map<string, Set<Connection>>();

  subscribe(connection: Connection, stream: string): boolean {
    let members = this.subscribers.get(stream);
    if (!members) {
      members = new Set();
      this.subscribers.set(stream, members);
    }
    if (members.has(connection)) {
      return false;
    }
    members.add(connection);
    connection.trackStream(stream);
    return true;
  }

  unsubscribe(connection: Connection, stream: string): boolean {
    const removed = this.detach(connection, stream);
    connection.untrackStream(stream);
    return removed;
  }

  removeConnection(connection: Connection): string[] {
    const removed: string[] = [];
    for (const stream of Array.from(connection.streams)) {
      if (this.detach(connection, stream)) {
        removed.push(stream);
      }
      connection.untrackStream(stream);
    }
    return removed;
  }

  snapshot(stream: string): Connection[] {
    const members = this.subscribers.get(stream);
    return members ? Array.from(members) : [];
  }

  subscriberCount(stream: string): number {
    return this.subscribers.get(stream)?.size ?? 0;
  }

  streams(): string[] {
    return Array.from(this.subscribers.keys());
  }

  streamCount(): number {
    return this.subscribers.size;
  }

  private detach(connection: Connection, stream: string): boolean {
    const members = this.subscribers.get(stream);
    if (!members) {
      return false;
    }
    const removed = members.delete(connection);
    if (members.size === 0) {
      this.subscribers.delete(stream);
    }
    return removed;
  }
}
