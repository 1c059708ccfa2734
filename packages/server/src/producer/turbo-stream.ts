/**
 * @file turbo-stream.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { BroadcastClient } from './broadcast-client.js';

export type TurboStreamAction = 'append' | 'prepend' | 'replace' | 'update' | 'remove';

const ATTRIBUTE_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '"': '&quot;',
  "'": '&#39;',
  '<': '&lt;',
  '>': '&gt;',
};

/**
 * Escapes a value for use inside a double-quoted HTML attribute.
 */
export function escapeAttribute(value: string): string {
  return value.replace(/[&"'<>]/g, (char) => ATTRIBUTE_ESCAPES[char] ?? char);
}

/**
 * Builds a `<turbo-stream>` element. `html` is inserted as-is into the template;
 * `remove` carries no template.
 */
export function turboStream(action: TurboStreamAction, target: string, html = ''): string {
  const open = `<turbo-stream action="${action}" target="${escapeAttribute(target)}">`;
  if (action === 'remove') {
    return `${open}</turbo-stream>`;
  }
  return `${open}<template>${html}</template></turbo-stream>`;
}

/**
 * Builds the hidden marker a page renders so its client script knows which
 * streams to subscribe to.
 */
export function streamMarker(streams: readonly string[]): string {
  const names = escapeAttribute(streams.join(','));
  return `<div data-turbo-stream="true" data-streams="${names}" style="display: none;"></div>`;
}

/**
 * Renders Turbo Stream actions and posts them through a BroadcastClient.
 */
export class TurboStreamBroadcaster {
  private readonly client: BroadcastClient;

  constructor(client: BroadcastClient) {
    this.client = client;
  }

  broadcastAppendTo(stream: string, target: string, html: string): Promise<boolean> {
    return this.client.broadcast(stream, turboStream('append', target, html));
  }

  broadcastPrependTo(stream: string, target: string, html: string): Promise<boolean> {
    return this.client.broadcast(stream, turboStream('prepend', target, html));
  }

  broadcastReplaceTo(stream: string, target: string, html: string): Promise<boolean> {
    return this.client.broadcast(stream, turboStream('replace', target, html));
  }

  broadcastUpdateTo(stream: string, target: string, html: string): Promise<boolean> {
    return this.client.broadcast(stream, turboStream('update', target, html));
  }

  broadcastRemoveTo(stream: string, target: string): Promise<boolean> {
    return this.client.broadcast(stream, turboStream('remove', target));
  }
}
