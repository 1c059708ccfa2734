/**
 * @file envelopes.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { BroadcastPayload } from '../domain/value-objects/broadcast-payload.js';
import { encodeFrame, Opcode } from './frame-codec.js';
import type {
  PingMessage,
  ServerMessage,
  StreamMessage,
  SubscribedMessage,
} from './messages.js';

/**
 * Wraps a broadcast payload in the `message` envelope.
 */
export function createStreamMessage(stream: string, payload: BroadcastPayload): StreamMessage {
  return {
    type: 'message',
    stream,
    data: BroadcastPayload.toData(payload),
  };
}

export function createSubscribedMessage(stream: string): SubscribedMessage {
  return { type: 'subscribed', stream };
}

export function createPingMessage(): PingMessage {
  return { type: 'ping' };
}

/**
 * Serializes an envelope into a single text frame.
 */
export function encodeServerMessage(message: ServerMessage): Buffer {
  return encodeFrame(Opcode.TEXT, JSON.stringify(message));
}
