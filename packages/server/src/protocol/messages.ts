/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { JsonValue } from '../domain/value-objects/broadcast-payload.js';

// ============================================================================
// Client Messages
// ============================================================================

/**
 * Client → Server: Start receiving broadcasts for a stream
 */
export interface SubscribeMessage {
  type: 'subscribe';
  stream: string;
}

/**
 * Client → Server: Stop receiving broadcasts for a stream
 */
export interface UnsubscribeMessage {
  type: 'unsubscribe';
  stream: string;
}

/**
 * Client → Server: Answer to a server ping envelope
 */
export interface PongMessage {
  type: 'pong';
}

export type ClientMessage = SubscribeMessage | UnsubscribeMessage | PongMessage;

// ============================================================================
// Server Messages
// ============================================================================

/**
 * Server → Client: Subscription confirmed
 */
export interface SubscribedMessage {
  type: 'subscribed';
  stream: string;
}

/**
 * Server → Client: A broadcast on a subscribed stream
 */
export interface StreamMessage {
  type: 'message';
  stream: string;
  data: JsonValue;
}

/**
 * Server → Client: Liveness probe, sent only when probing is enabled
 */
export interface PingMessage {
  type: 'ping';
}

export type ServerMessage = SubscribedMessage | StreamMessage | PingMessage;

// ============================================================================
// Broadcast Trigger
// ============================================================================

/**
 * Producer → Server: Body of a broadcast trigger request
 */
export interface BroadcastRequest {
  stream: string;
  data: JsonValue;
}
