/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import type { JsonValue } from '../domain/value-objects/broadcast-payload.js';

// ============================================================================
// JSON Value Schema
// ============================================================================

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
);

// ============================================================================
// Client Schemas
// ============================================================================

export const SubscribeSchema = z.object({
  type: z.literal('subscribe'),
  stream: z.string().min(1, 'Stream name is required'),
});

export const UnsubscribeSchema = z.object({
  type: z.literal('unsubscribe'),
  stream: z.string().min(1, 'Stream name is required'),
});

export const PongSchema = z.object({
  type: z.literal('pong'),
});

// ============================================================================
// Base Message Schema
// ============================================================================

export const BaseMessageSchema = z.object({
  type: z.string(),
});

// ============================================================================
// Combined Schemas
// ============================================================================

export const ClientMessageSchema = z.discriminatedUnion('type', [
  SubscribeSchema,
  UnsubscribeSchema,
  PongSchema,
]);

// ============================================================================
// Broadcast Trigger Schema
// ============================================================================

export const BroadcastRequestSchema = z.object({
  stream: z.string().min(1, 'Stream name is required'),
  data: JsonValueSchema,
});

// ============================================================================
// Type Exports
// ============================================================================

export type ParsedClientMessage = z.infer<typeof ClientMessageSchema>;
export type ParsedBroadcastRequest = z.infer<typeof BroadcastRequestSchema>;

// ============================================================================
// Validation Helper
// ============================================================================

/**
 * Safely parses a client message and returns the result.
 * Returns undefined if parsing fails.
 */
export function parseClientMessage(data: unknown): ParsedClientMessage | undefined {
  const result = ClientMessageSchema.safeParse(data);
  if (result.success) {
    return result.data;
  }
  return undefined;
}

/**
 * Reads the `type` discriminator without full validation.
 * Useful for logging messages that fail to parse.
 */
export function getMessageType(data: unknown): string | undefined {
  const result = BaseMessageSchema.safeParse(data);
  if (result.success) {
    return result.data.type;
  }
  return undefined;
}
