/**
 * @file broadcast-payload.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Opaque cargo of a broadcast: a rendered HTML fragment or a structured value.
 */
export type BroadcastPayload =
  | { readonly kind: 'html'; readonly html: string }
  | { readonly kind: 'json'; readonly value: JsonValue };

export const BroadcastPayload = {
  html(html: string): BroadcastPayload {
    return { kind: 'html', html };
  },

  json(value: JsonValue): BroadcastPayload {
    return { kind: 'json', value };
  },

  /**
   * Classifies the `data` field of a trigger request.
   * Strings are HTML fragments, everything else is structured.
   */
  fromData(data: JsonValue): BroadcastPayload {
    return typeof data === 'string' ? BroadcastPayload.html(data) : BroadcastPayload.json(data);
  },

  /**
   * Returns the value placed in the envelope's `data` field.
   */
  toData(payload: BroadcastPayload): JsonValue {
    switch (payload.kind) {
      case 'html':
        return payload.html;
      case 'json':
        return payload.value;
    }
  },
} as const;
