/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Envelope protocol version reported by the health endpoint.
 * Format: major.minor.patch (semver)
 */
export const PROTOCOL_VERSION = {
  major: 1,
  minor: 0,
  patch: 0,
} as const;

/**
 * Gets protocol version as semver string (e.g., "1.0.0")
 */
export function getProtocolVersion(): string {
  return `${PROTOCOL_VERSION.major}.${PROTOCOL_VERSION.minor}.${PROTOCOL_VERSION.patch}`;
}

/**
 * RFC 6455 constants.
 */
export const WEBSOCKET_PROTOCOL = {
  /** Appended to the client key before hashing the accept token */
  GUID: '258EAFA5-E914-47DA-95CA-C5AB0DC85B11',

  /** Largest payload a control frame may carry */
  MAX_CONTROL_PAYLOAD_BYTES: 125,

  /** Two header bytes, a 64-bit length and a masking key */
  MAX_FRAME_HEADER_BYTES: 14,
} as const;

/**
 * Close status codes sent back to clients.
 */
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  PROTOCOL_ERROR: 1002,
  MESSAGE_TOO_BIG: 1009,
} as const;

/**
 * Connection timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** A connection that sends no frame for this long is torn down */
  READ_TIMEOUT_MS: 60_000,

  /** Server-initiated ping envelopes are off unless configured */
  PING_INTERVAL_MS: 0,

  /** Max wait for clients to acknowledge close frames on shutdown */
  CLOSE_TIMEOUT_MS: 5_000,

  /** Max time for the whole process shutdown */
  SHUTDOWN_TIMEOUT_MS: 10_000,

  /** Producer-side timeout for a broadcast trigger request */
  BROADCAST_REQUEST_TIMEOUT_MS: 1_000,
} as const;

/**
 * WebSocket and trigger endpoint configuration.
 */
export const CABLE_CONFIG = {
  /** Path clients open the WebSocket on */
  PATH: '/cable',

  /** Loopback-only broadcast trigger */
  BROADCAST_PATH: '/_broadcast',

  /** Largest assembled client message (1 MiB) */
  MAX_MESSAGE_BYTES: 1024 * 1024,
} as const;
