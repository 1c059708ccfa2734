/**
 * @file handshake.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { createHash } from 'node:crypto';
import type { IncomingHttpHeaders } from 'node:http';
import { WEBSOCKET_PROTOCOL } from '../config/constants.js';
import { HandshakeInvalidError } from '../domain/errors/domain-errors.js';

/** base64 of 16 random bytes */
const CLIENT_KEY_PATTERN = /^[A-Za-z0-9+/]{22}==$/;

/**
 * Checks for `Upgrade: websocket` together with a `Connection` header listing `upgrade`.
 */
export function isWebSocketUpgrade(headers: IncomingHttpHeaders): boolean {
  const upgrade = headers.upgrade?.toLowerCase();
  const connection = headers.connection?.toLowerCase() ?? '';
  return (
    upgrade === 'websocket' &&
    connection.split(',').some((token) => token.trim() === 'upgrade')
  );
}

/**
 * Validates an upgrade request and returns its `Sec-WebSocket-Key`.
 */
export function validateHandshake(headers: IncomingHttpHeaders): string {
  if (!isWebSocketUpgrade(headers)) {
    throw new HandshakeInvalidError('Not a WebSocket upgrade request');
  }

  const key = headers['sec-websocket-key']?.trim();
  if (!key) {
    throw new HandshakeInvalidError('Missing Sec-WebSocket-Key header');
  }
  if (!CLIENT_KEY_PATTERN.test(key)) {
    throw new HandshakeInvalidError('Malformed Sec-WebSocket-Key header');
  }

  return key;
}

/**
 * base64(SHA-1(key + GUID))
 */
export function computeAcceptKey(clientKey: string): string {
  return createHash('sha1')
    .update(clientKey + WEBSOCKET_PROTOCOL.GUID)
    .digest('base64');
}

/**
 * Builds the `101 Switching Protocols` response for an accepted handshake.
 */
export function buildUpgradeResponse(acceptKey: string): string {
  return [
    'HTTP/1.1 101 Switching Protocols',
    'Upgrade: websocket',
    'Connection: Upgrade',
    `Sec-WebSocket-Accept: ${acceptKey}`,
    '',
    '',
  ].join('\r\n');
}

/**
 * Builds a plain-text HTTP response used to refuse an upgrade.
 */
export function buildRejectResponse(statusCode: number, statusText: string, body = statusText): string {
  return [
    `HTTP/1.1 ${statusCode} ${statusText}`,
    'Connection: close',
    'Content-Type: text/plain; charset=utf-8',
    `Content-Length: ${Buffer.byteLength(body, 'utf8')}`,
    '',
    body,
  ].join('\r\n');
}
