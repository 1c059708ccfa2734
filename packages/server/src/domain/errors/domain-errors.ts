/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { CLOSE_CODES } from '../../config/constants.js';

/**
 * Base class for all domain errors.
 * Provides structured error information for HTTP responses and logs.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when an upgrade request is not a valid WebSocket handshake.
 */
export class HandshakeInvalidError extends DomainError {
  readonly code = 'HANDSHAKE_INVALID';
  readonly statusCode = 400;
}

/**
 * Error thrown when the byte stream does not form a valid frame.
 */
export class FrameProtocolError extends DomainError {
  readonly code: string = 'FRAME_PROTOCOL_ERROR';
  readonly statusCode = 400;
  readonly closeCode: number = CLOSE_CODES.PROTOCOL_ERROR;
}

/**
 * Error thrown when a frame or an assembled message exceeds the size limit.
 */
export class MessageTooLargeError extends FrameProtocolError {
  override readonly code = 'MESSAGE_TOO_LARGE';
  override readonly closeCode = CLOSE_CODES.MESSAGE_TOO_BIG;

  constructor(size: number, limit: number) {
    super(`Message of ${size} bytes exceeds limit of ${limit} bytes`);
  }
}

/**
 * Error thrown when no frame arrives within the read deadline.
 */
export class LivenessTimeoutError extends DomainError {
  readonly code = 'LIVENESS_TIMEOUT';
  readonly statusCode = 408;

  constructor(timeoutMs: number) {
    super(`No frame received within ${timeoutMs}ms`);
  }
}

/**
 * Error thrown when a broadcast trigger comes from a non-loopback address.
 */
export class IngressRejectedError extends DomainError {
  readonly code = 'INGRESS_REJECTED';
  readonly statusCode = 403;

  constructor(address: string | undefined) {
    super(`Broadcast rejected from non-loopback address: ${address ?? 'unknown'}`);
  }
}

/**
 * Error thrown when a broadcast request body is invalid.
 */
export class InvalidPayloadError extends DomainError {
  readonly code = 'INVALID_PAYLOAD';
  readonly statusCode = 400;
}
