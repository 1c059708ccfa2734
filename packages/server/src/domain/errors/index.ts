/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  HandshakeInvalidError,
  FrameProtocolError,
  MessageTooLargeError,
  LivenessTimeoutError,
  IngressRejectedError,
  InvalidPayloadError,
} from './domain-errors.js';
