/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './messages.js';
export * from './schemas.js';
export * from './envelopes.js';
export * from './frame-codec.js';
export * from './handshake.js';
export * from './byte-reader.js';
export * from './message-assembler.js';
