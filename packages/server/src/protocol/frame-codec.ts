/**
 * @file frame-codec.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { CABLE_CONFIG, WEBSOCKET_PROTOCOL } from '../config/constants.js';
import { FrameProtocolError, MessageTooLargeError } from '../domain/errors/domain-errors.js';
import type { ByteReader } from './byte-reader.js';

// ============================================================================
// Opcodes
// ============================================================================

export const Opcode = {
  CONTINUATION: 0x0,
  TEXT: 0x1,
  BINARY: 0x2,
  CLOSE: 0x8,
  PING: 0x9,
  PONG: 0xa,
} as const;

export type Opcode = (typeof Opcode)[keyof typeof Opcode];

const KNOWN_OPCODES: ReadonlySet<number> = new Set(Object.values(Opcode));

function isOpcode(value: number): value is Opcode {
  return KNOWN_OPCODES.has(value);
}

/**
 * Close, ping and pong. Control frames may interleave with a fragmented message.
 */
export function isControlOpcode(opcode: Opcode): boolean {
  return opcode >= Opcode.CLOSE;
}

// ============================================================================
// Frame
// ============================================================================

export interface Frame {
  fin: boolean;
  opcode: Opcode;
  masked: boolean;
  /** Unmasked payload bytes */
  payload: Buffer;
}

export interface DecodeOptions {
  /** Frames announcing a longer payload are rejected before it is read */
  maxPayloadBytes?: number;
  /** Aborts a read that is waiting for bytes */
  signal?: AbortSignal;
}

export interface EncodeOptions {
  /** 4-byte masking key; only clients mask their frames */
  mask?: Buffer;
}

const FIN_BIT = 0x80;
const RSV_BITS = 0x70;
const OPCODE_BITS = 0x0f;
const MASK_BIT = 0x80;
const LENGTH_BITS = 0x7f;
const LENGTH_16 = 126;
const LENGTH_64 = 127;

// ============================================================================
// Decode
// ============================================================================

/**
 * Reads one frame from the byte stream.
 * Returns null when the stream ends cleanly between frames.
 * Throws FrameProtocolError for a malformed or truncated frame.
 */
export async function decodeFrame(
  reader: ByteReader,
  options: DecodeOptions = {}
): Promise<Frame | null> {
  const { signal } = options;
  const maxPayloadBytes = options.maxPayloadBytes ?? CABLE_CONFIG.MAX_MESSAGE_BYTES;

  const first = await reader.read(1, signal);
  if (!first) {
    return null;
  }
  const second = await readRequired(reader, 1, signal);

  const byte1 = first.readUInt8(0);
  const byte2 = second.readUInt8(0);

  if ((byte1 & RSV_BITS) !== 0) {
    throw new FrameProtocolError('Reserved bits set without a negotiated extension');
  }

  const fin = (byte1 & FIN_BIT) !== 0;
  const rawOpcode = byte1 & OPCODE_BITS;
  if (!isOpcode(rawOpcode)) {
    throw new FrameProtocolError(`Unknown opcode ${rawOpcode}`);
  }
  const opcode = rawOpcode;

  const masked = (byte2 & MASK_BIT) !== 0;
  const length = await readPayloadLength(reader, byte2 & LENGTH_BITS, maxPayloadBytes, signal);

  if (isControlOpcode(opcode)) {
    if (!fin) {
      throw new FrameProtocolError('Control frames must not be fragmented');
    }
    if (length > WEBSOCKET_PROTOCOL.MAX_CONTROL_PAYLOAD_BYTES) {
      throw new FrameProtocolError(`Control frame payload of ${length} bytes exceeds 125`);
    }
  }

  const maskKey = masked ? await readRequired(reader, 4, signal) : null;
  const data = await readRequired(reader, length, signal);
  const payload = maskKey ? applyMask(data, maskKey) : Buffer.from(data);

  return { fin, opcode, masked, payload };
}

async function readPayloadLength(
  reader: ByteReader,
  selector: number,
  maxPayloadBytes: number,
  signal: AbortSignal | undefined
): Promise<number> {
  let length: number;

  if (selector === LENGTH_16) {
    length = (await readRequired(reader, 2, signal)).readUInt16BE(0);
  } else if (selector === LENGTH_64) {
    const extended = (await readRequired(reader, 8, signal)).readBigUInt64BE(0);
    if (extended > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new FrameProtocolError('Payload length exceeds the 63-bit range');
    }
    length = Number(extended);
  } else {
    length = selector;
  }

  if (length > maxPayloadBytes) {
    throw new MessageTooLargeError(length, maxPayloadBytes);
  }
  return length;
}

async function readRequired(
  reader: ByteReader,
  size: number,
  signal: AbortSignal | undefined
): Promise<Buffer> {
  const bytes = await reader.read(size, signal);
  if (!bytes) {
    throw new FrameProtocolError('Stream ended in the middle of a frame');
  }
  return bytes;
}

// ============================================================================
// Encode
// ============================================================================

/**
 * Encodes a single, final frame. Server frames are written unmasked.
 */
export function encodeFrame(
  opcode: Opcode,
  payload: Buffer | string,
  options: EncodeOptions = {}
): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  const { mask } = options;
  if (mask && mask.length !== 4) {
    throw new RangeError('Masking key must be 4 bytes');
  }

  const length = body.length;
  const maskBit = mask ? MASK_BIT : 0;
  let header: Buffer;

  if (length < LENGTH_16) {
    header = Buffer.alloc(2);
    header.writeUInt8(maskBit | length, 1);
  } else if (length <= 0xffff) {
    header = Buffer.alloc(4);
    header.writeUInt8(maskBit | LENGTH_16, 1);
    header.writeUInt16BE(length, 2);
  } else {
    header = Buffer.alloc(10);
    header.writeUInt8(maskBit | LENGTH_64, 1);
    header.writeBigUInt64BE(BigInt(length), 2);
  }
  header.writeUInt8(FIN_BIT | opcode, 0);

  if (mask) {
    return Buffer.concat([header, mask, applyMask(body, mask)]);
  }
  return Buffer.concat([header, body]);
}

/**
 * Encodes a close frame carrying a status code and an optional reason.
 */
export function encodeCloseFrame(code: number, reason = ''): Buffer {
  const reasonBytes = Buffer.from(reason, 'utf8').subarray(
    0,
    WEBSOCKET_PROTOCOL.MAX_CONTROL_PAYLOAD_BYTES - 2
  );
  const payload = Buffer.alloc(2 + reasonBytes.length);
  payload.writeUInt16BE(code, 0);
  reasonBytes.copy(payload, 2);
  return encodeFrame(Opcode.CLOSE, payload);
}

/**
 * Reads the status code and reason of a close frame payload.
 */
export function parseClosePayload(payload: Buffer): { code?: number; reason: string } {
  if (payload.length < 2) {
    return { reason: '' };
  }
  return {
    code: payload.readUInt16BE(0),
    reason: payload.subarray(2).toString('utf8'),
  };
}

/**
 * XORs each byte with `key[i mod 4]`. Returns a new buffer.
 */
export function applyMask(data: Buffer, key: Buffer): Buffer {
  const out = Buffer.alloc(data.length);
  for (let i = 0; i < data.length; i++) {
    out[i] = (data[i] ?? 0) ^ (key[i % 4] ?? 0);
  }
  return out;
}
