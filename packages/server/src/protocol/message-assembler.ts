/**
 * @file message-assembler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { FrameProtocolError, MessageTooLargeError } from '../domain/errors/domain-errors.js';
import { Opcode, type Frame } from './frame-codec.js';

export interface AssembledMessage {
  opcode: Opcode;
  payload: Buffer;
}

/**
 * Joins a fragmented data message (first frame with FIN=0, then continuation
 * frames) back into one payload. Control frames never pass through here.
 */
export class MessageAssembler {
  private readonly maxBytes: number;
  private opcode: Opcode | null = null;
  private parts: Buffer[] = [];
  private size = 0;

  constructor(maxBytes: number) {
    this.maxBytes = maxBytes;
  }

  get inProgress(): boolean {
    return this.opcode !== null;
  }

  /**
   * Adds a data frame. Returns the message once its final frame arrives.
   */
  push(frame: Frame): AssembledMessage | null {
    let opcode: Opcode;
    if (frame.opcode === Opcode.CONTINUATION) {
      if (this.opcode === null) {
        throw new FrameProtocolError('Continuation frame without a message in progress');
      }
      opcode = this.opcode;
    } else {
      if (this.opcode !== null) {
        throw new FrameProtocolError('Data frame received before the previous message finished');
      }
      if (frame.fin) {
        return { opcode: frame.opcode, payload: frame.payload };
      }
      opcode = frame.opcode;
      this.opcode = opcode;
    }

    this.size += frame.payload.length;
    if (this.size > this.maxBytes) {
      throw new MessageTooLargeError(this.size, this.maxBytes);
    }
    this.parts.push(frame.payload);

    if (!frame.fin) {
      return null;
    }

    const message: AssembledMessage = {
      opcode,
      payload: Buffer.concat(this.parts, this.size),
    };
    this.reset();
    return message;
  }

  private reset(): void {
    this.opcode = null;
    this.parts = [];
    this.size = 0;
  }
}
