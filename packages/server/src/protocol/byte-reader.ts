/**
 * @file byte-reader.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Readable } from 'node:stream';

/**
 * Source of exact-length reads for the frame decoder.
 */
export interface ByteReader {
  /**
   * Resolves with exactly `size` bytes, or null once the stream has ended
   * without that many bytes left. Rejects on stream error or abort.
   */
  read(size: number, signal?: AbortSignal): Promise<Buffer | null>;
}

interface PendingRead {
  size: number;
  resolve: (value: Buffer | null) => void;
  reject: (reason: unknown) => void;
}

export interface SocketByteReaderOptions {
  /** Bytes that arrived together with the upgrade request */
  head?: Buffer;
  /**
   * The socket is paused while more than this many bytes wait to be read,
   * and resumed once reads drain it. Defaults to no limit.
   */
  highWaterMark?: number;
}

/**
 * Turns the push-based `data` events of a socket into pull-based exact reads.
 * One read may be outstanding at a time; the connection's reader loop is the only caller.
 */
export class SocketByteReader implements ByteReader {
  private readonly source: Readable;
  private readonly highWaterMark: number;
  private chunks: Buffer[] = [];
  /** Index of the first unread chunk */
  private head = 0;
  /** Read position inside `chunks[head]` */
  private offset = 0;
  private buffered = 0;
  private paused = false;
  private ended = false;
  private failure: Error | null = null;
  private pending: PendingRead | null = null;

  private readonly onData = (chunk: Buffer | string): void => {
    this.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
  };

  private readonly onEnd = (): void => {
    this.ended = true;
    this.settle();
  };

  private readonly onError = (error: Error): void => {
    this.failure = error;
    this.settle();
  };

  constructor(source: Readable, options: SocketByteReaderOptions = {}) {
    this.source = source;
    this.highWaterMark = options.highWaterMark ?? Number.POSITIVE_INFINITY;
    if (options.head && options.head.length > 0) {
      this.push(options.head);
    }
    source.on('data', this.onData);
    source.on('end', this.onEnd);
    source.on('close', this.onEnd);
    source.on('error', this.onError);
    // An upgraded socket may have been paused by the HTTP parser
    if (!this.paused) {
      source.resume();
    }
  }

  /**
   * Number of bytes received but not yet read.
   */
  get bufferedBytes(): number {
    return this.buffered;
  }

  /**
   * Whether the reader is holding the socket paused.
   */
  get isPaused(): boolean {
    return this.paused;
  }

  read(size: number, signal?: AbortSignal): Promise<Buffer | null> {
    if (size === 0) {
      return Promise.resolve(Buffer.alloc(0));
    }
    if (this.buffered >= size) {
      return Promise.resolve(this.take(size));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.ended) {
      return Promise.resolve(null);
    }
    if (this.pending) {
      return Promise.reject(new Error('A read is already in progress'));
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    return new Promise<Buffer | null>((resolve, reject) => {
      const onAbort = (): void => {
        this.pending = null;
        reject(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        size,
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject: (reason) => {
          signal?.removeEventListener('abort', onAbort);
          reject(reason);
        },
      };
    });
  }

  /**
   * Detaches from the socket. Any outstanding read resolves as end of stream.
   */
  dispose(): void {
    this.source.off('data', this.onData);
    this.source.off('end', this.onEnd);
    this.source.off('close', this.onEnd);
    this.source.off('error', this.onError);
    this.ended = true;
    this.settle();
  }

  private push(chunk: Buffer): void {
    if (chunk.length === 0) {
      return;
    }
    this.chunks.push(chunk);
    this.buffered += chunk.length;
    this.settle();
    if (!this.paused && this.buffered > this.highWaterMark) {
      this.paused = true;
      this.source.pause();
    }
  }

  private settle(): void {
    const pending = this.pending;
    if (!pending) {
      return;
    }
    if (this.buffered >= pending.size) {
      this.pending = null;
      pending.resolve(this.take(pending.size));
    } else if (this.failure) {
      this.pending = null;
      pending.reject(this.failure);
    } else if (this.ended) {
      this.pending = null;
      pending.resolve(null);
    }
  }

  /**
   * Removes `size` bytes from the front. Only a read that spans chunks copies.
   * Callers guarantee `size <= buffered`.
   */
  private take(size: number): Buffer {
    this.buffered -= size;
    const first = this.chunks[this.head];

    let bytes: Buffer;
    if (first && first.length - this.offset >= size) {
      bytes = first.subarray(this.offset, this.offset + size);
      this.advance(size, first.length);
    } else {
      bytes = Buffer.allocUnsafe(size);
      let copied = 0;
      while (copied < size) {
        const chunk = this.chunks[this.head];
        if (!chunk) {
          throw new Error('Byte reader ran out of buffered data');
        }
        const count = Math.min(chunk.length - this.offset, size - copied);
        chunk.copy(bytes, copied, this.offset, this.offset + count);
        copied += count;
        this.advance(count, chunk.length);
      }
    }

    if (this.paused && this.buffered <= this.highWaterMark && !this.ended) {
      this.paused = false;
      this.source.resume();
    }
    return bytes;
  }

  private advance(count: number, chunkLength: number): void {
    this.offset += count;
    if (this.offset < chunkLength) {
      return;
    }
    this.head++;
    this.offset = 0;
    if (this.head === this.chunks.length) {
      this.chunks = [];
      this.head = 0;
    } else if (this.head >= 64 && this.head * 2 >= this.chunks.length) {
      this.chunks = this.chunks.slice(this.head);
      this.head = 0;
    }
  }
}
