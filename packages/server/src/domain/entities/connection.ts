/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Duplex } from 'node:stream';

export type ConnectionState = 'active' | 'closing' | 'closed';

export interface ConnectionProps {
  id: string;
  socket: Duplex;
  /** Called when a write queued by `send` fails asynchronously. */
  onWriteError?: (error: Error) => void;
}

/**
 * Entity representing one upgraded WebSocket connection.
 * Its reader loop owns reads; the registry only holds it for writes.
 */
export class Connection {
  private readonly _id: string;
  private readonly _socket: Duplex;
  private readonly _streams = new Set<string>();
  private readonly _connectedAt: Date;
  private readonly onWriteError?: (error: Error) => void;
  private _state: ConnectionState;
  private _lastFrameAt: Date;

  constructor(props: ConnectionProps) {
    this._id = props.id;
    this._socket = props.socket;
    this.onWriteError = props.onWriteError;
    this._state = 'active';
    this._connectedAt = new Date();
    this._lastFrameAt = new Date();
  }

  get id(): string {
    return this._id;
  }

  get socket(): Duplex {
    return this._socket;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get isActive(): boolean {
    return this._state === 'active';
  }

  get connectedAt(): Date {
    return this._connectedAt;
  }

  get lastFrameAt(): Date {
    return this._lastFrameAt;
  }

  /**
   * Stream names this connection is currently subscribed to.
   */
  get streams(): ReadonlySet<string> {
    return this._streams;
  }

  /**
   * Records a subscription. Returns false if it was already present.
   * Only the subscription registry calls this.
   */
  trackStream(stream: string): boolean {
    if (this._streams.has(stream)) {
      return false;
    }
    this._streams.add(stream);
    return true;
  }

  /**
   * Forgets a subscription. Returns false if it was not present.
   */
  untrackStream(stream: string): boolean {
    return this._streams.delete(stream);
  }

  /**
   * Updates the last frame timestamp.
   */
  recordFrame(): void {
    this._lastFrameAt = new Date();
  }

  /**
   * Moves the connection out of the active state. Returns false if it already left it.
   */
  beginClosing(): boolean {
    if (this._state !== 'active') {
      return false;
    }
    this._state = 'closing';
    return true;
  }

  /**
   * Marks the connection as closed (terminal).
   */
  markClosed(): void {
    this._state = 'closed';
  }

  /**
   * Queues an encoded frame on the socket.
   * Returns false if the connection is not active or the socket refuses the write.
   * Never waits for the peer to drain.
   */
  send(frame: Buffer): boolean {
    if (!this.isActive || this._socket.destroyed || !this._socket.writable) {
      return false;
    }
    try {
      this._socket.write(frame, (error) => {
        if (error) {
          this.onWriteError?.(error);
        }
      });
      return true;
    } catch {
      // write() throws synchronously only for a socket torn down between the check and the call
      return false;
    }
  }
}
