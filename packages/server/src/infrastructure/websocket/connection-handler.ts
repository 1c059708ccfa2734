/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Duplex } from 'node:stream';
import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import type { ManageSubscriptionsUseCase } from '../../application/manage-subscriptions.js';
import { Connection } from '../../domain/entities/connection.js';
import {
  FrameProtocolError,
  LivenessTimeoutError,
} from '../../domain/errors/domain-errors.js';
import { CLOSE_CODES, WEBSOCKET_PROTOCOL } from '../../config/constants.js';
import { SocketByteReader } from '../../protocol/byte-reader.js';
import {
  decodeFrame,
  encodeCloseFrame,
  encodeFrame,
  Opcode,
  parseClosePayload,
  type Frame,
} from '../../protocol/frame-codec.js';
import { MessageAssembler } from '../../protocol/message-assembler.js';
import { createPingMessage, encodeServerMessage } from '../../protocol/envelopes.js';
import { getMessageType, parseClientMessage } from '../../protocol/schemas.js';

/**
 * Why a reader loop ended.
 */
export type CloseReason =
  | 'close'
  | 'end'
  | 'timeout'
  | 'protocol_error'
  | 'socket_error';

export interface ConnectionHandlerConfig {
  /** Deadline for each frame read */
  readTimeoutMs: number;
  /** Largest frame or assembled message accepted */
  maxMessageBytes: number;
}

export interface ConnectionHandlerDeps {
  manageSubscriptions: ManageSubscriptionsUseCase;
  logger: Logger;
  generateId?: () => string;
}

/**
 * Runs one reader loop per upgraded socket.
 * Decodes frames, answers pings, applies subscribe/unsubscribe envelopes and
 * tears the connection down on close, end of stream, protocol error or timeout.
 */
export class ConnectionHandler {
  private readonly connections = new Set<Connection>();
  private readonly running = new Set<Promise<CloseReason>>();
  private readonly config: ConnectionHandlerConfig;
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(config: ConnectionHandlerConfig, deps: ConnectionHandlerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });
    this.generateId = deps.generateId ?? (() => nanoid(12));
  }

  /**
   * Returns the number of open connections.
   */
  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Takes ownership of an upgraded socket and reads from it until it closes.
   * Resolves with the close reason after teardown; never rejects.
   */
  handleConnection(socket: Duplex, head?: Buffer): Promise<CloseReason> {
    const running = this.run(socket, head);
    this.running.add(running);
    void running.finally(() => {
      this.running.delete(running);
    });
    return running;
  }

  /**
   * Resolves once every reader loop started so far has torn down.
   */
  async whenIdle(): Promise<void> {
    await Promise.all(this.running);
  }

  private async run(socket: Duplex, head: Buffer | undefined): Promise<CloseReason> {
    const connectionId = this.generateId();
    const log = this.logger.child({ connectionId });

    // Stays attached after the reader detaches so late socket errors are never unhandled
    socket.on('error', (error) => {
      log.debug({ error }, 'Socket error');
    });

    const connection = new Connection({
      id: connectionId,
      socket,
      onWriteError: (error) => {
        log.debug({ error }, 'Write failed');
      },
    });
    const reader = new SocketByteReader(socket, {
      head,
      highWaterMark: this.config.maxMessageBytes + WEBSOCKET_PROTOCOL.MAX_FRAME_HEADER_BYTES,
    });
    this.connections.add(connection);
    log.debug({ connections: this.connections.size }, 'Connection opened');

    let reason: CloseReason = 'end';
    try {
      reason = await this.readLoop(connection, reader, log);
    } catch (error) {
      reason = this.classify(error);
      if (error instanceof FrameProtocolError) {
        log.warn({ code: error.code, message: error.message }, 'Protocol error, closing');
        connection.send(encodeCloseFrame(error.closeCode, error.message));
      } else if (error instanceof LivenessTimeoutError) {
        log.info({ lastFrameAt: connection.lastFrameAt.toISOString() }, 'Read deadline expired');
      } else {
        log.debug({ error }, 'Reader loop stopped by socket failure');
      }
    } finally {
      this.teardown(connection, reader, reason, log);
    }
    return reason;
  }

  /**
   * Sends a `ping` envelope to every active connection. Returns how many accepted it.
   */
  probe(): number {
    const frame = encodeServerMessage(createPingMessage());
    let sent = 0;
    for (const connection of this.connections) {
      if (connection.send(frame)) {
        sent++;
      }
    }
    return sent;
  }

  /**
   * Sends a close frame to every active connection and half-closes its socket.
   * Each reader loop finishes when the peer answers or the socket ends.
   */
  closeAll(code: number = CLOSE_CODES.GOING_AWAY, reason = 'Server shutting down'): void {
    const frame = encodeCloseFrame(code, reason);
    for (const connection of this.connections) {
      connection.send(frame);
      connection.socket.end();
    }
  }

  /**
   * Destroys every remaining socket.
   */
  terminateAll(): void {
    for (const connection of this.connections) {
      connection.socket.destroy();
    }
  }

  private async readLoop(
    connection: Connection,
    reader: SocketByteReader,
    log: Logger
  ): Promise<CloseReason> {
    const assembler = new MessageAssembler(this.config.maxMessageBytes);

    while (connection.isActive) {
      const frame = await this.readFrame(reader);
      if (!frame) {
        return 'end';
      }
      connection.recordFrame();

      switch (frame.opcode) {
        case Opcode.PING:
          // Answered before the next frame is read
          connection.send(encodeFrame(Opcode.PONG, frame.payload));
          break;

        case Opcode.PONG:
          break;

        case Opcode.CLOSE: {
          const { code, reason } = parseClosePayload(frame.payload);
          log.debug({ code, reason }, 'Close frame received');
          connection.send(encodeCloseFrame(code ?? CLOSE_CODES.NORMAL));
          return 'close';
        }

        case Opcode.TEXT:
        case Opcode.BINARY:
        case Opcode.CONTINUATION: {
          const message = assembler.push(frame);
          if (message?.opcode === Opcode.TEXT) {
            this.handleMessage(connection, message.payload.toString('utf8'), log);
          }
          break;
        }
      }
    }
    return 'end';
  }

  /**
   * Decodes one frame, bounded by the read deadline.
   */
  private async readFrame(reader: SocketByteReader): Promise<Frame | null> {
    const { readTimeoutMs, maxMessageBytes } = this.config;
    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new LivenessTimeoutError(readTimeoutMs));
    }, readTimeoutMs);

    try {
      return await decodeFrame(reader, {
        signal: controller.signal,
        maxPayloadBytes: maxMessageBytes,
      });
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Applies one text message. Anything that is not a known envelope is ignored.
   */
  private handleMessage(connection: Connection, data: string, log: Logger): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch {
      log.debug({ length: data.length }, 'Ignoring message that is not JSON');
      return;
    }

    const message = parseClientMessage(parsed);
    if (!message) {
      log.debug({ type: getMessageType(parsed) }, 'Ignoring unknown message');
      return;
    }

    switch (message.type) {
      case 'subscribe':
        this.deps.manageSubscriptions.subscribe(connection, message.stream);
        break;

      case 'unsubscribe':
        this.deps.manageSubscriptions.unsubscribe(connection, message.stream);
        break;

      case 'pong':
        break;
    }
  }

  private classify(error: unknown): CloseReason {
    if (error instanceof LivenessTimeoutError) {
      return 'timeout';
    }
    if (error instanceof FrameProtocolError) {
      return 'protocol_error';
    }
    return 'socket_error';
  }

  /**
   * Registry membership is dropped before the socket closes.
   */
  private teardown(
    connection: Connection,
    reader: SocketByteReader,
    reason: CloseReason,
    log: Logger
  ): void {
    connection.beginClosing();
    const streams = this.deps.manageSubscriptions.release(connection);
    reader.dispose();

    const { socket } = connection;
    if (!socket.destroyed) {
      if (reason === 'close' || reason === 'protocol_error') {
        // Let the close frame flush first
        socket.end(() => socket.destroy());
      } else {
        socket.destroy();
      }
    }

    connection.markClosed();
    this.connections.delete(connection);
    log.debug(
      { reason, streams, connections: this.connections.size },
      'Connection closed'
    );
  }
}
