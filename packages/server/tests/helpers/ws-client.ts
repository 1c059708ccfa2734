/**
 * @file ws-client.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import WebSocket from "ws";

/**
 * Independent RFC 6455 client used to talk to the server under test.
 * Collects incoming envelopes in arrival order.
 */
export class TestClient {
  readonly ws: WebSocket;
  /** Errors emitted after the handshake */
  readonly errors: Error[] = [];
  private readonly queue: unknown[] = [];
  private readonly waiters: Array<(message: unknown) => void> = [];

  private constructor(ws: WebSocket) {
    this.ws = ws;
    ws.on("error", (error) => {
      this.errors.push(error);
    });
    ws.on("message", (data) => {
      const message: unknown = JSON.parse(data.toString());
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(message);
      } else {
        this.queue.push(message);
      }
    });
  }

  static connect(url: string): Promise<TestClient> {
    const client = new TestClient(new WebSocket(url));
    return new Promise((resolve, reject) => {
      client.ws.once("open", () => resolve(client));
      client.ws.once("error", reject);
    });
  }

  /**
   * Resolves with the next envelope, in arrival order.
   */
  next(timeoutMs = 2000): Promise<unknown> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve, reject) => {
      const waiter = (message: unknown): void => {
        clearTimeout(timer);
        resolve(message);
      };
      const timer = setTimeout(() => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(new Error(`No message within ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.push(waiter);
    });
  }

  send(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  /**
   * Subscribes and resolves with the next envelope, normally the confirmation.
   * Since the server handles one connection's frames in order, the result also
   * proves no broadcast arrived in between.
   */
  subscribe(stream: string): Promise<unknown> {
    this.send({ type: "subscribe", stream });
    return this.next();
  }

  /**
   * Resolves with the close code once the connection is closed.
   */
  closed(): Promise<number> {
    if (this.ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve(1006);
    }
    return new Promise((resolve) => {
      this.ws.once("close", (code) => resolve(code));
    });
  }

  close(): Promise<number> {
    const closed = this.closed();
    this.ws.close(1000);
    return closed;
  }
}
