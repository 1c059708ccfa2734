/**
 * @file broadcast-message.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from "vitest";
import { BroadcastMessageUseCase } from "../../../src/application/broadcast-message.js";
import { Connection } from "../../../src/domain/entities/connection.js";
import { BroadcastPayload } from "../../../src/domain/value-objects/broadcast-payload.js";
import { InMemorySubscriptionRegistry } from "../../../src/infrastructure/persistence/in-memory-registry.js";
import { FakeSocket } from "../../helpers/fake-socket.js";
import { decodeAll, envelopeOf } from "../../helpers/frames.js";
import { createTestLogger } from "../../helpers/logger.js";

describe("BroadcastMessageUseCase", () => {
  let registry: InMemorySubscriptionRegistry;
  let useCase: BroadcastMessageUseCase;

  function subscriber(id: string, stream: string): FakeSocket {
    const socket = new FakeSocket();
    registry.subscribe(new Connection({ id, socket }), stream);
    return socket;
  }

  beforeEach(() => {
    registry = new InMemorySubscriptionRegistry();
    useCase = new BroadcastMessageUseCase({ registry, logger: createTestLogger() });
  });

  it("should deliver one message envelope to every subscriber", async () => {
    const first = subscriber("a", "counter");
    const second = subscriber("b", "counter");

    const result = useCase.execute({
      stream: "counter",
      payload: BroadcastPayload.html("<turbo-stream>1</turbo-stream>"),
    });

    expect(result).toEqual({ stream: "counter", subscribers: 2, delivered: 2 });
    for (const socket of [first, second]) {
      const frames = await decodeAll(socket.output());
      expect(frames).toHaveLength(1);
      expect(envelopeOf(frames[0])).toEqual({
        type: "message",
        stream: "counter",
        data: "<turbo-stream>1</turbo-stream>",
      });
    }
  });

  it("should deliver a structured payload as a nested value", async () => {
    const socket = subscriber("a", "progress");

    useCase.execute({ stream: "progress", payload: BroadcastPayload.json({ progress: 50 }) });

    const [frame] = await decodeAll(socket.output());
    expect(envelopeOf(frame)).toEqual({
      type: "message",
      stream: "progress",
      data: { progress: 50 },
    });
  });

  it("should not deliver to subscribers of other streams", () => {
    const other = subscriber("a", "other");

    const result = useCase.execute({ stream: "counter", payload: BroadcastPayload.html("x") });

    expect(result).toEqual({ stream: "counter", subscribers: 0, delivered: 0 });
    expect(other.written).toHaveLength(0);
  });

  it("should keep going past a dead connection and leave it registered", async () => {
    const dead = subscriber("dead", "counter");
    const alive = subscriber("alive", "counter");
    dead.destroy();

    const result = useCase.execute({ stream: "counter", payload: BroadcastPayload.html("x") });

    expect(result).toEqual({ stream: "counter", subscribers: 2, delivered: 1 });
    expect(await decodeAll(alive.output())).toHaveLength(1);
    expect(registry.subscriberCount("counter")).toBe(2);
  });
});
