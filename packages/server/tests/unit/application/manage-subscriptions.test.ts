/**
 * @file manage-subscriptions.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ManageSubscriptionsUseCase } from "../../../src/application/manage-subscriptions.js";
import { Connection } from "../../../src/domain/entities/connection.js";
import { InMemorySubscriptionRegistry } from "../../../src/infrastructure/persistence/in-memory-registry.js";
import { FakeSocket } from "../../helpers/fake-socket.js";
import { decodeAll, envelopeOf } from "../../helpers/frames.js";
import { createTestLogger } from "../../helpers/logger.js";

describe("ManageSubscriptionsUseCase", () => {
  let registry: InMemorySubscriptionRegistry;
  let useCase: ManageSubscriptionsUseCase;
  let socket: FakeSocket;
  let connection: Connection;

  beforeEach(() => {
    registry = new InMemorySubscriptionRegistry();
    useCase = new ManageSubscriptionsUseCase({ registry, logger: createTestLogger() });
    socket = new FakeSocket();
    connection = new Connection({ id: "conn-1", socket });
  });

  describe("subscribe", () => {
    it("should register the connection and confirm", async () => {
      expect(useCase.subscribe(connection, "counter")).toBe(true);

      expect(registry.snapshot("counter")).toEqual([connection]);
      const frames = await decodeAll(socket.output());
      expect(frames.map(envelopeOf)).toEqual([{ type: "subscribed", stream: "counter" }]);
    });

    it("should confirm a repeated subscription without registering it twice", async () => {
      useCase.subscribe(connection, "counter");

      expect(useCase.subscribe(connection, "counter")).toBe(false);
      expect(registry.subscriberCount("counter")).toBe(1);
      expect(await decodeAll(socket.output())).toHaveLength(2);
    });
  });

  describe("unsubscribe", () => {
    it("should remove the subscription without replying", () => {
      useCase.subscribe(connection, "counter");
      socket.written.length = 0;

      expect(useCase.unsubscribe(connection, "counter")).toBe(true);
      expect(registry.subscriberCount("counter")).toBe(0);
      expect(socket.written).toHaveLength(0);
    });

    it("should ignore a stream the connection never joined", () => {
      expect(useCase.unsubscribe(connection, "counter")).toBe(false);
    });
  });

  describe("release", () => {
    it("should drop every subscription of the connection", () => {
      useCase.subscribe(connection, "counter");
      useCase.subscribe(connection, "progress");

      expect(useCase.release(connection).sort()).toEqual(["counter", "progress"]);
      expect(registry.streamCount()).toBe(0);
    });
  });
});
