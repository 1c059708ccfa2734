/**
 * @file turbo-stream.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from "vitest";
import {
  escapeAttribute,
  streamMarker,
  turboStream,
  TurboStreamBroadcaster,
} from "../../../src/producer/turbo-stream.js";
import { BroadcastClient } from "../../../src/producer/broadcast-client.js";
import { createTestLogger } from "../../helpers/logger.js";

describe("turboStream", () => {
  it("should wrap the fragment in a template", () => {
    expect(turboStream("replace", "counter", '<span id="counter">1</span>')).toBe(
      '<turbo-stream action="replace" target="counter"><template><span id="counter">1</span></template></turbo-stream>'
    );
  });

  it("should build every action with a template except remove", () => {
    expect(turboStream("append", "list", "<li>a</li>")).toContain("<template><li>a</li></template>");
    expect(turboStream("prepend", "list", "<li>a</li>")).toContain('action="prepend"');
    expect(turboStream("update", "list", "")).toBe(
      '<turbo-stream action="update" target="list"><template></template></turbo-stream>'
    );
    expect(turboStream("remove", "item_1")).toBe(
      '<turbo-stream action="remove" target="item_1"></turbo-stream>'
    );
  });

  it("should escape the target attribute", () => {
    expect(turboStream("remove", 'a"b')).toBe(
      '<turbo-stream action="remove" target="a&quot;b"></turbo-stream>'
    );
  });
});

describe("escapeAttribute", () => {
  it("should escape markup characters", () => {
    expect(escapeAttribute(`<a href='x'>&"`)).toBe("&lt;a href=&#39;x&#39;&gt;&amp;&quot;");
  });
});

describe("streamMarker", () => {
  it("should list the streams in a hidden element", () => {
    expect(streamMarker(["counter", "progress"])).toBe(
      '<div data-turbo-stream="true" data-streams="counter,progress" style="display: none;"></div>'
    );
  });
});

describe("TurboStreamBroadcaster", () => {
  function createBroadcaster() {
    const client = new BroadcastClient(
      { url: "http://localhost:3000/_broadcast" },
      { logger: createTestLogger() }
    );
    const broadcast = vi.spyOn(client, "broadcast").mockResolvedValue(true);
    return { broadcaster: new TurboStreamBroadcaster(client), broadcast };
  }

  it("should post an append action to the stream", async () => {
    const { broadcaster, broadcast } = createBroadcaster();

    await expect(broadcaster.broadcastAppendTo("messages", "list", "<li>hi</li>")).resolves.toBe(true);

    expect(broadcast).toHaveBeenCalledWith(
      "messages",
      '<turbo-stream action="append" target="list"><template><li>hi</li></template></turbo-stream>'
    );
  });

  it("should post each action it offers", async () => {
    const { broadcaster, broadcast } = createBroadcaster();

    await broadcaster.broadcastPrependTo("s", "t", "a");
    await broadcaster.broadcastReplaceTo("s", "t", "b");
    await broadcaster.broadcastUpdateTo("s", "t", "c");
    await broadcaster.broadcastRemoveTo("s", "t");

    expect(broadcast.mock.calls.map(([, data]) => data)).toEqual([
      turboStream("prepend", "t", "a"),
      turboStream("replace", "t", "b"),
      turboStream("update", "t", "c"),
      turboStream("remove", "t"),
    ]);
  });
});
