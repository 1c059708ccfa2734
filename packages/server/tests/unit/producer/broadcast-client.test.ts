/**
 * @file broadcast-client.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from "vitest";
import { BroadcastClient } from "../../../src/producer/broadcast-client.js";
import { createTestLogger } from "../../helpers/logger.js";

const TRIGGER_URL = "http://localhost:3000/_broadcast";

function createClient(fetchImpl: typeof fetch) {
  return new BroadcastClient({ url: TRIGGER_URL, timeoutMs: 250 }, { logger: createTestLogger(), fetch: fetchImpl });
}

describe("BroadcastClient", () => {
  it("should post the stream and data as JSON", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(new Response("OK", { status: 200 }));
    const client = createClient(fetchMock);

    await expect(client.broadcast("progress", { progress: 50 })).resolves.toBe(true);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe(TRIGGER_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(init?.body).toBe('{"stream":"progress","data":{"progress":50}}');
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("should read the response body on success and on rejection", async () => {
    const accepted = new Response("OK", { status: 200 });
    const refused = new Response("Forbidden", { status: 403 });
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValueOnce(accepted).mockResolvedValueOnce(refused);
    const client = createClient(fetchMock);

    await expect(client.broadcast("counter", "<p>1</p>")).resolves.toBe(true);
    await expect(client.broadcast("counter", "<p>2</p>")).resolves.toBe(false);

    expect(accepted.bodyUsed).toBe(true);
    expect(refused.bodyUsed).toBe(true);
  });

  it("should report a rejected broadcast as false", async () => {
    const fetchMock = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response("Forbidden", { status: 403 }));

    await expect(createClient(fetchMock).broadcast("counter", "<p>1</p>")).resolves.toBe(false);
  });

  it("should report a network failure as false", async () => {
    const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error("connect ECONNREFUSED"));

    await expect(createClient(fetchMock).broadcast("counter", "<p>1</p>")).resolves.toBe(false);
  });
});
