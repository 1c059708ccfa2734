/**
 * @file env.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from "vitest";
import { EnvSchema, resolveBroadcastUrl } from "../../../src/config/env.js";

describe("EnvSchema", () => {
  it("should apply defaults to an empty environment", () => {
    expect(EnvSchema.parse({})).toEqual({
      NODE_ENV: "development",
      PORT: 3000,
      HOST: "0.0.0.0",
      LOG_LEVEL: "info",
      CABLE_PATH: "/cable",
      BROADCAST_PATH: "/_broadcast",
      READ_TIMEOUT_MS: 60000,
      PING_INTERVAL_MS: 0,
      MAX_MESSAGE_BYTES: 1048576,
    });
  });

  it("should coerce numeric strings", () => {
    const env = EnvSchema.parse({ PORT: "8080", READ_TIMEOUT_MS: "15000", PING_INTERVAL_MS: "25000" });

    expect(env.PORT).toBe(8080);
    expect(env.READ_TIMEOUT_MS).toBe(15000);
    expect(env.PING_INTERVAL_MS).toBe(25000);
  });

  it("should reject a port out of range", () => {
    expect(EnvSchema.safeParse({ PORT: "70000" }).success).toBe(false);
  });

  it("should reject a zero read timeout", () => {
    expect(EnvSchema.safeParse({ READ_TIMEOUT_MS: "0" }).success).toBe(false);
  });

  it("should reject paths without a leading slash", () => {
    expect(EnvSchema.safeParse({ CABLE_PATH: "cable" }).success).toBe(false);
  });

  it("should reject an unknown log level", () => {
    expect(EnvSchema.safeParse({ LOG_LEVEL: "verbose" }).success).toBe(false);
  });

  it("should reject a broadcast URL that is not a URL", () => {
    expect(EnvSchema.safeParse({ CABLE_BROADCAST_URL: "not a url" }).success).toBe(false);
  });
});

describe("resolveBroadcastUrl", () => {
  it("should default to the local trigger", () => {
    expect(resolveBroadcastUrl({ PORT: 4000, BROADCAST_PATH: "/_broadcast" })).toBe(
      "http://localhost:4000/_broadcast"
    );
  });

  it("should prefer an explicit URL", () => {
    expect(
      resolveBroadcastUrl({
        CABLE_BROADCAST_URL: "http://127.0.0.1:9000/_broadcast",
        PORT: 4000,
        BROADCAST_PATH: "/_broadcast",
      })
    ).toBe("http://127.0.0.1:9000/_broadcast");
  });
});
