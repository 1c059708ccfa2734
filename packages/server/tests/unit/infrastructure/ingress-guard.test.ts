/**
 * @file ingress-guard.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from "vitest";
import { isLoopbackAddress } from "../../../src/infrastructure/http/ingress-guard.js";

describe("isLoopbackAddress", () => {
  describe("accepted", () => {
    it.each(["127.0.0.1", "127.0.0.2", "127.255.255.254", "::1", "::ffff:127.0.0.1", "::FFFF:127.1.2.3"])(
      "should accept %s",
      (address) => {
        expect(isLoopbackAddress(address)).toBe(true);
      }
    );
  });

  describe("rejected", () => {
    it.each([
      "192.168.1.1",
      "10.0.0.5",
      "8.8.8.8",
      "128.0.0.1",
      "0.0.0.0",
      "2001:db8::1",
      "::",
      "::ffff:192.168.1.1",
      "localhost",
      "",
    ])("should reject %s", (address) => {
      expect(isLoopbackAddress(address)).toBe(false);
    });

    it("should reject a missing address", () => {
      expect(isLoopbackAddress(undefined)).toBe(false);
    });
  });
});
