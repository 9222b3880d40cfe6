import { describe, expect, test } from "vitest";
import { generateShortId } from "../../src/utils/crypto";

describe("crypto utilities", () => {
  describe("generateShortId", () => {
    test("generates six lowercase alphanumerics", () => {
      expect(generateShortId()).toMatch(/^[a-z0-9]{6}$/);
    });

    test("generates different ids", () => {
      const ids = new Set(Array.from({ length: 20 }, () => generateShortId()));
      expect(ids.size).toBeGreaterThan(1);
    });
  });
});
