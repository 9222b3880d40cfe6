import { describe, expect, test } from "vitest";
import {
  assertMaxAgeDays,
  computeCutoff,
  parseMaxAgeDays,
  selectExpired,
} from "../../src/core/prune";
import type { PruneCandidate } from "../../src/types";
import { UsageError } from "../../src/utils/errors";
import { parseArchiveName } from "../../src/utils/naming";

function candidate(fileName: string): PruneCandidate {
  return { fileName, filePath: `/work/${fileName}`, parsed: parseArchiveName(fileName) };
}

describe("retention", () => {
  describe("parseMaxAgeDays", () => {
    test("accepts positive integers", () => {
      expect(parseMaxAgeDays("30")).toBe(30);
      expect(parseMaxAgeDays("1")).toBe(1);
    });

    test("rejects zero, negatives, fractions and words", () => {
      for (const raw of ["0", "-5", "1.5", "thirty", "", " 7"]) {
        expect(() => parseMaxAgeDays(raw)).toThrow(UsageError);
      }
    });

    test("names the bad value", () => {
      expect(() => parseMaxAgeDays("abc")).toThrow("--prune expects a positive number of days, got abc");
    });
  });

  describe("assertMaxAgeDays", () => {
    test("rejects non-positive and fractional values", () => {
      expect(() => assertMaxAgeDays(0)).toThrow(UsageError);
      expect(() => assertMaxAgeDays(2.5)).toThrow(UsageError);
      expect(() => assertMaxAgeDays(7)).not.toThrow();
    });
  });

  describe("computeCutoff", () => {
    test("subtracts whole days in seconds", () => {
      const now = new Date(Date.UTC(2024, 0, 31, 12, 0, 0));
      expect(computeCutoff(now, 30)).toBe(Date.UTC(2024, 0, 1, 12, 0, 0) / 1000);
    });
  });

  describe("selectExpired", () => {
    test("expires only archives strictly older than the cutoff", () => {
      const now = new Date(2024, 0, 31, 12, 0, 0);
      const atCutoff = candidate("a-2024-01-01-120000.tar.gz.age");
      const justOlder = candidate("b-2024-01-01-115959.tar.gz.age");
      const recent = candidate("c-2024-01-30-000000.tar.gz.age");

      const decision = selectExpired([atCutoff, justOlder, recent], 30, now);

      expect(decision.expired).toEqual([justOlder]);
      expect(decision.kept).toEqual([atCutoff, recent]);
      expect(decision.unparseable).toEqual([]);
    });

    test("sets aside names without a readable timestamp", () => {
      const odd = candidate("docs-latest.tar.gz.age");

      const decision = selectExpired([odd], 1, new Date(2024, 0, 1));

      expect(decision.unparseable).toEqual([odd]);
      expect(decision.expired).toEqual([]);
    });

    test("keeps archives dated in the future", () => {
      const future = candidate("docs-2099-12-31-000000.tar.gz.age");
      expect(selectExpired([future], 1, new Date(2024, 0, 1)).kept).toEqual([future]);
    });
  });
});
