/**
 * Age-based retention policy
 */

import type { PruneCandidate } from "../../types";
import { UsageError } from "../../utils/errors";

const SECONDS_PER_DAY = 86_400;

export interface RetentionDecision {
  expired: PruneCandidate[];
  kept: PruneCandidate[];
  unparseable: PruneCandidate[];
}

export function assertMaxAgeDays(maxAgeDays: number): void {
  if (!Number.isInteger(maxAgeDays) || maxAgeDays <= 0) {
    throw new UsageError(`max age must be a positive number of days, got ${maxAgeDays}`);
  }
}

/**
 * Validate the CLI's `<days>` argument: digits only, not zero.
 */
export function parseMaxAgeDays(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw)) {
    throw new UsageError(`--prune expects a positive number of days, got ${raw ?? "nothing"}`);
  }
  const days = Number.parseInt(raw, 10);
  assertMaxAgeDays(days);
  return days;
}

export function computeCutoff(now: Date, maxAgeDays: number): number {
  return Math.floor(now.getTime() / 1000) - maxAgeDays * SECONDS_PER_DAY;
}

/**
 * Split candidates by their embedded timestamp. Only archives strictly older
 * than the cutoff expire; anything without a readable timestamp is left alone.
 */
export function selectExpired(
  candidates: PruneCandidate[],
  maxAgeDays: number,
  now: Date,
): RetentionDecision {
  assertMaxAgeDays(maxAgeDays);
  const cutoff = computeCutoff(now, maxAgeDays);
  const decision: RetentionDecision = { expired: [], kept: [], unparseable: [] };

  for (const candidate of candidates) {
    if (!candidate.parsed) {
      decision.unparseable.push(candidate);
    } else if (candidate.parsed.epochSeconds < cutoff) {
      decision.expired.push(candidate);
    } else {
      decision.kept.push(candidate);
    }
  }

  return decision;
}
