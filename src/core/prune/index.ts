/**
 * Prune module exports
 */

export {
  formatPruneSummary,
  type PruneOptions,
  runPrune,
  scanArchives,
} from "./orchestrator";
export {
  assertMaxAgeDays,
  computeCutoff,
  parseMaxAgeDays,
  type RetentionDecision,
  selectExpired,
} from "./retention";
