/**
 * Restore module exports
 */

export {
  assertArchiveFile,
  extractedRootFor,
  type RestoreOptions,
  runRestore,
} from "./orchestrator";
