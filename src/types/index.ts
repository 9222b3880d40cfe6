/**
 * Centralized type exports for cachette
 */

// Archive types
export type {
  ArchiveRecord,
  BackupSummary,
  ParsedArchiveName,
  PruneCandidate,
  PrunedArchive,
  PruneSummary,
  RestoreResult,
} from "./archive";
// Context types
export type { Environment, Output, RunContext } from "./context";
// Target types
export type {
  BackupTarget,
  Directive,
  DirectiveKind,
  FolderDirective,
  PathDirective,
  ResolvedTargets,
} from "./target";
