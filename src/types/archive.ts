/**
 * Archive, backup and prune result type definitions
 */

import type { BackupTarget } from "./target";

export interface ParsedArchiveName {
  name: string;
  /** `YYYY-MM-DD-HHMMSS` as it appears in the file name */
  timestamp: string;
  /** Local-time instant the timestamp denotes */
  date: Date;
  epochSeconds: number;
}

export interface ArchiveRecord {
  target: BackupTarget;
  archiveName: string;
  archivePath: string;
  sizeBytes: number;
}

export interface BackupSummary {
  count: number;
  totalBytes: number;
  archives: ArchiveRecord[];
  skipped: BackupTarget[];
  /** Timestamp component shared by every archive of the run */
  timestamp: string;
}

export interface RestoreResult {
  archivePath: string;
  extractedRoot: string;
}

export interface PruneCandidate {
  fileName: string;
  filePath: string;
  parsed: ParsedArchiveName | null;
}

export interface PrunedArchive {
  fileName: string;
  sizeBytes: number;
}

export interface PruneSummary {
  count: number;
  bytesFreed: number;
  dryRun: boolean;
  deleted: PrunedArchive[];
  kept: string[];
  unparseable: string[];
}
