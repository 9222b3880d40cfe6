/**
 * Core module exports
 */

// Backup
export {
  type BackupOptions,
  createEncryptedArchive,
  formatBackupSummary,
  runBackup,
} from "./backup";

// Passphrase
export { type PassphraseRequest, type Prompter, resolvePassphrase } from "./passphrase";

// Pipeline
export {
  fileSink,
  fileSource,
  runPipeline,
  type SinkStage,
  type SourceStage,
  type TransformStage,
  transformStage,
} from "./pipeline";

// Prune
export {
  formatPruneSummary,
  parseMaxAgeDays,
  type PruneOptions,
  runPrune,
  scanArchives,
  selectExpired,
} from "./prune";

// Restore
export { assertArchiveFile, extractedRootFor, type RestoreOptions, runRestore } from "./restore";

// Tools
export {
  AgeEncryptor,
  type ArchiveTools,
  type Compressor,
  createDefaultTools,
  type Encryptor,
  TarCompressor,
} from "./tools";
