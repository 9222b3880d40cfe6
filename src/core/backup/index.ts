/**
 * Backup module exports
 */

export { createEncryptedArchive } from "./archive-creator";
export { type BackupOptions, formatBackupSummary, runBackup } from "./orchestrator";
