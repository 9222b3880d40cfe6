/**
 * Command exports
 */

export { type BackupCommandOptions, backupCommand } from "./backup";
export { type CheckCommandOptions, checkCommand } from "./check";
export { type PruneCommandOptions, pruneCommand } from "./prune";
export { type RestoreCommandOptions, restoreCommand } from "./restore";
