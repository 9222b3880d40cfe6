/**
 * Backup orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { ArchiveRecord, BackupSummary, BackupTarget, RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { formatArchiveNameFromTimestamp, formatTimestamp } from "../../utils/naming";
import { relativeDisplay } from "../../utils/path";
import type { ArchiveTools } from "../tools";
import { createEncryptedArchive } from "./archive-creator";

export interface BackupOptions {
  context: RunContext;
  tools: ArchiveTools;
}

type SourceState = "directory" | "not_directory" | "missing";

async function inspectSource(dirPath: string): Promise<SourceState> {
  try {
    return (await fs.stat(dirPath)).isDirectory() ? "directory" : "not_directory";
  } catch {
    return "missing";
  }
}

export function formatBackupSummary(summary: Pick<BackupSummary, "count" | "totalBytes">): string {
  return `${summary.count} archive(s) created, total size: ${summary.totalBytes} bytes`;
}

/**
 * Write one encrypted archive per target into the working directory.
 *
 * All archives of a run share the timestamp taken before the first target.
 * Missing sources are skipped with a warning; a tool failure aborts the run
 * and leaves archives already written in place.
 */
export async function runBackup(
  targets: BackupTarget[],
  passphrase: string,
  options: BackupOptions,
): Promise<BackupSummary> {
  const { context, tools } = options;
  const timestamp = formatTimestamp(context.now());

  logger.info(`Starting backup of ${targets.length} target(s) at ${timestamp}`);

  const archives: ArchiveRecord[] = [];
  const skipped: BackupTarget[] = [];
  const claimed = new Map<string, BackupTarget>();
  let totalBytes = 0;

  for (const target of targets) {
    const state = await inspectSource(target.sourceDirectory);
    if (state !== "directory") {
      const problem = state === "missing" ? "does not exist" : "is not a directory";
      context.output.warn(`${target.sourceDirectory} ${problem}, skipping.`);
      skipped.push(target);
      continue;
    }

    const archiveName = formatArchiveNameFromTimestamp(target.name, timestamp);
    const owner = claimed.get(archiveName);
    if (owner) {
      context.output.warn(
        `${target.sourceDirectory} would overwrite ${archiveName} from ${owner.sourceDirectory}, skipping.`,
      );
      skipped.push(target);
      continue;
    }
    claimed.set(archiveName, target);

    const archivePath = path.join(context.cwd, archiveName);
    const sizeBytes = await createEncryptedArchive(target, archivePath, passphrase, tools);

    context.output.line(`${relativeDisplay(archivePath, context.cwd)} (${sizeBytes} bytes)`);
    archives.push({ target, archiveName, archivePath, sizeBytes });
    totalBytes += sizeBytes;
  }

  const summary: BackupSummary = {
    count: archives.length,
    totalBytes,
    archives,
    skipped,
    timestamp,
  };

  context.output.line(formatBackupSummary(summary));
  return summary;
}
