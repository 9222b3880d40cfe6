/**
 * Encrypted archive creation for a single target
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupTarget } from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { fileSink, runPipeline } from "../pipeline";
import type { ArchiveTools } from "../tools";

/**
 * Stream `tar` of the target through the encryptor into `archivePath`.
 * Returns the archive size in bytes. A failed archive is removed.
 */
export async function createEncryptedArchive(
  target: BackupTarget,
  archivePath: string,
  passphrase: string,
  tools: ArchiveTools,
): Promise<number> {
  const startTime = Date.now();
  const parentDir = path.dirname(target.sourceDirectory);

  try {
    await runPipeline(
      tools.compressor.pack(parentDir, target.name),
      [tools.encryptor.encrypt(passphrase)],
      fileSink(archivePath),
    );
  } catch (error) {
    await fs.rm(archivePath, { force: true });
    throw error;
  }

  const { size } = await fs.stat(archivePath);
  logger.debug(
    `Archived ${target.sourceDirectory} in ${formatDuration(Date.now() - startTime)} (${formatBytes(size)})`,
  );
  return size;
}
