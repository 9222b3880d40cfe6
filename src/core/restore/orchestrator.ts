/**
 * Restore orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { RestoreResult, RunContext } from "../../types";
import { NotFoundError } from "../../utils/errors";
import { formatDuration } from "../../utils/format";
import { logger } from "../../utils/logger";
import { parseArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { fileSource, runPipeline } from "../pipeline";
import type { ArchiveTools } from "../tools";

export interface RestoreOptions {
  context: RunContext;
  tools: ArchiveTools;
}

/**
 * Resolve `archivePath` against the working directory; NotFoundError unless it is a file.
 */
export async function assertArchiveFile(archivePath: string, cwd: string): Promise<string> {
  const absolutePath = path.resolve(cwd, archivePath);
  try {
    if ((await fs.stat(absolutePath)).isFile()) return absolutePath;
  } catch {
    // reported below
  }
  throw new NotFoundError(archivePath);
}

/**
 * Directory the archive extracts to: its recorded base name inside the
 * working directory, or the working directory when the name is unknown.
 */
export function extractedRootFor(archivePath: string, cwd: string): string {
  const parsed = parseArchiveName(path.basename(archivePath));
  if (!parsed) return cwd;

  const root = path.join(cwd, parsed.name);
  return isPathWithinDir(root, cwd) && root !== cwd ? root : cwd;
}

/**
 * Decrypt `archivePath` and extract it into the working directory, recreating
 * the tree under the base name recorded at backup time.
 */
export async function runRestore(
  archivePath: string,
  passphrase: string,
  options: RestoreOptions,
): Promise<RestoreResult> {
  const { context, tools } = options;
  const absolutePath = await assertArchiveFile(archivePath, context.cwd);

  const startTime = Date.now();
  await runPipeline(
    fileSource(absolutePath),
    [tools.encryptor.decrypt(passphrase)],
    tools.compressor.unpack(context.cwd),
  );
  logger.debug(`Extracted ${absolutePath} in ${formatDuration(Date.now() - startTime)}`);

  context.output.line(`Restored from ${archivePath}`);

  return { archivePath: absolutePath, extractedRoot: extractedRootFor(absolutePath, context.cwd) };
}
