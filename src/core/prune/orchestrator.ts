/**
 * Prune orchestration
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { PruneCandidate, PrunedArchive, PruneSummary, RunContext } from "../../types";
import { logger } from "../../utils/logger";
import { isArchiveFileName, parseArchiveName } from "../../utils/naming";
import { isPathWithinDir } from "../../utils/path";
import { assertMaxAgeDays, selectExpired } from "./retention";

export interface PruneOptions {
  context: RunContext;
  dryRun?: boolean;
}

/**
 * Regular files in `dir` named `*.tar.gz.age`, sorted by name, with their
 * timestamps parsed where possible.
 */
export async function scanArchives(dir: string): Promise<PruneCandidate[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isFile() && isArchiveFileName(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((fileName) => ({
      fileName,
      filePath: path.join(dir, fileName),
      parsed: parseArchiveName(fileName),
    }));
}

export function formatPruneSummary(summary: Pick<PruneSummary, "count" | "bytesFreed" | "dryRun">): string {
  return summary.dryRun
    ? `${summary.count} archive(s) would be deleted, ${summary.bytesFreed} bytes would be freed`
    : `${summary.count} archive(s) deleted, ${summary.bytesFreed} bytes freed`;
}

/**
 * Delete archives in the working directory whose embedded timestamp is more
 * than `maxAgeDays` days old. The summary line is printed even when nothing
 * was deleted.
 */
export async function runPrune(maxAgeDays: number, options: PruneOptions): Promise<PruneSummary> {
  const { context, dryRun = false } = options;
  assertMaxAgeDays(maxAgeDays);

  const candidates = await scanArchives(context.cwd);
  const { expired, kept, unparseable } = selectExpired(candidates, maxAgeDays, context.now());

  logger.info(
    `Prune scan: ${candidates.length} archive(s), ${expired.length} expired, ${unparseable.length} unparseable`,
  );

  for (const candidate of unparseable) {
    context.output.warn(`cannot parse timestamp in ${candidate.fileName}, skipping.`);
  }

  const deleted: PrunedArchive[] = [];
  let bytesFreed = 0;

  for (const candidate of expired) {
    if (!isPathWithinDir(candidate.filePath, context.cwd)) {
      context.output.warn(`${candidate.filePath} is outside ${context.cwd}, skipping.`);
      continue;
    }

    const { size } = await fs.stat(candidate.filePath);

    if (dryRun) {
      context.output.line(`Would delete ${candidate.fileName} (${size} bytes)`);
    } else {
      await fs.unlink(candidate.filePath);
      context.output.line(`Deleted ${candidate.fileName} (${size} bytes)`);
    }

    deleted.push({ fileName: candidate.fileName, sizeBytes: size });
    bytesFreed += size;
  }

  const summary: PruneSummary = {
    count: deleted.length,
    bytesFreed,
    dryRun,
    deleted,
    kept: kept.map((candidate) => candidate.fileName),
    unparseable: unparseable.map((candidate) => candidate.fileName),
  };

  context.output.line(formatPruneSummary(summary));
  return summary;
}
