/**
 * Directive resolution into backup targets
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupTarget, Directive, ResolvedTargets, RunContext } from "../types";
import { ConfigError } from "../utils/errors";
import { logger } from "../utils/logger";
import { expandPath } from "../utils/path";

export type ResolveContext = Pick<RunContext, "cwd" | "env" | "homeDir">;

export function resolveDirectory(raw: string, context: ResolveContext): string {
  return path.resolve(context.cwd, expandPath(raw, context));
}

function toTarget(sourceDirectory: string, line: number): BackupTarget {
  const name = path.basename(sourceDirectory);
  if (name === "") {
    throw new ConfigError(`line ${line}: cannot back up ${sourceDirectory} (no directory name)`);
  }
  return { name, sourceDirectory, line };
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Immediate subdirectories of `dir`, sorted. Symlinks count when they point at a directory.
 */
export async function listSubdirectories(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const children: string[] = [];

  for (const entry of entries) {
    const childPath = path.join(dir, entry.name);
    if (entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectory(childPath)))) {
      children.push(childPath);
    }
  }

  return children.sort();
}

/**
 * Resolve directives in file order. `path` always yields its target, existing or not;
 * `folder` expands now, so subdirectories created later are not picked up by this run.
 */
export async function resolveTargets(
  directives: Directive[],
  context: ResolveContext,
): Promise<ResolvedTargets> {
  const targets: BackupTarget[] = [];
  const warnings: string[] = [];

  for (const directive of directives) {
    const resolved = resolveDirectory(directive.dir, context);

    switch (directive.kind) {
      case "path":
        targets.push(toTarget(resolved, directive.line));
        break;

      case "folder": {
        if (!(await isDirectory(resolved))) {
          warnings.push(`folder ${resolved} is not a directory or does not exist, skipping.`);
          break;
        }

        const children = await listSubdirectories(resolved);
        if (children.length === 0) {
          warnings.push(
            `folder ${resolved} has no subdirectories, skipping. ` +
              `(Hint: use 'path ${directive.dir}' to back up the directory itself.)`,
          );
          break;
        }

        logger.debug(`folder ${resolved} expanded to ${children.length} target(s)`);
        for (const child of children) {
          targets.push(toTarget(child, directive.line));
        }
        break;
      }
    }
  }

  return { targets, warnings };
}
