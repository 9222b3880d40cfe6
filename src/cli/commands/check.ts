import * as fs from "node:fs/promises";
import { findConfigFile, loadTargets } from "../../config";
import type { CommandContext } from "../context";

export interface CheckCommandOptions {
  configPath?: string;
}

async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Resolve the directive file and list what a backup would archive.
 */
export async function checkCommand(
  options: CheckCommandOptions,
  context: CommandContext,
): Promise<number> {
  const configPath = findConfigFile(context, options.configPath);
  const { targets, warnings } = await loadTargets(configPath, context);
  for (const warning of warnings) {
    context.output.warn(warning);
  }

  context.output.line(`Config: ${configPath}`);
  context.output.line(`Directories to back up (${targets.length}):`);

  let missing = 0;
  for (const target of targets) {
    if (await isDirectory(target.sourceDirectory)) {
      context.output.line(`  ${target.sourceDirectory}`);
    } else {
      missing++;
      context.output.line(`  ${target.sourceDirectory} (missing, will be skipped)`);
    }
  }

  if (missing > 0) {
    context.output.warn(`${missing} configured director${missing === 1 ? "y does" : "ies do"} not exist.`);
  }
  return 0;
}
