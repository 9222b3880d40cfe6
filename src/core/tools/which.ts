import { constants } from "node:fs";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { Environment } from "../../types";

/**
 * Locate an executable on the PATH of `env`. Returns its full path or null.
 */
export async function findExecutable(name: string, env: Environment): Promise<string | null> {
  const dirs = (env.PATH ?? "").split(path.delimiter).filter((dir) => dir !== "");

  for (const dir of dirs) {
    const candidate = path.join(dir, name);
    try {
      const stat = await fs.stat(candidate);
      if (!stat.isFile()) continue;
      await fs.access(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not in this directory
    }
  }

  return null;
}
