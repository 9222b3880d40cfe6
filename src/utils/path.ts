/**
 * Path expansion and manipulation utilities
 */

import * as path from "node:path";
import type { Environment } from "../types";

export interface ExpansionContext {
  env: Environment;
  homeDir: string;
}

// $VAR or ${VAR}
const VARIABLE_PATTERN = /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g;

/**
 * Expand a leading `~` or `~/` to the home directory. `~user` forms are left as-is.
 */
export function expandHome(raw: string, homeDir: string): string {
  if (raw === "~") return homeDir;
  if (raw.startsWith("~/")) return path.join(homeDir, raw.slice(2));
  return raw;
}

/**
 * Expand `$VAR` and `${VAR}` from the environment.
 * Undefined variables are kept literally.
 */
export function expandVariables(raw: string, env: Environment): string {
  return raw.replace(VARIABLE_PATTERN, (token, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) return token;
    const value = env[name];
    return value === undefined ? token : value;
  });
}

export function expandPath(raw: string, context: ExpansionContext): string {
  return expandVariables(expandHome(raw, context.homeDir), context.env);
}

/**
 * Check if a file path is within an allowed directory.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Display form of a file inside the working directory: `./name`.
 */
export function relativeDisplay(filePath: string, cwd: string): string {
  const relative = path.relative(cwd, filePath);
  if (relative === "" || relative.startsWith("..") || path.isAbsolute(relative)) {
    return filePath;
  }
  return `.${path.sep}${relative}`;
}
