/**
 * Directive file loading
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import type { BackupTarget, Environment } from "../types";
import { ConfigError, errnoCode, errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { parseDirectives } from "./parser";
import { type ResolveContext, resolveTargets } from "./resolver";

export const CONFIG_FILE_NAME = ".cachetterc";
export const CONFIG_ENV_VAR = "CACHETTE_CONFIG";

export interface LoadedTargets {
  configPath: string;
  targets: BackupTarget[];
  warnings: string[];
}

/**
 * Config file location: explicit flag, then $CACHETTE_CONFIG, then ~/.cachetterc.
 */
export function findConfigFile(
  context: { env: Environment; homeDir: string; cwd: string },
  explicitPath?: string,
): string {
  const chosen = explicitPath ?? context.env[CONFIG_ENV_VAR];
  if (chosen) {
    return path.resolve(context.cwd, chosen);
  }
  return path.join(context.homeDir, CONFIG_FILE_NAME);
}

export async function readConfigFile(configPath: string): Promise<string> {
  try {
    const stat = await fs.stat(configPath);
    if (!stat.isFile()) {
      throw new ConfigError(`${configPath} is not a file.`);
    }
    return await fs.readFile(configPath, "utf8");
  } catch (error) {
    if (error instanceof ConfigError) throw error;
    if (errnoCode(error) === "ENOENT") {
      throw new ConfigError(`${configPath} not found.`);
    }
    throw new ConfigError(`cannot read ${configPath}: ${errorMessage(error)}`);
  }
}

/**
 * Parse directive text into targets. Zero targets is a ConfigError.
 */
export async function parseConfig(
  content: string,
  context: ResolveContext,
  source: string = "config",
): Promise<LoadedTargets> {
  const directives = parseDirectives(content);
  logger.debug(`Parsed ${directives.length} directive(s) from ${source}`);

  const { targets, warnings } = await resolveTargets(directives, context);

  if (targets.length === 0) {
    throw new ConfigError(`no paths configured in ${source}.`);
  }

  return { configPath: source, targets, warnings };
}

export async function loadTargets(
  configPath: string,
  context: ResolveContext,
): Promise<LoadedTargets> {
  const content = await readConfigFile(configPath);
  return parseConfig(content, context, configPath);
}
