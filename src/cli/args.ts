/**
 * Command-line parsing
 */

import { parseArgs } from "node:util";
import { parseMaxAgeDays } from "../core/prune";
import { errorMessage, UsageError } from "../utils/errors";

interface CommonOptions {
  configPath?: string;
  verbose: boolean;
}

export type CliInvocation =
  | { mode: "help" }
  | { mode: "version" }
  | ({ mode: "backup" } & CommonOptions)
  | ({ mode: "check" } & CommonOptions)
  | ({ mode: "restore"; archivePath: string } & CommonOptions)
  | ({ mode: "prune"; maxAgeDays: number; dryRun: boolean } & CommonOptions);

export type CliMode = CliInvocation["mode"];

const OPTIONS = {
  restore: { type: "string" },
  prune: { type: "string" },
  check: { type: "boolean", default: false },
  config: { type: "string", short: "c" },
  "dry-run": { type: "boolean", default: false },
  verbose: { type: "boolean", default: false },
  help: { type: "boolean", short: "h", default: false },
  version: { type: "boolean", short: "V", default: false },
} as const;

function parseValues(args: string[]) {
  try {
    return parseArgs({ args, options: OPTIONS, allowPositionals: false, strict: true }).values;
  } catch (error) {
    throw new UsageError(errorMessage(error));
  }
}

/**
 * No mode flag means backup. `--dry-run` without a mode is the same as `--check`.
 */
export function parseCliArgs(args: string[]): CliInvocation {
  const values = parseValues(args);

  if (values.help) return { mode: "help" };
  if (values.version) return { mode: "version" };

  const modes = [
    values.restore !== undefined ? "--restore" : null,
    values.prune !== undefined ? "--prune" : null,
    values.check ? "--check" : null,
  ].filter((flag): flag is string => flag !== null);

  if (modes.length > 1) {
    throw new UsageError(`${modes.join(" and ")} cannot be combined`);
  }

  const common: CommonOptions = { configPath: values.config, verbose: values.verbose === true };
  const dryRun = values["dry-run"] === true;

  if (values.restore !== undefined) {
    if (values.restore === "") {
      throw new UsageError("--restore expects an archive file");
    }
    if (dryRun) {
      throw new UsageError("--dry-run cannot be used with --restore");
    }
    return { mode: "restore", archivePath: values.restore, ...common };
  }

  if (values.prune !== undefined) {
    return { mode: "prune", maxAgeDays: parseMaxAgeDays(values.prune), dryRun, ...common };
  }

  if (values.check || dryRun) {
    return { mode: "check", ...common };
  }

  return { mode: "backup", ...common };
}
