/**
 * CLI dispatch and error reporting
 */

import { errorMessage, isCachetteError, UsageError } from "../utils/errors";
import { logger, setLogLevel } from "../utils/logger";
import { type CliInvocation, parseCliArgs } from "./args";
import { backupCommand, checkCommand, pruneCommand, restoreCommand } from "./commands";
import type { CommandContext } from "./context";
import { printHelp, printVersion } from "./help";

function dispatch(invocation: CliInvocation, context: CommandContext): Promise<number> {
  switch (invocation.mode) {
    case "help":
      printHelp(context.output);
      return Promise.resolve(0);

    case "version":
      printVersion(context.output);
      return Promise.resolve(0);

    case "backup":
      return backupCommand(invocation, context);

    case "check":
      return checkCommand(invocation, context);

    case "restore":
      return restoreCommand(invocation, context);

    case "prune":
      return pruneCommand(invocation, context);
  }
}

/**
 * Run one invocation and map the outcome to an exit code. Known failures print
 * a single line; anything else is reported as a fatal error.
 */
export async function runCli(args: string[], context: CommandContext): Promise<number> {
  let verbose = false;

  try {
    const invocation = parseCliArgs(args);
    if ("verbose" in invocation && invocation.verbose) {
      verbose = true;
      setLogLevel("debug");
    }
    return await dispatch(invocation, context);
  } catch (error) {
    if (isCachetteError(error)) {
      context.output.error(
        error instanceof UsageError ? `${error.message} (see cachette --help)` : error.message,
      );
    } else {
      context.output.error(`Fatal error: ${errorMessage(error)}`);
    }
    if (verbose && error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
}
