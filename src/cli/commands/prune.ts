import { runPrune } from "../../core/prune";
import type { CommandContext } from "../context";

export interface PruneCommandOptions {
  maxAgeDays: number;
  dryRun: boolean;
}

export async function pruneCommand(
  options: PruneCommandOptions,
  context: CommandContext,
): Promise<number> {
  await runPrune(options.maxAgeDays, { context, dryRun: options.dryRun });
  return 0;
}
