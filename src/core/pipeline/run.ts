/**
 * Pipeline execution
 */

import { pipeline } from "node:stream/promises";
import { ExternalToolError, isCachetteError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import type { SinkStage, SourceStage, TransformStage } from "./stages";

function failureRank(failure: unknown): number {
  if (!isCachetteError(failure)) return 2;
  return failure instanceof ExternalToolError && failure.wasKilled ? 1 : 0;
}

/**
 * Pick the error to report when several parts of a pipeline fail together.
 * One failing stage breaks the pipes around it: upstream tools die of SIGPIPE,
 * downstream ones see a truncated stream. Domain errors rank before tools
 * killed by a signal, both before plain stream errors; ties go to the earlier stage.
 */
export function selectFailure(outcomes: PromiseSettledResult<void>[]): unknown {
  const failures = outcomes.flatMap((outcome): unknown[] =>
    outcome.status === "rejected" ? [outcome.reason] : [],
  );

  let selected: unknown = failures[0];
  for (const failure of failures) {
    if (failureRank(failure) < failureRank(selected)) selected = failure;
  }
  return selected;
}

/**
 * Stream `source` through `transforms` into `sink` and wait for every stage to
 * finish. Rejects if any stage or the stream plumbing fails.
 */
export async function runPipeline(
  source: SourceStage,
  transforms: TransformStage[],
  sink: SinkStage,
): Promise<void> {
  const stages = [source, ...transforms, sink];
  logger.debug(`pipeline: ${stages.map((s) => s.label).join(" | ")}`);

  const flow = pipeline([source.stream, ...transforms.map((t) => t.stream), sink.stream]);
  const outcomes = await Promise.allSettled([...stages.map((s) => s.completion), flow]);

  if (outcomes.some((outcome) => outcome.status === "rejected")) {
    throw selectFailure(outcomes);
  }
}
