/**
 * Pipeline module exports
 */

export { runPipeline, selectFailure } from "./run";
export {
  fileSink,
  fileSource,
  type ProcessOptions,
  processSink,
  processSource,
  processTransform,
  type SinkStage,
  type SourceStage,
  type Stage,
  spooledProcessTransform,
  type TransformStage,
  transformStage,
} from "./stages";
