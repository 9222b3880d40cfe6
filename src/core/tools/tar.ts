/**
 * tar + gzip compression collaborator
 */

import type { Environment } from "../../types";
import { processSink, processSource, type SinkStage, type SourceStage } from "../pipeline";
import type { Compressor } from "./types";

export interface TarOptions {
  command?: string;
  env?: Environment;
}

export function buildPackArgs(parentDir: string, name: string): string[] {
  return ["-czf", "-", "-C", parentDir, name];
}

export function buildUnpackArgs(destinationDir: string): string[] {
  return ["-xzf", "-", "-C", destinationDir];
}

export class TarCompressor implements Compressor {
  private readonly command: string;

  constructor(private readonly options: TarOptions = {}) {
    this.command = options.command ?? "tar";
  }

  pack(parentDir: string, name: string): SourceStage {
    return processSource(this.command, buildPackArgs(parentDir, name), { env: this.options.env });
  }

  unpack(destinationDir: string): SinkStage {
    return processSink(this.command, buildUnpackArgs(destinationDir), { env: this.options.env });
  }
}
