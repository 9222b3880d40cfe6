/**
 * Byte-stream pipeline stages
 *
 * A stage is a stream plus a completion promise. For subprocess stages the
 * promise settles on exit and rejects when the tool fails; for in-process
 * stages it follows the stream itself.
 */

import { type ChildProcess, spawn } from "node:child_process";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Duplex, PassThrough, type Readable, type Transform, type Writable } from "node:stream";
import { finished, pipeline } from "node:stream/promises";
import type { Environment } from "../../types";
import { generateShortId } from "../../utils/crypto";
import { type CachetteError, ExternalToolError, errnoCode, errorMessage } from "../../utils/errors";
import { logger } from "../../utils/logger";

export interface Stage<S extends Readable | Writable> {
  readonly label: string;
  readonly stream: S;
  readonly completion: Promise<void>;
}

export type SourceStage = Stage<Readable>;
export type TransformStage = Stage<Duplex>;
export type SinkStage = Stage<Writable>;

export interface ProcessOptions {
  cwd?: string;
  env?: Environment;
  /** Convert a failed run into a domain error, e.g. a DecryptionError */
  mapFailure?: (failure: ExternalToolError) => CachetteError;
}

const STDERR_LIMIT = 16 * 1024;

/**
 * Settles when the child exits. Rejects with ExternalToolError when the
 * command cannot be started or exits non-zero.
 */
function watchProcess(
  child: ChildProcess,
  command: string,
  options: ProcessOptions,
): Promise<void> {
  let stderr = "";
  child.stderr?.setEncoding("utf8");
  child.stderr?.on("data", (chunk: string) => {
    if (stderr.length < STDERR_LIMIT) stderr += chunk;
  });

  const exited = new Promise<void>((resolve, reject) => {
    let settled = false;

    child.once("error", (err) => {
      if (settled) return;
      settled = true;
      const message =
        errnoCode(err) === "ENOENT"
          ? `${command} is not installed or not on PATH`
          : `${command} could not be started: ${errorMessage(err)}`;
      reject(new ExternalToolError(command, message));
    });

    child.once("close", (code, signal) => {
      if (settled) return;
      settled = true;
      if (code === 0) {
        resolve();
        return;
      }
      const detail = stderr.trim().split("\n")[0] ?? "";
      const status = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      reject(
        new ExternalToolError(
          command,
          detail ? `${command} ${status}: ${detail}` : `${command} ${status}`,
          { exitCode: code, signal, stderr },
        ),
      );
    });
  });

  const { mapFailure } = options;
  if (!mapFailure) return exited;

  return exited.catch((failure: unknown) => {
    throw failure instanceof ExternalToolError && failure.exitCode !== null
      ? mapFailure(failure)
      : failure;
  });
}

function spawnOptions(options: ProcessOptions) {
  return { cwd: options.cwd, env: options.env ? { ...options.env } : undefined };
}

/** A subprocess whose stdout starts the pipeline. */
export function processSource(
  command: string,
  args: string[],
  options: ProcessOptions = {},
): SourceStage {
  logger.debug(`spawn: ${command} ${args.join(" ")}`);
  const child = spawn(command, args, {
    ...spawnOptions(options),
    stdio: ["ignore", "pipe", "pipe"],
  });
  return { label: command, stream: child.stdout, completion: watchProcess(child, command, options) };
}

/** A subprocess filtering stdin to stdout. */
export function processTransform(
  command: string,
  args: string[],
  options: ProcessOptions = {},
): TransformStage {
  logger.debug(`spawn: ${command} ${args.join(" ")}`);
  const child = spawn(command, args, { ...spawnOptions(options), stdio: "pipe" });
  return {
    label: command,
    stream: Duplex.from({ writable: child.stdin, readable: child.stdout }),
    completion: watchProcess(child, command, options),
  };
}

/** A subprocess consuming the end of the pipeline on stdin. */
export function processSink(
  command: string,
  args: string[],
  options: ProcessOptions = {},
): SinkStage {
  logger.debug(`spawn: ${command} ${args.join(" ")}`);
  const child = spawn(command, args, {
    ...spawnOptions(options),
    stdio: ["pipe", "ignore", "pipe"],
  });
  return { label: command, stream: child.stdin, completion: watchProcess(child, command, options) };
}

/**
 * A subprocess that needs its input as a file and the controlling terminal on
 * stdin (age asking for a passphrase). Input is spooled to a private temporary
 * file, the command runs on it, and its stdout continues the pipeline.
 */
export function spooledProcessTransform(
  command: string,
  argsForFile: (inputFile: string) => string[],
  options: ProcessOptions = {},
): TransformStage {
  const spoolPath = path.join(os.tmpdir(), `cachette-${process.pid}-${generateShortId()}.spool`);
  const spool = fs.createWriteStream(spoolPath, { flags: "wx", mode: 0o600 });
  const output = new PassThrough();

  const run = async (): Promise<void> => {
    await finished(spool);
    const args = argsForFile(spoolPath);
    logger.debug(`spawn: ${command} ${args.join(" ")}`);
    const child = spawn(command, args, {
      ...spawnOptions(options),
      stdio: ["inherit", "pipe", "pipe"],
    });
    const exited = watchProcess(child, command, options);
    const [exit, copy] = await Promise.allSettled([exited, pipeline(child.stdout, output)]);
    if (exit.status === "rejected") throw exit.reason;
    if (copy.status === "rejected") throw copy.reason;
  };

  const completion = run()
    .catch((err: unknown) => {
      output.destroy(err instanceof Error ? err : new Error(String(err)));
      throw err;
    })
    .finally(() => fs.promises.rm(spoolPath, { force: true }));

  return {
    label: command,
    stream: Duplex.from({ writable: spool, readable: output }),
    completion,
  };
}

/** Wrap an in-process Transform as a stage. */
export function transformStage(label: string, transform: Transform): TransformStage {
  return { label, stream: transform, completion: finished(transform) };
}

export function fileSource(filePath: string): SourceStage {
  const stream = fs.createReadStream(filePath);
  return { label: `read ${path.basename(filePath)}`, stream, completion: finished(stream) };
}

export function fileSink(filePath: string): SinkStage {
  const stream = fs.createWriteStream(filePath, { mode: 0o600 });
  return { label: `write ${path.basename(filePath)}`, stream, completion: finished(stream) };
}
