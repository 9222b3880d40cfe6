/**
 * Error taxonomy
 *
 * Every fatal condition is a CachetteError subclass; the CLI prints its message
 * on one line and exits non-zero. Warnings are not errors, see types/context.ts.
 */

export class CachetteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CachetteError";
  }
}

/** Directive file missing, unreadable, or resolving to zero targets. */
export class ConfigError extends CachetteError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class UsageError extends CachetteError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export class PassphraseMismatchError extends CachetteError {
  constructor(message: string = "passphrases do not match.") {
    super(message);
    this.name = "PassphraseMismatchError";
  }
}

export class NotFoundError extends CachetteError {
  constructor(readonly filePath: string) {
    super(`${filePath} not found.`);
    this.name = "NotFoundError";
  }
}

export interface ToolFailureDetails {
  exitCode?: number | null;
  signal?: string | null;
  stderr?: string;
}

/**
 * A compression or encryption subprocess could not be started or did not exit cleanly.
 */
export class ExternalToolError extends CachetteError {
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stderr: string;

  constructor(
    readonly tool: string,
    message: string,
    details: ToolFailureDetails = {},
  ) {
    super(message);
    this.name = "ExternalToolError";
    this.exitCode = details.exitCode ?? null;
    this.signal = details.signal ?? null;
    this.stderr = details.stderr ?? "";
  }

  /** Killed by a signal, typically SIGPIPE after a later stage gave up */
  get wasKilled(): boolean {
    return this.signal !== null;
  }
}

export type DecryptionFailure = "wrong_passphrase" | "corrupt";

export class DecryptionError extends CachetteError {
  constructor(
    readonly reason: DecryptionFailure,
    detail?: string,
  ) {
    const summary =
      reason === "wrong_passphrase"
        ? "decryption failed: incorrect passphrase"
        : "decryption failed: archive is corrupt or not an age file";
    super(detail ? `${summary} (${detail})` : summary);
    this.name = "DecryptionError";
  }
}

export function isCachetteError(error: unknown): error is CachetteError {
  return error instanceof CachetteError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error code (`ENOENT`, `EACCES`...), if any */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}
