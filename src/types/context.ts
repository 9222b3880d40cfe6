/**
 * Explicit run context passed into every core operation in place of
 * process-wide state (cwd, env, clock, stdout/stderr).
 */

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Sink for user-facing output. `line` is progress and summaries (stdout in the CLI),
 * `warn` is a non-fatal warning and `error` the one-line report of a fatal one (stderr).
 */
export interface Output {
  line(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface RunContext {
  cwd: string;
  env: Environment;
  homeDir: string;
  now: () => Date;
  output: Output;
}
