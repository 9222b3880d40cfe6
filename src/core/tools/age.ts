/**
 * age encryption collaborator
 *
 * With age-plugin-batchpass installed, the passphrase reaches age through the
 * child's AGE_PASSPHRASE variable. Without it, age -p asks on the terminal.
 */

import type { Environment } from "../../types";
import { DecryptionError, type DecryptionFailure, type ExternalToolError } from "../../utils/errors";
import { logger } from "../../utils/logger";
import { processTransform, spooledProcessTransform, type TransformStage } from "../pipeline";
import type { Encryptor } from "./types";
import { findExecutable } from "./which";

export type AgeMode = "batchpass" | "terminal";

export const PASSPHRASE_ENV_VAR = "AGE_PASSPHRASE";
export const BATCHPASS_PLUGIN = "age-plugin-batchpass";

export interface AgeOptions {
  command?: string;
  env?: Environment;
}

const WRONG_PASSPHRASE_PATTERN = /incorrect passphrase|no identity matched/i;

export function classifyDecryptFailure(stderr: string): DecryptionFailure {
  return WRONG_PASSPHRASE_PATTERN.test(stderr) ? "wrong_passphrase" : "corrupt";
}

export function toDecryptionError(failure: ExternalToolError): DecryptionError {
  const detail = failure.stderr.trim().split("\n")[0];
  return new DecryptionError(classifyDecryptFailure(failure.stderr), detail || undefined);
}

export function buildEncryptArgs(mode: AgeMode, inputFile?: string): string[] {
  const args = mode === "batchpass" ? ["-e", "-j", "batchpass"] : ["-e", "-p"];
  return inputFile ? [...args, inputFile] : args;
}

export function buildDecryptArgs(mode: AgeMode, inputFile?: string): string[] {
  const args = mode === "batchpass" ? ["-d", "-j", "batchpass"] : ["-d"];
  return inputFile ? [...args, inputFile] : args;
}

export class AgeEncryptor implements Encryptor {
  private readonly command: string;
  private readonly env: Environment;

  constructor(
    readonly mode: AgeMode,
    options: AgeOptions = {},
  ) {
    this.command = options.command ?? "age";
    this.env = options.env ?? {};
  }

  /**
   * Pick batchpass mode when the plugin is on PATH, terminal mode otherwise.
   */
  static async detect(env: Environment, command: string = "age"): Promise<AgeEncryptor> {
    const plugin = await findExecutable(BATCHPASS_PLUGIN, env);
    logger.debug(plugin ? `Using ${plugin}` : `${BATCHPASS_PLUGIN} not found, age will prompt`);
    return new AgeEncryptor(plugin ? "batchpass" : "terminal", { command, env });
  }

  get promptsForPassphrase(): boolean {
    return this.mode === "terminal";
  }

  private childEnv(passphrase: string): Environment {
    if (this.mode === "terminal") return this.env;
    return { ...this.env, [PASSPHRASE_ENV_VAR]: passphrase };
  }

  encrypt(passphrase: string): TransformStage {
    if (this.mode === "terminal") {
      return spooledProcessTransform(this.command, (file) => buildEncryptArgs("terminal", file), {
        env: this.childEnv(passphrase),
      });
    }
    return processTransform(this.command, buildEncryptArgs("batchpass"), {
      env: this.childEnv(passphrase),
    });
  }

  decrypt(passphrase: string): TransformStage {
    const options = { env: this.childEnv(passphrase), mapFailure: toDecryptionError };
    if (this.mode === "terminal") {
      return spooledProcessTransform(
        this.command,
        (file) => buildDecryptArgs("terminal", file),
        options,
      );
    }
    return processTransform(this.command, buildDecryptArgs("batchpass"), options);
  }
}
