/**
 * Passphrase acquisition
 */

import type { Environment } from "../types";
import { PassphraseMismatchError, UsageError } from "../utils/errors";
import { PASSPHRASE_ENV_VAR } from "./tools/age";

/** Asks the user for a secret; resolves with what was typed. */
export type Prompter = (message: string) => Promise<string>;

export interface PassphraseRequest {
  env: Environment;
  prompt: Prompter;
  /** Ask twice and require both entries to match (backup) */
  confirm: boolean;
}

/**
 * AGE_PASSPHRASE from the environment wins; otherwise prompt.
 */
export async function resolvePassphrase(request: PassphraseRequest): Promise<string> {
  const fromEnv = request.env[PASSPHRASE_ENV_VAR];
  if (fromEnv) return fromEnv;

  const passphrase = await request.prompt("Passphrase:");
  if (passphrase === "") {
    throw new UsageError("passphrase must not be empty.");
  }

  if (request.confirm) {
    const confirmation = await request.prompt("Confirm:");
    if (confirmation !== passphrase) {
      throw new PassphraseMismatchError();
    }
  }

  return passphrase;
}
