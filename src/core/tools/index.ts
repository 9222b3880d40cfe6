/**
 * External tool exports
 */

import type { Environment } from "../../types";
import { AgeEncryptor } from "./age";
import { TarCompressor } from "./tar";
import type { ArchiveTools } from "./types";

export {
  type AgeMode,
  type AgeOptions,
  AgeEncryptor,
  BATCHPASS_PLUGIN,
  buildDecryptArgs,
  buildEncryptArgs,
  classifyDecryptFailure,
  PASSPHRASE_ENV_VAR,
  toDecryptionError,
} from "./age";
export { buildPackArgs, buildUnpackArgs, TarCompressor, type TarOptions } from "./tar";
export type { ArchiveTools, Compressor, Encryptor } from "./types";
export { findExecutable } from "./which";

/**
 * tar for compression, age for encryption, both resolved from `env`.
 */
export async function createDefaultTools(env: Environment): Promise<ArchiveTools> {
  return {
    compressor: new TarCompressor({ env }),
    encryptor: await AgeEncryptor.detect(env),
  };
}
