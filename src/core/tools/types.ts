/**
 * External collaborator contracts
 */

import type { SinkStage, SourceStage, TransformStage } from "../pipeline";

/**
 * Compression collaborator. `pack` archives `name` relative to `parentDir`, so
 * the archive's root is the directory's base name.
 */
export interface Compressor {
  pack(parentDir: string, name: string): SourceStage;
  unpack(destinationDir: string): SinkStage;
}

/**
 * Encryption collaborator. The passphrase never appears in a command line.
 */
export interface Encryptor {
  /** True when the tool collects the passphrase on the terminal itself */
  readonly promptsForPassphrase: boolean;
  encrypt(passphrase: string): TransformStage;
  decrypt(passphrase: string): TransformStage;
}

export interface ArchiveTools {
  compressor: Compressor;
  encryptor: Encryptor;
}
