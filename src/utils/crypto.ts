import { randomBytes } from "node:crypto";

const ID_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

/** Six lowercase alphanumerics, for temporary file names. */
export function generateShortId(): string {
  let result = "";
  for (const byte of randomBytes(6)) {
    result += ID_ALPHABET[byte % ID_ALPHABET.length];
  }
  return result;
}
