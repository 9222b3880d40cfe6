/**
 * Styled output helpers
 */

import color from "picocolors";
import pkg from "../../../package.json";
import type { Output } from "../../types";

export { color };

export const VERSION = pkg.version;

/**
 * Progress and summaries on stdout, warnings and errors on stderr.
 */
export function createConsoleOutput(): Output {
  return {
    line: (message) => console.log(message),
    warn: (message) => console.error(`${color.yellow("Warning:")} ${message}`),
    error: (message) => console.error(`${color.red("Error:")} ${message}`),
  };
}
