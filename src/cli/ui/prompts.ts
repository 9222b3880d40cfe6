/**
 * Interactive prompts wrapper
 */

import * as p from "@clack/prompts";
import * as readline from "node:readline";
import type { Readable } from "node:stream";
import type { Prompter } from "../../core/passphrase";
import { UsageError } from "../../utils/errors";

export const isCancel = p.isCancel;

/** Masked terminal prompt. */
export async function promptPassword(message: string): Promise<string> {
  const value = await p.password({ message });
  if (isCancel(value)) {
    p.cancel("Cancelled");
    throw new UsageError("passphrase entry cancelled.");
  }
  return value;
}

/**
 * Prompter for piped input: each call consumes one line.
 */
export function createLinePrompter(input: Readable, echo: (text: string) => void): Prompter {
  const lines = readline.createInterface({ input, terminal: false })[Symbol.asyncIterator]();

  return async (message) => {
    echo(`${message} `);
    const next = await lines.next();
    if (next.done) {
      throw new UsageError("no passphrase on standard input.");
    }
    return next.value;
  };
}

export function createStdinPrompter(): Prompter {
  if (process.stdin.isTTY) return promptPassword;
  return createLinePrompter(process.stdin, (text) => process.stderr.write(text));
}
