/**
 * Command context: the run context plus the interactive and tool seams
 */

import * as os from "node:os";
import type { Prompter } from "../core/passphrase";
import { type ArchiveTools, createDefaultTools } from "../core/tools";
import type { Environment, RunContext } from "../types";
import { createConsoleOutput, createStdinPrompter } from "./ui";

export interface CommandContext extends RunContext {
  prompt: Prompter;
  createTools: (env: Environment) => Promise<ArchiveTools>;
}

export function createProcessContext(): CommandContext {
  let prompter: Prompter | undefined;

  return {
    cwd: process.cwd(),
    env: process.env,
    homeDir: process.env.HOME || os.homedir(),
    now: () => new Date(),
    output: createConsoleOutput(),
    prompt: (message) => {
      prompter ??= createStdinPrompter();
      return prompter(message);
    },
    createTools: createDefaultTools,
  };
}
