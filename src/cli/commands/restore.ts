import { resolvePassphrase } from "../../core/passphrase";
import { assertArchiveFile, runRestore } from "../../core/restore";
import type { CommandContext } from "../context";

export interface RestoreCommandOptions {
  archivePath: string;
}

export async function restoreCommand(
  options: RestoreCommandOptions,
  context: CommandContext,
): Promise<number> {
  // Fail on a wrong path before asking for anything
  await assertArchiveFile(options.archivePath, context.cwd);

  const tools = await context.createTools(context.env);
  const passphrase = tools.encryptor.promptsForPassphrase
    ? ""
    : await resolvePassphrase({ env: context.env, prompt: context.prompt, confirm: false });

  await runRestore(options.archivePath, passphrase, { context, tools });
  return 0;
}
