import { findConfigFile, loadTargets } from "../../config";
import { runBackup } from "../../core/backup";
import { resolvePassphrase } from "../../core/passphrase";
import { PASSPHRASE_ENV_VAR } from "../../core/tools";
import type { CommandContext } from "../context";

export interface BackupCommandOptions {
  configPath?: string;
}

export async function backupCommand(
  options: BackupCommandOptions,
  context: CommandContext,
): Promise<number> {
  const configPath = findConfigFile(context, options.configPath);
  const { targets, warnings } = await loadTargets(configPath, context);
  for (const warning of warnings) {
    context.output.warn(warning);
  }

  const tools = await context.createTools(context.env);

  let passphrase = "";
  if (tools.encryptor.promptsForPassphrase) {
    context.output.warn(
      `age-plugin-batchpass not found; age will ask for the passphrase for each archive` +
        (context.env[PASSPHRASE_ENV_VAR] ? ` and ignore ${PASSPHRASE_ENV_VAR}.` : "."),
    );
  } else {
    passphrase = await resolvePassphrase({
      env: context.env,
      prompt: context.prompt,
      confirm: true,
    });
  }

  await runBackup(targets, passphrase, { context, tools });
  return 0;
}
