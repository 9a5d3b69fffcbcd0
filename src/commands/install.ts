/**
 * `dotwrap install` — set every configured alias with `gh alias set --clobber`.
 */

import type { Command } from "commander";
import { sortedAliasNames } from "../config/schema";
import { DEFAULT_PROVIDER } from "../provider/registry";
import { ToolCommandError } from "../tool/runner";
import { ExitCode } from "../util/errors";
import { error as logError, log, out } from "../util/logger";
import {
  type ApplyOptions,
  type CommandContext,
  formatCommandLine,
  loadAliasTable,
  requireExecutable,
  requireProvider,
} from "./common";

export function aliasSetArgs(name: string, command: string): string[] {
  return ["alias", "set", "--clobber", name, command];
}

export async function runInstall(
  context: CommandContext,
  providerArg: string,
  options: ApplyOptions = {},
): Promise<ExitCode> {
  const provider = requireProvider(providerArg);
  const runner = await requireExecutable(context, provider);
  const aliases = await loadAliasTable(context, provider);
  const names = sortedAliasNames(aliases);

  for (const name of names) {
    const args = aliasSetArgs(name, aliases[name] ?? "");
    if (options.dryRun) {
      out(`would run: ${formatCommandLine(runner.executable, args)}`);
      continue;
    }
    try {
      await runner.run(args, { check: true });
    } catch (err) {
      if (!(err instanceof ToolCommandError)) throw err;
      const prefix = `${runner.executable} alias set failed for ${name}`;
      logError(err.details ? `${prefix}: ${err.details}` : prefix);
      return ExitCode.Environment;
    }
    log(`installed ${name}`);
  }

  if (!options.dryRun) {
    out(`installed ${names.length} aliases`);
  }
  return ExitCode.Ok;
}

export function registerInstallCommand(
  program: Command,
  getContext: () => CommandContext,
  setExitCode: (code: ExitCode) => void,
): void {
  program
    .command("install")
    .description("Set every configured alias in the provider CLI")
    .argument("[provider]", "Provider to install aliases into", DEFAULT_PROVIDER)
    .allowExcessArguments(false)
    .option("--dry-run", "Print the commands instead of running them")
    .action(async (provider: string, options: ApplyOptions) => {
      setExitCode(await runInstall(getContext(), provider, options));
    });
}
