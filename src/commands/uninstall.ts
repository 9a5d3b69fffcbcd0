/**
 * `dotwrap uninstall` — delete every configured alias, ignoring failures.
 */

import type { Command } from "commander";
import { sortedAliasNames } from "../config/schema";
import { DEFAULT_PROVIDER } from "../provider/registry";
import { ExitCode } from "../util/errors";
import { log, out } from "../util/logger";
import {
  type ApplyOptions,
  type CommandContext,
  formatCommandLine,
  loadAliasTable,
  requireExecutable,
  requireProvider,
} from "./common";

export function aliasDeleteArgs(name: string): string[] {
  return ["alias", "delete", name];
}

export async function runUninstall(
  context: CommandContext,
  providerArg: string,
  options: ApplyOptions = {},
): Promise<ExitCode> {
  const provider = requireProvider(providerArg);
  const runner = await requireExecutable(context, provider);
  const names = sortedAliasNames(await loadAliasTable(context, provider));

  for (const name of names) {
    const args = aliasDeleteArgs(name);
    if (options.dryRun) {
      out(`would run: ${formatCommandLine(runner.executable, args)}`);
      continue;
    }
    // A missing alias is not an error; neither is anything else gh reports here.
    const result = await runner.run(args, { check: false });
    log(`delete ${name} exited with ${result.exitCode}`);
  }

  if (!options.dryRun) {
    out(`removed ${names.length} aliases`);
  }
  return ExitCode.Ok;
}

export function registerUninstallCommand(
  program: Command,
  getContext: () => CommandContext,
  setExitCode: (code: ExitCode) => void,
): void {
  program
    .command("uninstall")
    .description("Delete every configured alias from the provider CLI")
    .argument("[provider]", "Provider to remove aliases from", DEFAULT_PROVIDER)
    .allowExcessArguments(false)
    .option("--dry-run", "Print the commands instead of running them")
    .action(async (provider: string, options: ApplyOptions) => {
      setExitCode(await runUninstall(getContext(), provider, options));
    });
}
