/**
 * `dotwrap doctor` — show which dotwrap aliases the provider CLI currently has.
 */

import type { Command } from "commander";
import { ALIAS_PREFIX, DEFAULT_PROVIDER } from "../provider/registry";
import { ToolCommandError } from "../tool/runner";
import { ExitCode } from "../util/errors";
import { error as logError, out } from "../util/logger";
import { type CommandContext, requireExecutable, requireProvider } from "./common";

export const ALIAS_LIST_ARGS = ["alias", "list"] as const;

/** Lines of `alias list` output that belong to dotwrap, unmodified. */
export function filterManagedLines(output: string): string[] {
  return output
    .split(/\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/)
    .filter(line => line.trimStart().startsWith(ALIAS_PREFIX));
}

export async function runDoctor(
  context: CommandContext,
  providerArg: string,
): Promise<ExitCode> {
  const provider = requireProvider(providerArg);
  const runner = await requireExecutable(context, provider);

  let stdout: string;
  try {
    ({ stdout } = await runner.run(ALIAS_LIST_ARGS, { check: true }));
  } catch (err) {
    if (!(err instanceof ToolCommandError)) throw err;
    const prefix = `${runner.executable} alias list failed`;
    logError(err.details ? `${prefix}: ${err.details}` : prefix);
    return ExitCode.Environment;
  }

  for (const line of filterManagedLines(stdout)) {
    out(line);
  }
  return ExitCode.Ok;
}

export function registerDoctorCommand(
  program: Command,
  getContext: () => CommandContext,
  setExitCode: (code: ExitCode) => void,
): void {
  program
    .command("doctor")
    .description("List the dotwrap aliases the provider CLI knows about")
    .argument("[provider]", "Provider to inspect", DEFAULT_PROVIDER)
    .allowExcessArguments(false)
    .action(async (provider: string) => {
      setExitCode(await runDoctor(getContext(), provider));
    });
}
