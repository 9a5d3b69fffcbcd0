/**
 * Commander program and exit-code mapping. Kept separate from cli.ts so the
 * whole front end can be driven from tests without touching process state.
 */

import { fileURLToPath } from "node:url";
import { Command, CommanderError } from "commander";
import { registerDoctorCommand } from "./commands/doctor";
import { registerInstallCommand } from "./commands/install";
import { registerUninstallCommand } from "./commands/uninstall";
import type { CommandContext } from "./commands/common";
import { CONFIG_FILE_NAME, resolveConfigPath } from "./config/discovery";
import { createToolRunner, type ExecFn } from "./tool/runner";
import {
  DotwrapError,
  errorMessage,
  ExitCode,
  isBrokenPipe,
} from "./util/errors";
import { error as logError, log, setVerbose, TOOL_TAG } from "./util/logger";
import { findExecutable } from "./util/path";
import { requireNodeVersion } from "./util/runtime";

export const VERSION = "0.1.0";

export interface CliDeps {
  /** Where aliases.toml lives when neither --config nor $DOTWRAP_CONFIG is set. */
  defaultConfigPath?: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
  nodeVersion?: string;
  exec?: ExecFn;
  findExecutable?: (command: string) => Promise<string | undefined>;
}

type GlobalOptions = {
  verbose?: boolean;
  config?: string;
};

/** This module sits one level below the package root in both src/ and dist/. */
export function defaultConfigPath(): string {
  return fileURLToPath(new URL(`../${CONFIG_FILE_NAME}`, import.meta.url));
}

export function buildProgram(
  deps: CliDeps,
  setExitCode: (code: ExitCode) => void,
): Command {
  const env = deps.env ?? process.env;
  const program = new Command();

  program
    .name(TOOL_TAG)
    .description("Install, remove and inspect dotwrap aliases in the GitHub CLI")
    .version(VERSION)
    .option("--verbose", "Verbose logging to stderr")
    .option("--config <path>", `Path to ${CONFIG_FILE_NAME}`)
    .exitOverride()
    .configureOutput({
      outputError: (str, write) =>
        write(`${TOOL_TAG}: invalid usage: ${str.replace(/^error: /, "")}`),
    })
    .hook("preAction", thisCommand => {
      const opts = thisCommand.opts<GlobalOptions>();
      if (opts.verbose) {
        setVerbose(true);
      }
    });

  const getContext = (): CommandContext => {
    const opts = program.opts<GlobalOptions>();
    const source = resolveConfigPath({
      configPath: opts.config,
      defaultPath: deps.defaultConfigPath ?? defaultConfigPath(),
      env,
      cwd: deps.cwd,
    });
    log(`Using config ${source.path} (${source.origin})`);
    return {
      configPath: source.path,
      createRunner: executable => createToolRunner(executable, deps.exec),
      findExecutable: deps.findExecutable ?? (command => findExecutable(command, env)),
    };
  };

  registerInstallCommand(program, getContext, setExitCode);
  registerUninstallCommand(program, getContext, setExitCode);
  registerDoctorCommand(program, getContext, setExitCode);

  return program;
}

function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof CommanderError) {
    if (err.exitCode === 0) return ExitCode.Ok;
    if (err.code === "commander.help") {
      logError("invalid usage: a command is required");
    }
    return ExitCode.InvalidUsage;
  }
  if (isBrokenPipe(err)) return ExitCode.Ok;
  if (err instanceof DotwrapError) {
    logError(err.message);
    return err.exitCode;
  }
  logError(errorMessage(err));
  return ExitCode.Environment;
}

export async function runCli(
  argv: readonly string[],
  deps: CliDeps = {},
): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCode.Ok;
  try {
    requireNodeVersion(deps.nodeVersion);
    const program = buildProgram(deps, code => {
      exitCode = code;
    });
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (err) {
    return exitCodeFor(err);
  }
}
