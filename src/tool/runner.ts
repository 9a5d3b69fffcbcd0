/**
 * External tool invoker. One child process per call, awaited to completion.
 */

import { execa } from "execa";
import { DotwrapError, EnvironmentError, ExitCode } from "../util/errors";
import { log } from "../util/logger";

export interface ToolResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Throw a ToolCommandError on a non-zero exit status. */
  check: boolean;
}

export interface ToolRunner {
  readonly executable: string;
  run(args: readonly string[], options: RunOptions): Promise<ToolResult>;
}

/** Status reported for a child that was killed by a signal. */
export const SIGNAL_EXIT_CODE = 128;

/** Process boundary; swapped out in tests. */
export type ExecFn = (file: string, args: readonly string[]) => Promise<ToolResult>;

export class ToolCommandError extends DotwrapError {
  readonly args: readonly string[];
  readonly result: ToolResult;

  constructor(executable: string, args: readonly string[], result: ToolResult) {
    super(
      `${executable} ${args.join(" ")} exited with ${result.exitCode}`,
      ExitCode.Environment,
    );
    this.name = "ToolCommandError";
    this.args = args;
    this.result = result;
  }

  /** Captured stderr, trimmed. Empty when the tool printed nothing. */
  get details(): string {
    return this.result.stderr.trim();
  }
}

export const execaExec: ExecFn = async (file, args) => {
  const result = await execa(file, [...args], { reject: false });
  if (result.exitCode === undefined && !result.isTerminated) {
    throw new EnvironmentError(`failed to run ${file}: ${result.shortMessage}`);
  }
  return {
    // Killed by a signal: no exit status, report it as a failure.
    exitCode: result.exitCode ?? SIGNAL_EXIT_CODE,
    stdout: result.stdout,
    stderr: result.stderr,
  };
};

export function createToolRunner(
  executable: string,
  exec: ExecFn = execaExec,
): ToolRunner {
  return {
    executable,
    async run(args, options) {
      log(`Running ${executable} ${args.join(" ")}`);
      const result = await exec(executable, args);
      if (options.check && result.exitCode !== 0) {
        throw new ToolCommandError(executable, args, result);
      }
      return result;
    },
  };
}
