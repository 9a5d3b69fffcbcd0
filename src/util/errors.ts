/**
 * Error taxonomy. Each error carries the process exit status it maps to.
 */

export const ExitCode = {
  Ok: 0,
  Environment: 1,
  InvalidUsage: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class DotwrapError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode) {
    super(message);
    this.name = "DotwrapError";
    this.exitCode = exitCode;
  }
}

/** Missing runtime, tool or config, or a malformed alias table. */
export class EnvironmentError extends DotwrapError {
  constructor(message: string) {
    super(message, ExitCode.Environment);
    this.name = "EnvironmentError";
  }
}

/** Unparsable invocation or unsupported provider. */
export class UsageError extends DotwrapError {
  constructor(message: string) {
    super(message, ExitCode.InvalidUsage);
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isBrokenPipe(err: unknown): boolean {
  return (
    typeof err === "object"
    && err !== null
    && "code" in err
    && err.code === "EPIPE"
  );
}
