/**
 * Prefixed console output with verbosity control.
 * Informational lines go to stdout; errors and debug lines to stderr.
 */

export const TOOL_TAG = "dotwrap";

let verbose = false;

export function setVerbose(v: boolean): void {
  verbose = v;
}

export function isVerbose(): boolean {
  return verbose;
}

export function out(message: string): void {
  console.log(`${TOOL_TAG}: ${message}`);
}

export function log(message: string, ...args: unknown[]): void {
  if (verbose) {
    console.error(`${TOOL_TAG}: ${message}`, ...args);
  }
}

export function error(message: string, ...args: unknown[]): void {
  console.error(`${TOOL_TAG}: ${message}`, ...args);
}
