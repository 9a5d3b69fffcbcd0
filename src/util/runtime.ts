import { EnvironmentError } from "./errors";

export const MIN_NODE_MAJOR = 20;

export function requireNodeVersion(
  version: string = process.versions.node,
): void {
  const major = Number.parseInt(version.split(".")[0] ?? "", 10);
  if (Number.isNaN(major) || major < MIN_NODE_MAJOR) {
    throw new EnvironmentError(`requires Node.js ${MIN_NODE_MAJOR}+`);
  }
}
