/**
 * Resolve an executable on PATH without spawning anything.
 */

import { access, constants, stat } from "node:fs/promises";
import { delimiter, join } from "node:path";

function pathExtensions(
  env: Record<string, string | undefined>,
  platform: NodeJS.Platform,
): string[] {
  if (platform !== "win32") return [""];
  const raw = env.PATHEXT;
  const candidates = raw ? raw.split(";") : [".COM", ".EXE", ".BAT", ".CMD"];
  const normalized = candidates
    .map(value => value.trim().toLowerCase())
    .filter(Boolean)
    .map(value => (value.startsWith(".") ? value : `.${value}`));
  return ["", ...new Set(normalized)];
}

export async function findExecutable(
  command: string,
  env: Record<string, string | undefined> = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string | undefined> {
  if (!command) return undefined;

  const pathVariable = env.PATH ?? env.Path;
  if (!pathVariable) return undefined;

  const directories = pathVariable.split(delimiter).filter(Boolean);
  const extensions = pathExtensions(env, platform);
  const mode = platform === "win32" ? constants.F_OK : constants.X_OK;

  for (const directory of directories) {
    for (const extension of extensions) {
      const candidate = join(directory, `${command}${extension}`);
      try {
        if (!(await stat(candidate)).isFile()) continue;
        await access(candidate, mode);
        return candidate;
      } catch {
        // not here, keep scanning
      }
    }
  }

  return undefined;
}
