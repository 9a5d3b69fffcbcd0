/**
 * Locate and parse the aliases document.
 *
 * Precedence (first wins):
 * 1. --config <path> (resolved against CWD)
 * 2. $DOTWRAP_CONFIG
 * 3. aliases.toml shipped next to the installed package
 */

import { readFile } from "node:fs/promises";
import { basename, resolve } from "node:path";
import { parse as parseToml } from "smol-toml";
import { EnvironmentError, errorMessage } from "../util/errors";
import { log } from "../util/logger";
import type { ConfigSource } from "./types";

export const CONFIG_FILE_NAME = "aliases.toml";
export const CONFIG_ENV_VAR = "DOTWRAP_CONFIG";

export interface ConfigPathOptions {
  configPath?: string;
  defaultPath: string;
  env?: Record<string, string | undefined>;
  cwd?: string;
}

export function resolveConfigPath(options: ConfigPathOptions): ConfigSource {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  if (options.configPath) {
    return { path: resolve(cwd, options.configPath), origin: "option" };
  }
  const fromEnv = env[CONFIG_ENV_VAR];
  if (fromEnv) {
    return { path: resolve(cwd, fromEnv), origin: "env" };
  }
  return { path: options.defaultPath, origin: "default" };
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === "object"
    && err !== null
    && "code" in err
    && (err.code === "ENOENT" || err.code === "EISDIR")
  );
}

export async function loadConfigDocument(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new EnvironmentError(`missing config file: ${path}`);
    }
    throw new EnvironmentError(`invalid ${basename(path)}: ${errorMessage(err)}`);
  }

  try {
    const document = parseToml(content);
    log(`Loaded config from ${path}`);
    return document;
  } catch (err) {
    throw new EnvironmentError(`invalid ${basename(path)}: ${errorMessage(err)}`);
  }
}
