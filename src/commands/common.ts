/**
 * Shared preconditions and context for the install, uninstall and doctor handlers.
 */

import { buildAliasTable } from "../config/schema";
import { loadConfigDocument } from "../config/discovery";
import type { AliasTable } from "../config/types";
import { isProviderId, PROVIDERS, type ProviderId } from "../provider/registry";
import type { ToolRunner } from "../tool/runner";
import { EnvironmentError, UsageError } from "../util/errors";
import { log } from "../util/logger";

export interface CommandContext {
  /** Absolute path of the aliases document. */
  configPath: string;
  /** Builds the runner for a provider's executable. */
  createRunner: (executable: string) => ToolRunner;
  findExecutable: (command: string) => Promise<string | undefined>;
}

export interface ApplyOptions {
  dryRun?: boolean;
}

export function requireProvider(provider: string): ProviderId {
  if (!isProviderId(provider)) {
    throw new UsageError(`invalid provider: ${provider}`);
  }
  return provider;
}

export async function requireExecutable(
  context: CommandContext,
  provider: ProviderId,
): Promise<ToolRunner> {
  const { executable, displayName } = PROVIDERS[provider];
  const resolved = await context.findExecutable(executable);
  if (!resolved) {
    throw new EnvironmentError(
      `missing required tool: ${executable} (${displayName}) not found on PATH`,
    );
  }
  log(`Using ${executable} at ${resolved}`);
  return context.createRunner(executable);
}

export async function loadAliasTable(
  context: CommandContext,
  provider: ProviderId,
): Promise<AliasTable> {
  const document = await loadConfigDocument(context.configPath);
  return buildAliasTable(document, provider);
}

/** Render argv the way a user would type it. */
export function formatCommandLine(executable: string, args: readonly string[]): string {
  const quoted = args.map(arg =>
    /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`
  );
  return [executable, ...quoted].join(" ");
}
