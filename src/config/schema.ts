/**
 * Validation of the parsed aliases document.
 *
 * Expected shape:
 *
 *   [providers.gh.aliases]
 *   dw_name = "pr list --author @me"
 *
 * Validation stops at the first violation; there is no partial table.
 */

import { z } from "zod";
import { ALIAS_PREFIX } from "../provider/registry";
import { EnvironmentError } from "../util/errors";
import type { AliasTable } from "./types";

const recordSchema = z.record(z.string(), z.unknown());

// z.record rebuilds its output and drops keys such as "__proto__"; keep the
// parsed object as is so every key the file declares gets validated.
const tableSchema = z.custom<Record<string, unknown>>(
  value => recordSchema.safeParse(value).success,
);

const commandSchema = z
  .string()
  .refine(value => value.trim().length > 0)
  .transform(collapseWhitespace);

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function asTable(value: unknown): Record<string, unknown> | undefined {
  const result = tableSchema.safeParse(value);
  return result.success ? result.data : undefined;
}

export function buildAliasTable(document: unknown, provider: string): AliasTable {
  const providers = asTable(asTable(document)?.providers);
  if (!providers) {
    throw new EnvironmentError("config must define [providers.<name>.aliases]");
  }

  const providerTable = asTable(providers[provider]);
  if (!providerTable) {
    throw new EnvironmentError(`unknown provider in config: ${provider}`);
  }

  const aliases = asTable(providerTable.aliases);
  if (!aliases || Object.keys(aliases).length === 0) {
    throw new EnvironmentError(`missing or empty [providers.${provider}.aliases]`);
  }

  const table: AliasTable = {};
  for (const [name, command] of Object.entries(aliases)) {
    if (!name) {
      throw new EnvironmentError("alias keys must be non-empty strings");
    }
    if (!name.startsWith(ALIAS_PREFIX)) {
      throw new EnvironmentError(
        `invalid alias key (must start with ${ALIAS_PREFIX}): ${name}`,
      );
    }
    const parsed = commandSchema.safeParse(command);
    if (!parsed.success) {
      throw new EnvironmentError(`alias command must be a non-empty string: ${name}`);
    }
    table[name] = parsed.data;
  }

  return table;
}

/** Alias names in the order they are applied. */
export function sortedAliasNames(table: AliasTable): string[] {
  return Object.keys(table).sort();
}
