/**
 * Alias configuration types.
 */

/** Alias name to whitespace-collapsed command. */
export type AliasTable = Record<string, string>;

export interface ConfigSource {
  path: string;
  origin: "option" | "env" | "default";
}
