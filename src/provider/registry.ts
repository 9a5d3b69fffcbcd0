/**
 * Supported providers. Only the GitHub CLI is wired up today.
 */

export const ALIAS_PREFIX = "dw_";

export interface ProviderInfo {
  executable: string;
  displayName: string;
}

export const PROVIDERS = {
  gh: { executable: "gh", displayName: "GitHub CLI" },
} as const satisfies Record<string, ProviderInfo>;

export type ProviderId = keyof typeof PROVIDERS;

export const DEFAULT_PROVIDER: ProviderId = "gh";

export function isProviderId(value: string): value is ProviderId {
  return Object.prototype.hasOwnProperty.call(PROVIDERS, value);
}
