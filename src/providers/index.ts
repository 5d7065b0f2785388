import { createClaudeProvider } from "./claude.js";
import { createCodexProvider } from "./codex.js";
import { fetchUsage, type FetchOptions } from "../usage-fetcher.js";
import type { ProviderId, UsageResult } from "../types.js";

export { createClaudeProvider } from "./claude.js";
export { createCodexProvider } from "./codex.js";

export const PROVIDER_IDS: readonly ProviderId[] = ["claude", "codex"];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

/** Fetch usage for a provider with its default credential location */
export function fetchProviderUsage(
  id: ProviderId,
  options: FetchOptions = {}
): Promise<UsageResult> {
  const clock = options.clock;
  switch (id) {
    case "claude":
      return fetchUsage(createClaudeProvider({ clock }), options);
    case "codex":
      return fetchUsage(createCodexProvider({ clock }), options);
  }
}
