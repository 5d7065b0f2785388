import { homedir } from "node:os";
import { join } from "node:path";

export const APP_NAME = "ai-usage-bar";

export const CACHE_TTL_SECONDS = 60;
export const LOCK_STALE_MS = 30_000;
export const HTTP_TIMEOUT_MS = 10_000;
export const PEER_WAIT_MS = 3_000;
export const PEER_POLL_MS = 500;

// Codex tokens are refreshed proactively once they are this old
export const REFRESH_MAX_AGE_MS = 8 * 24 * 60 * 60 * 1000;

export function getCacheDir(): string {
  const explicit = process.env.AI_USAGE_BAR_CACHE_DIR?.trim();
  if (explicit) return explicit;

  const cacheHome = process.env.XDG_CACHE_HOME?.trim() || join(homedir(), ".cache");
  return join(cacheHome, APP_NAME);
}

export function getClaudeCredentialsPath(): string {
  const configDir =
    process.env.CLAUDE_CONFIG_DIR?.trim() || join(homedir(), ".claude");
  return join(configDir, ".credentials.json");
}

export function getCodexAuthPath(): string {
  const codexHome = process.env.CODEX_HOME?.trim() || join(homedir(), ".codex");
  return join(codexHome, "auth.json");
}

export function isDebugEnabled(): boolean {
  const value = process.env.AI_USAGE_BAR_DEBUG?.trim().toLowerCase();
  return value === "1" || value === "true";
}
