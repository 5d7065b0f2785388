/**
 * Type definitions for ai-usage-bar
 */

export type ProviderId = "claude" | "codex";

export type WindowName = "5h" | "7d";

/** One rolling usage window, normalised across providers */
export type WindowUsage = Readonly<{
  utilization: number; // 0-100 (percentage used)
  resetsAt: number | null; // ms epoch
  started: boolean;
}>;

export type ErrorStatus =
  | "no_credentials"
  | "token_expired"
  | "refresh_failed"
  | "auth_error"
  | "network_error";

export type CacheStatus = "ok" | ErrorStatus;

type CacheEntryBase = {
  providerId: ProviderId;
  fetchedAt: number; // ms epoch
  ttlSeconds: number;
};

export type OkCacheEntry = CacheEntryBase & {
  status: "ok";
  fiveHour: WindowUsage;
  sevenDay: WindowUsage;
};

export type ErrorCacheEntry = CacheEntryBase & {
  status: ErrorStatus;
  message: string;
};

export type CacheEntry = OkCacheEntry | ErrorCacheEntry;

export type UsageWindows = {
  fiveHour: WindowUsage;
  sevenDay: WindowUsage;
};

/** OAuth material read from a provider's credential file */
export type Credential = {
  accessToken: string;
  expiresAt: number | null; // ms epoch
  refreshToken: string | null;
  lastRefresh: number | null; // ms epoch
};

export type Clock = {
  now(): number;
};

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Raw outcome of a usage API call, before status handling */
export type ApiResponse = {
  status: number;
  body: unknown;
};

/**
 * Per-provider capability set driven by the shared fetch orchestration.
 * `needsRefresh` and `refresh` are only implemented by providers that can
 * renew their own tokens.
 */
export type UsageProvider<C extends Credential = Credential> = {
  id: ProviderId;
  displayName: string;
  loadCredential(): Promise<C>;
  needsRefresh?(credential: C, now: number): boolean;
  refresh?(credential: C): Promise<C>;
  callApi(credential: C): Promise<ApiResponse>;
  parseResponse(body: unknown, now: number): UsageWindows;
};

export type FetchSource = "cache" | "network" | "stale" | "peer";

export type UsageResult = {
  entry: CacheEntry;
  source: FetchSource;
};

/** Waybar custom module payload */
export type WaybarOutput = {
  text: string;
  tooltip: string;
  class: string;
  alt?: WindowName;
  percentage?: number;
};
