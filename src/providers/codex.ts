import { z } from "zod";
import { getCodexAuthPath } from "../config.js";
import {
  loadCodexCredential,
  needsRefresh,
  refreshCodexToken,
  type CodexCredential,
} from "../credentials/codex-credentials.js";
import { UsageError } from "../errors.js";
import { getJson } from "../http.js";
import { normalizeWindow, unixSecondsToMs, WINDOW_SECONDS } from "../window-usage.js";
import { systemClock, type Clock, type UsageProvider } from "../types.js";

export const CODEX_USAGE_URL = "https://chatgpt.com/backend-api/wham/usage";

const codexWindowSchema = z
  .object({
    used_percent: z.union([z.number(), z.string()]).nullish(),
    reset_at: z.number().nullish(), // unix seconds
    limit_window_seconds: z.number().nullish(),
  })
  .nullish();

/** Codex API response structure (only the fields used here) */
const codexUsageResponseSchema = z.object({
  plan_type: z.string().nullish(),
  rate_limit: z
    .object({
      primary_window: codexWindowSchema, // 5h limit
      secondary_window: codexWindowSchema, // weekly limit
    })
    .nullish(),
});

export type CodexUsageResponse = z.infer<typeof codexUsageResponseSchema>;

type CodexWindow = z.infer<typeof codexWindowSchema>;

function toWindow(window: CodexWindow, fallbackSeconds: number, now: number) {
  return normalizeWindow(
    window?.used_percent,
    unixSecondsToMs(window?.reset_at),
    window?.limit_window_seconds ?? fallbackSeconds,
    now
  );
}

export type CodexProviderOptions = {
  authPath?: string;
  clock?: Clock;
};

export function createCodexProvider(
  options: CodexProviderOptions = {}
): UsageProvider<CodexCredential> {
  const authPath = options.authPath ?? getCodexAuthPath();
  const clock = options.clock ?? systemClock;

  return {
    id: "codex",
    displayName: "Codex",

    loadCredential: () => loadCodexCredential(authPath),

    needsRefresh,

    refresh: (credential) => refreshCodexToken(credential, authPath, clock),

    callApi(credential) {
      const headers: Record<string, string> = {
        Authorization: `Bearer ${credential.accessToken}`,
        Accept: "application/json",
      };
      if (credential.accountId) {
        headers["ChatGPT-Account-Id"] = credential.accountId;
      }
      return getJson(CODEX_USAGE_URL, headers);
    },

    parseResponse(body, now) {
      const parsed = codexUsageResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new UsageError(
          "network_error",
          "Unexpected Codex usage response shape"
        );
      }
      const rateLimit = parsed.data.rate_limit;
      return {
        fiveHour: toWindow(rateLimit?.primary_window, WINDOW_SECONDS["5h"], now),
        sevenDay: toWindow(rateLimit?.secondary_window, WINDOW_SECONDS["7d"], now),
      };
    },
  };
}
