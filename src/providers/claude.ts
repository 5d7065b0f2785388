import { z } from "zod";
import { getClaudeCredentialsPath } from "../config.js";
import { loadClaudeCredential } from "../credentials/claude-credentials.js";
import { UsageError } from "../errors.js";
import { getJson } from "../http.js";
import { isoToMs, normalizeWindow, WINDOW_SECONDS } from "../window-usage.js";
import {
  systemClock,
  type Clock,
  type Credential,
  type UsageProvider,
} from "../types.js";

export const CLAUDE_USAGE_URL = "https://api.anthropic.com/api/oauth/usage";
export const CLAUDE_BETA_HEADER = "oauth-2025-04-20";

const claudeWindowSchema = z
  .object({
    utilization: z.union([z.number(), z.string()]).nullish(),
    resets_at: z.string().nullish(), // ISO-8601
  })
  .nullish();

const claudeUsageResponseSchema = z.object({
  five_hour: claudeWindowSchema,
  seven_day: claudeWindowSchema,
});

export type ClaudeUsageResponse = z.infer<typeof claudeUsageResponseSchema>;

export type ClaudeProviderOptions = {
  credentialsPath?: string;
  clock?: Clock;
};

export function createClaudeProvider(
  options: ClaudeProviderOptions = {}
): UsageProvider<Credential> {
  const credentialsPath = options.credentialsPath ?? getClaudeCredentialsPath();
  const clock = options.clock ?? systemClock;

  return {
    id: "claude",
    displayName: "Claude",

    loadCredential: () => loadClaudeCredential(credentialsPath, clock),

    callApi: (credential) =>
      getJson(CLAUDE_USAGE_URL, {
        Authorization: `Bearer ${credential.accessToken}`,
        "anthropic-beta": CLAUDE_BETA_HEADER,
        Accept: "application/json",
      }),

    parseResponse(body, now) {
      const parsed = claudeUsageResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new UsageError(
          "network_error",
          "Unexpected Claude usage response shape"
        );
      }
      const { five_hour, seven_day } = parsed.data;
      return {
        fiveHour: normalizeWindow(
          five_hour?.utilization,
          isoToMs(five_hour?.resets_at),
          WINDOW_SECONDS["5h"],
          now
        ),
        sevenDay: normalizeWindow(
          seven_day?.utilization,
          isoToMs(seven_day?.resets_at),
          WINDOW_SECONDS["7d"],
          now
        ),
      };
    },
  };
}
