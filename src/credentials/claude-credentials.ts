import { readFile } from "node:fs/promises";
import { z } from "zod";
import { UsageError } from "../errors.js";
import type { Clock, Credential } from "../types.js";

const LOGIN_HINT = "Run `claude` to log in again.";

/** ~/.claude/.credentials.json, written by the Claude Code CLI */
const claudeCredentialsFileSchema = z.object({
  claudeAiOauth: z.object({
    accessToken: z.string().min(1),
    refreshToken: z.string().nullish(),
    expiresAt: z.number().nullish(), // ms epoch
  }),
});

/**
 * Load the Claude OAuth credential. There is no refresh path for Claude:
 * an expired token stays expired until the CLI itself renews it.
 */
export async function loadClaudeCredential(
  path: string,
  clock: Clock
): Promise<Credential> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    throw new UsageError(
      "no_credentials",
      `Claude credentials not found: ${path}\n${LOGIN_HINT}`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new UsageError(
      "no_credentials",
      `Claude credentials are not valid JSON: ${path}`
    );
  }

  const parsed = claudeCredentialsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new UsageError(
      "no_credentials",
      `Missing claudeAiOauth.accessToken in ${path}\n${LOGIN_HINT}`
    );
  }

  const oauth = parsed.data.claudeAiOauth;
  const expiresAt = oauth.expiresAt ?? null;
  if (expiresAt !== null && expiresAt <= clock.now()) {
    throw new UsageError(
      "token_expired",
      `Claude access token expired at ${new Date(expiresAt).toISOString()}\n${LOGIN_HINT}`
    );
  }

  return {
    accessToken: oauth.accessToken,
    expiresAt,
    refreshToken: oauth.refreshToken ?? null,
    lastRefresh: null,
  };
}
