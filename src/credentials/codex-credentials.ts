/**
 * Codex OAuth credentials: read ~/.codex/auth.json (created by `codex login`),
 * decide when the token needs renewing, and exchange the refresh token for a
 * new access token. The renewed token is written back into the same file so
 * the Codex CLI picks it up too.
 */

import { randomUUID } from "node:crypto";
import { readFile, rename, unlink, writeFile } from "node:fs/promises";
import { z } from "zod";
import { REFRESH_MAX_AGE_MS } from "../config.js";
import { errorMessage, UsageError } from "../errors.js";
import { postJson } from "../http.js";
import { createLogger } from "../logger.js";
import type { ApiResponse, Clock, Credential } from "../types.js";

const log = createLogger("codex-auth");

export const CODEX_TOKEN_URL = "https://auth.openai.com/oauth/token";
export const CODEX_CLIENT_ID = "app_EMoamEEZ73f0CkXaXp7hrann";

const LOGIN_HINT = "Run `codex login` to authenticate.";

const documentSchema = z.record(z.string(), z.unknown());

const codexAuthFileSchema = z
  .object({
    tokens: z
      .object({
        access_token: z.string().min(1),
        refresh_token: z.string().nullish(),
        id_token: z.string().nullish(),
        account_id: z.string().nullish(),
      })
      .passthrough(),
    last_refresh: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

export type CodexAuthDocument = z.infer<typeof codexAuthFileSchema>;

const refreshResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  id_token: z.string().optional(),
  expires_in: z.number().optional(), // seconds
});

export type CodexCredential = Credential & {
  accountId: string | null;
  document: CodexAuthDocument;
};

/** last_refresh is an ISO string; older files may carry unix seconds */
function parseLastRefresh(value: string | number | null | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value * 1000 : null;
  }
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

function toCredential(
  document: CodexAuthDocument,
  expiresAt: number | null
): CodexCredential {
  return {
    accessToken: document.tokens.access_token,
    refreshToken: document.tokens.refresh_token ?? null,
    expiresAt,
    lastRefresh: parseLastRefresh(document.last_refresh),
    accountId: document.tokens.account_id ?? null,
    document,
  };
}

export async function loadCodexCredential(path: string): Promise<CodexCredential> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    throw new UsageError(
      "no_credentials",
      `Codex auth not found: ${path}\n${LOGIN_HINT}`
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (err) {
    throw new UsageError(
      "no_credentials",
      `Failed to parse ${path}: ${errorMessage(err)}`
    );
  }

  const document = documentSchema.safeParse(json);
  if (!document.success) {
    throw new UsageError("no_credentials", `Unexpected content in ${path}`);
  }
  if (document.data.OPENAI_API_KEY) {
    throw new UsageError(
      "no_credentials",
      "Codex is configured with an API key, not OAuth.\nRun `codex login` to switch to OAuth authentication."
    );
  }

  const parsed = codexAuthFileSchema.safeParse(document.data);
  if (!parsed.success) {
    throw new UsageError(
      "no_credentials",
      `Missing tokens.access_token in ${path}\n${LOGIN_HINT}`
    );
  }

  return toCredential(parsed.data, null);
}

/** Proactive refresh once the token is older than eight days */
export function needsRefresh(credential: Credential, now: number): boolean {
  if (credential.lastRefresh === null) return true;
  return now - credential.lastRefresh > REFRESH_MAX_AGE_MS;
}

async function writeAuthFile(path: string, document: CodexAuthDocument): Promise<void> {
  const tmpPath = `${path}.${process.pid}.${randomUUID()}.tmp`;
  try {
    await writeFile(tmpPath, JSON.stringify(document, null, 2) + "\n", {
      encoding: "utf-8",
      mode: 0o600,
    });
    await rename(tmpPath, path);
  } catch (err) {
    await unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Exchange the stored refresh token for a new access token and persist it.
 * Any failure here is terminal for the current fetch: the user has to log
 * in again, retrying will not help.
 */
export async function refreshCodexToken(
  credential: CodexCredential,
  path: string,
  clock: Clock
): Promise<CodexCredential> {
  if (!credential.refreshToken) {
    throw new UsageError(
      "refresh_failed",
      `No refresh_token in Codex auth, cannot refresh.\n${LOGIN_HINT}`
    );
  }

  log.debug("refreshing Codex access token");

  let response: ApiResponse;
  try {
    response = await postJson(CODEX_TOKEN_URL, {
      client_id: CODEX_CLIENT_ID,
      grant_type: "refresh_token",
      refresh_token: credential.refreshToken,
    });
  } catch (err) {
    throw new UsageError(
      "refresh_failed",
      `Token refresh request failed: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  if (response.status < 200 || response.status >= 300) {
    throw new UsageError(
      "refresh_failed",
      `Token refresh failed (${response.status}).\n${LOGIN_HINT}`
    );
  }

  const data = refreshResponseSchema.safeParse(response.body);
  if (!data.success) {
    throw new UsageError(
      "refresh_failed",
      "Token refresh response did not contain an access_token."
    );
  }

  const now = clock.now();
  const { access_token, refresh_token, id_token, expires_in } = data.data;
  const document: CodexAuthDocument = {
    ...credential.document,
    tokens: {
      ...credential.document.tokens,
      access_token,
      ...(refresh_token ? { refresh_token } : {}),
      ...(id_token ? { id_token } : {}),
    },
    last_refresh: new Date(now).toISOString(),
  };

  try {
    await writeAuthFile(path, document);
  } catch (err) {
    // The new token is already in memory; the next run refreshes again
    log.warn(`could not write refreshed token to ${path}: ${errorMessage(err)}`);
  }

  return toCredential(
    document,
    expires_in !== undefined ? now + expires_in * 1000 : null
  );
}
