import { HTTP_TIMEOUT_MS } from "./config.js";
import type { ApiResponse } from "./types.js";

/**
 * Read a response body as JSON. Bodies that are not JSON come back as
 * `undefined` so status handling can still run on error pages.
 */
async function readJsonBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export async function getJson(
  url: string,
  headers: Record<string, string>,
  timeoutMs: number = HTTP_TIMEOUT_MS
): Promise<ApiResponse> {
  const response = await fetch(url, {
    method: "GET",
    headers,
    signal: AbortSignal.timeout(timeoutMs),
  });
  return { status: response.status, body: await readJsonBody(response) };
}

export async function postJson(
  url: string,
  payload: unknown,
  timeoutMs: number = HTTP_TIMEOUT_MS
): Promise<ApiResponse> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Accept: "application/json",
    },
    body: JSON.stringify(payload),
    signal: AbortSignal.timeout(timeoutMs),
  });
  return { status: response.status, body: await readJsonBody(response) };
}
