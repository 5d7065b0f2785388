import type { WindowName, WindowUsage } from "./types.js";

export const WINDOW_SECONDS: Record<WindowName, number> = {
  "5h": 18_000,
  "7d": 604_800,
};

export function createWindowUsage(
  utilization: number,
  resetsAt: number | null,
  started: boolean
): WindowUsage {
  return Object.freeze({ utilization, resetsAt, started });
}

/**
 * A window counts as not started when nothing has been used and either no
 * reset is scheduled or the reset is a full window length away (the API
 * reports a fresh window that way). One second of slack covers clock skew.
 */
export function isWindowStarted(
  utilization: number,
  resetsAt: number | null,
  windowSeconds: number,
  now: number
): boolean {
  if (utilization !== 0) return true;
  if (resetsAt === null) return false;
  const resetAfterSeconds = Math.floor((resetsAt - now) / 1000);
  return resetAfterSeconds < windowSeconds - 1;
}

export function toUtilization(value: unknown): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

/** ISO-8601 string (as reported by Claude) to ms epoch */
export function isoToMs(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/** Unix seconds (as reported by Codex) to ms epoch */
export function unixSecondsToMs(value: number | null | undefined): number | null {
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    return null;
  }
  return value * 1000;
}

export function normalizeWindow(
  utilization: unknown,
  resetsAt: number | null,
  windowSeconds: number,
  now: number
): WindowUsage {
  const pct = toUtilization(utilization);
  return createWindowUsage(
    pct,
    resetsAt,
    isWindowStarted(pct, resetsAt, windowSeconds, now)
  );
}
