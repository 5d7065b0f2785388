/**
 * Terminal and Waybar renderers
 */

import { ERROR_LABELS } from "./errors.js";
import { formatTemplate, type TemplateFields } from "./template.js";
import type {
  CacheEntry,
  ErrorCacheEntry,
  OkCacheEntry,
  ProviderId,
  WaybarOutput,
  WindowName,
  WindowUsage,
} from "./types.js";

// Nerd Font glyphs
const ICON = "\u{F0721}";
const TIME_ICON = "\u{F051A}";
const ERROR_COLOR = "#ff5555";

const PROVIDER_STYLE: Record<ProviderId, { name: string; color: string }> = {
  claude: { name: "Claude", color: "#DE7356" },
  codex: { name: "Codex", color: "#10A37F" },
};

// The 7-day window takes over the display above this utilization
const SEVEN_DAY_SWITCH_PCT = 80;

export type RenderOptions = {
  show5h?: boolean;
  format?: string;
  tooltipFormat?: string;
};

export type StatusLabel = "" | "Ready" | "Pause";

export type DisplayState = {
  fiveHourPct: number;
  sevenDayPct: number;
  fiveHourReset: string;
  sevenDayReset: string;
  activeWindow: WindowName;
  statusLabel: StatusLabel;
  colorClass: string;
};

function padRight(str: string, len: number): string {
  return str.padEnd(len);
}

function padLeft(str: string, len: number): string {
  return str.padStart(len);
}

function twoDigits(value: number): string {
  return value.toString().padStart(2, "0");
}

/** Time until reset: "2d04h", "4h19m" or "19m30s" */
export function formatEta(resetsAt: number | null, now: number): string {
  if (resetsAt === null) return "Not started";

  const secs = Math.floor((resetsAt - now) / 1000);
  if (secs <= 0) return "0m00s";

  if (secs >= 86_400) {
    const days = Math.floor(secs / 86_400);
    const hours = Math.floor((secs % 86_400) / 3600);
    return `${days}d${twoDigits(hours)}h`;
  }

  if (secs >= 3600) {
    const hours = Math.floor(secs / 3600);
    const mins = Math.floor((secs % 3600) / 60);
    return `${hours}h${twoDigits(mins)}m`;
  }

  const mins = Math.floor(secs / 60);
  return `${mins}m${twoDigits(secs % 60)}s`;
}

export function selectWindow(
  entry: OkCacheEntry,
  options: Pick<RenderOptions, "show5h"> = {}
): WindowName {
  if (options.show5h) return "5h";
  return entry.sevenDay.utilization > SEVEN_DAY_SWITCH_PCT ? "7d" : "5h";
}

function windowFor(entry: OkCacheEntry, name: WindowName): WindowUsage {
  return name === "7d" ? entry.sevenDay : entry.fiveHour;
}

function statusFor(window: WindowUsage): StatusLabel {
  if (window.utilization >= 100) return "Pause";
  if (!window.started) return "Ready";
  return "";
}

function colorClass(providerId: ProviderId, pct: number): string {
  if (pct < 50) return `${providerId}-low`;
  if (pct < 80) return `${providerId}-mid`;
  return `${providerId}-high`;
}

export function buildDisplay(
  entry: OkCacheEntry,
  options: RenderOptions,
  now: number
): DisplayState {
  const activeWindow = selectWindow(entry, options);
  const target = windowFor(entry, activeWindow);
  return {
    fiveHourPct: Math.round(entry.fiveHour.utilization),
    sevenDayPct: Math.round(entry.sevenDay.utilization),
    fiveHourReset: formatEta(entry.fiveHour.resetsAt, now),
    sevenDayReset: formatEta(entry.sevenDay.resetsAt, now),
    activeWindow,
    statusLabel: statusFor(target),
    colorClass: colorClass(entry.providerId, Math.round(target.utilization)),
  };
}

function styledIcon(glyph: string, color: string): string {
  return `<span foreground='${color}' size='large'>${glyph}</span>`;
}

/** Flat string fields available to --format and --tooltip-format */
export function buildFields(
  entry: OkCacheEntry,
  options: RenderOptions,
  now: number
): TemplateFields {
  const display = buildDisplay(entry, options, now);
  const target = windowFor(entry, display.activeWindow);
  const { color } = PROVIDER_STYLE[entry.providerId];
  return {
    "5h_pct": String(display.fiveHourPct),
    "7d_pct": String(display.sevenDayPct),
    "5h_reset": display.fiveHourReset,
    "7d_reset": display.sevenDayReset,
    pct: String(Math.round(target.utilization)),
    reset: formatEta(target.resetsAt, now),
    win: display.activeWindow,
    status: display.statusLabel,
    icon: styledIcon(ICON, color),
    icon_plain: ICON,
    time_icon: styledIcon(TIME_ICON, color),
    time_icon_plain: TIME_ICON,
  };
}

function defaultTooltip(entry: OkCacheEntry, display: DisplayState): string {
  const row = (label: string, window: WindowUsage, reset: string) =>
    `${padRight(label, 11)}${padLeft(window.utilization.toFixed(0), 3)}%    ${reset}`;
  return [
    "Window     Used    Reset",
    "━".repeat(24),
    row("5-Hour", entry.fiveHour, display.fiveHourReset),
    row("7-Day", entry.sevenDay, display.sevenDayReset),
    "",
    "Click to Refresh",
  ].join("\n");
}

function renderWaybarError(entry: ErrorCacheEntry): WaybarOutput {
  const { name } = PROVIDER_STYLE[entry.providerId];
  return {
    text: `<span foreground='${ERROR_COLOR}'>${ICON} ${ERROR_LABELS[entry.status]}</span>`,
    tooltip: `Error fetching ${name} usage:\n${entry.message}`,
    class: "critical",
  };
}

export function renderWaybar(
  entry: CacheEntry,
  options: RenderOptions,
  now: number
): WaybarOutput {
  if (entry.status !== "ok") return renderWaybarError(entry);

  const display = buildDisplay(entry, options, now);
  const fields = buildFields(entry, options, now);

  let text: string;
  if (options.format) {
    text = formatTemplate(options.format, fields);
  } else if (display.statusLabel) {
    text = `${fields.icon} ${display.statusLabel}`;
  } else {
    text = `${fields.icon} ${fields.pct}% ${fields.time_icon} ${fields.reset}`;
  }

  const tooltip = options.tooltipFormat
    ? formatTemplate(options.tooltipFormat, fields)
    : defaultTooltip(entry, display);

  return {
    text,
    tooltip,
    class: display.colorClass,
    alt: display.activeWindow,
    percentage: Number(fields.pct),
  };
}

/** Plain-text usage summary for the terminal */
export function renderCli(entry: OkCacheEntry, now: number): string {
  const { name } = PROVIDER_STYLE[entry.providerId];
  const line = (label: string, window: WindowUsage) =>
    `${padRight(label, 7)}: ${window.utilization.toFixed(1)}%  (Reset in ${formatEta(window.resetsAt, now)})`;
  return [
    `${name} usage`,
    "-".repeat(40),
    line("5-hour", entry.fiveHour),
    line("7-day", entry.sevenDay),
  ].join("\n");
}
