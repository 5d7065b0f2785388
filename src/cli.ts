/**
 * CLI argument parser using Node.js parseArgs
 */

import { parseArgs as nodeParseArgs } from "node:util";
import { isProviderId, PROVIDER_IDS } from "./providers/index.js";
import type { ProviderId } from "./types.js";

export type CliArgs = {
  provider: ProviderId;
  waybar: boolean;
  format?: string;
  tooltipFormat?: string;
  show5h: boolean;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseRaw(argv: string[]) {
  return nodeParseArgs({
    args: argv,
    options: {
      provider: { type: "string", short: "p" },
      waybar: { type: "boolean", short: "w" },
      format: { type: "string", short: "f" },
      "tooltip-format": { type: "string" },
      "show-5h": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
    allowPositionals: true,
    strict: true,
  });
}

/**
 * Parse argv (without node and script). Returns null when help was
 * requested; throws CliUsageError for invalid input.
 */
export function parseArgs(argv: string[]): CliArgs | null {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    if (error instanceof Error) throw new CliUsageError(error.message);
    throw error;
  }

  const { values, positionals } = parsed;
  if (values.help) return null;

  const provider = (values.provider ?? positionals[0])?.toLowerCase();
  if (!provider) {
    throw new CliUsageError("Missing provider");
  }
  if (!isProviderId(provider)) {
    throw new CliUsageError(
      `Unknown provider "${provider}". Valid: ${PROVIDER_IDS.join(", ")}`
    );
  }

  return {
    provider,
    waybar: values.waybar ?? false,
    format: values.format,
    tooltipFormat: values["tooltip-format"],
    show5h: values["show-5h"] ?? false,
  };
}

export function helpText(): string {
  return `
ai-usage-bar - Claude and Codex usage quotas for the terminal and Waybar

Usage:
  ai-usage-bar <provider> [options]
  ai-usage-bar --provider <provider> [options]

Providers:
  claude                  Reads ~/.claude/.credentials.json (or $CLAUDE_CONFIG_DIR)
  codex                   Reads ~/.codex/auth.json (or $CODEX_HOME)

Options:
  -p, --provider <name>   Provider to query (claude, codex)
  -w, --waybar            Output JSON for a Waybar custom module
  -f, --format <tmpl>     Custom Waybar text template
      --tooltip-format <tmpl>
                          Custom Waybar tooltip template
      --show-5h           Always show the 5-hour window
  -h, --help              Show this help message

Template fields:
  {icon} {icon_plain} {time_icon} {time_icon_plain} {5h_pct} {7d_pct}
  {5h_reset} {7d_reset} {status} {pct} {reset} {win}
  {?name}...{/name} and {?a&b}...{/} render only when the fields have values.

Environment:
  AI_USAGE_BAR_CACHE_DIR  Cache directory (default: $XDG_CACHE_HOME/ai-usage-bar)
  AI_USAGE_BAR_DEBUG=1    Print debug logs to stderr

Examples:
  ai-usage-bar claude
  ai-usage-bar codex --waybar
  ai-usage-bar codex --waybar --format '{icon_plain} {5h_pct}%{?5h_reset} {5h_reset}{/5h_reset}'
`;
}
