#!/usr/bin/env node
/**
 * ai-usage-bar - Claude and Codex usage quotas for the terminal and Waybar
 *
 * Usage:
 *   ai-usage-bar claude
 *   ai-usage-bar codex --waybar
 *   ai-usage-bar codex --waybar --show-5h
 */

import { CliUsageError, helpText, parseArgs, type CliArgs } from "./cli.js";
import { ERROR_LABELS } from "./errors.js";
import { fetchProviderUsage } from "./providers/index.js";
import { renderCli, renderWaybar } from "./renderer.js";
import { systemClock } from "./types.js";

async function main(): Promise<number> {
  let args: CliArgs | null;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof CliUsageError)) throw error;
    console.error(`Error: ${error.message}`);
    console.error(helpText());
    return 1;
  }

  if (args === null) {
    console.log(helpText());
    return 0;
  }

  const { entry } = await fetchProviderUsage(args.provider, {
    clock: systemClock,
  });
  const now = systemClock.now();

  if (args.waybar) {
    // Waybar hides modules whose command exits non-zero, so errors are
    // rendered as a critical state instead
    console.log(JSON.stringify(renderWaybar(entry, args, now)));
    return 0;
  }

  if (entry.status !== "ok") {
    console.error(
      `[!] Critical Error (${ERROR_LABELS[entry.status]}): ${entry.message}`
    );
    return 1;
  }

  console.log(renderCli(entry, now));
  return 0;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
