/** Shared Commander helpers for the docbranch CLI.
 * Exit override for every subcommand and config-backed flag defaults.
 */
import type { Command, Option } from 'commander';

import { loadConfigSync } from '@/cli/config/load';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

/** Install a Commander exit override: help/version exits are not errors. */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride((err) => {
    const benign = new Set<string>([
      'commander.helpDisplayed',
      'commander.help',
      'commander.version',
    ]);
    if (benign.has(err.code)) return;
    throw err;
  });
};

/** Apply exit override to a command and all of its subcommands. */
export function applyCliSafety(cmd: Command): void {
  installExitOverride(cmd);
  for (const sub of cmd.commands) applyCliSafety(sub);
}

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Root-level boolean defaults (debug/boring/push) from config or built-ins. */
export const rootDefaults = (
  dir: string,
): { debugDefault: boolean; boringDefault: boolean; pushDefault: boolean } => {
  try {
    const d = loadConfigSync(dir).cliDefaults;
    return {
      debugDefault: d.debug ?? false,
      boringDefault: d.boring ?? false,
      pushDefault: d.push ?? false,
    };
  } catch (e) {
    // Invalid config surfaces when a command loads it; help still renders.
    debugFallback(
      DBG_SCOPE_CLI_CONFIG_LOAD,
      e instanceof Error ? e.message : String(e),
    );
    return { debugDefault: false, boringDefault: false, pushDefault: false };
  }
};
