/** src/cli/reap/index.ts
 * `docbranch reap`: list or delete materialized branches on a remote.
 */
import type { Command } from 'commander';

import { loadConfigSync } from '@/cli/config/load';
import { toError } from '@/runner/errors';
import { Git } from '@/runner/git';
import { reapLogger } from '@/runner/presentation/logger';
import { reap } from '@/runner/reap/service';
import { error as colorError } from '@/runner/util/color';

export type ReapCliOptions = {
  dryRun?: boolean;
  local?: boolean;
  remote?: string;
};

/** Run the reaper from `cwd`; true on success. */
export const runReap = async (
  cwd: string,
  opts: ReapCliOptions,
): Promise<boolean> => {
  try {
    const cfg = loadConfigSync(cwd);
    await reap({
      git: new Git(cwd, { timeoutMs: cfg.gitTimeoutMs }),
      remote: opts.remote ?? cfg.remote,
      namespace: cfg.namespace,
      dryRun: opts.dryRun === true,
      local: opts.local === true,
      sink: reapLogger(),
    });
    return true;
  } catch (e) {
    console.error(`docbranch: ${colorError('error')} ${toError(e).message}`);
    return false;
  }
};

/** Register the `reap` subcommand on the provided root CLI. */
export function registerReap(cli: Command): Command {
  cli
    .command('reap')
    .description('Delete every materialized branch on the remote')
    .option('-n, --dry-run', 'list branches that would be deleted, delete nothing')
    .option('-l, --local', 'also delete local materialized branches')
    .option('-r, --remote <name>', 'remote to reap')
    .action(async (opts: ReapCliOptions) => {
      if (!(await runReap(process.cwd(), opts))) process.exitCode = 1;
    });
  return cli;
}
