/** src/cli/materialize/index.ts
 * `docbranch materialize`: options and action wiring.
 */
import type { Command } from 'commander';
import { Option } from 'commander';

import { rootDefaults, tagDefault } from '@/cli/cli-utils';

import { type MaterializeCliOptions, runMaterialize } from './action';

/** Register the `materialize` subcommand on the provided root CLI. */
export function registerMaterialize(cli: Command): Command {
  const sub = cli
    .command('materialize')
    .description(
      'Run snippets annotated with "# pragma: materialize" and publish each result as a branch (cached by fingerprint)',
    )
    .option(
      '-w, --worktrees-under <dir>',
      'check each branch out under <dir>/<namespace>/<doc>/<run>/<target> instead of the host repository',
    )
    .option('-c, --content-dir <dir>', 'directory of Markdown documents to scan')
    .option('-r, --remote <name>', 'remote used for URL resolution and --push');

  const { pushDefault } = rootDefaults(process.cwd());
  const optPush = new Option('-p, --push', 'push regenerated branches and cache notes to the remote');
  const optNoPush = new Option('-P, --no-push', 'do not push (local only)');
  tagDefault(pushDefault ? optPush : optNoPush, true);
  sub.addOption(optPush).addOption(optNoPush);

  sub.action(async (opts: MaterializeCliOptions) => {
    const pushFromCli = sub.getOptionValueSource('push') === 'cli';
    const ok = await runMaterialize(process.cwd(), {
      ...opts,
      push: pushFromCli ? opts.push === true : undefined,
    });
    if (!ok) process.exitCode = 1;
  });
  return cli;
}
