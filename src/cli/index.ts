/* src/cli/index.ts
 * Root CLI factory for "docbranch": global flags, env propagation, subcommands.
 * Avoids process.exit so tests can drive it; failures set process.exitCode.
 */
import { Command, Option } from 'commander';

import { registerMaterialize } from './materialize';
import { registerReap } from './reap';
import { applyCliSafety, rootDefaults, tagDefault } from './cli-utils';

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @returns New Commander `Command` instance.
 */
export const makeCli = (): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults(process.cwd());

  cli
    .name('docbranch')
    .description(
      'Materialize runnable shell snippets from Markdown docs into cached git branches, and reap them.',
    );

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option('-D, --no-debug', 'disable verbose debug logging');
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option('-B, --no-boring', 'do not disable color/styling');
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  // Propagate -d/-b to the environment before any subcommand action runs.
  cli.hook('preAction', (thisCommand) => {
    const root = thisCommand.parent ?? thisCommand;
    const opts = root.opts<{ debug?: boolean; boring?: boolean }>();
    const fromCli = (name: string) => root.getOptionValueSource(name) === 'cli';

    // An explicit DOCBRANCH_DEBUG=1 survives unless negated on the command line.
    let debugFinal = debugDefault || process.env.DOCBRANCH_DEBUG === '1';
    if (fromCli('debug')) debugFinal = opts.debug === true;
    const boringFinal = fromCli('boring') ? opts.boring === true : boringDefault;

    if (debugFinal) process.env.DOCBRANCH_DEBUG = '1';
    else delete process.env.DOCBRANCH_DEBUG;
    if (boringFinal) {
      process.env.DOCBRANCH_BORING = '1';
      process.env.FORCE_COLOR = '0';
      process.env.NO_COLOR = '1';
    } else {
      delete process.env.DOCBRANCH_BORING;
    }
  });

  registerMaterialize(cli);
  registerReap(cli);
  applyCliSafety(cli);

  return cli;
};
