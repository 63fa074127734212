/** src/cli/materialize/action.ts
 * Materialize action: config -> locate -> materialize -> report.
 */
import path from 'node:path';

import { loadConfigSync } from '@/cli/config/load';
import { DocbranchError, toError } from '@/runner/errors';
import { Git } from '@/runner/git';
import { CacheStore } from '@/runner/materialize/cache';
import { SnapshotExecutor } from '@/runner/materialize/executor';
import { createRemoteIdentity } from '@/runner/materialize/remote';
import { Materializer } from '@/runner/materialize/service';
import { gitTargets } from '@/runner/materialize/target';
import type { MaterializeMode, Snippet } from '@/runner/materialize/types';
import { renderSummary } from '@/runner/presentation/format';
import { materializeLogger } from '@/runner/presentation/logger';
import { locateSnippets } from '@/runner/snippets/locate';
import { error as colorError } from '@/runner/util/color';

export type MaterializeCliOptions = {
  worktreesUnder?: string;
  contentDir?: string;
  remote?: string;
  /** undefined = config default */
  push?: boolean;
};

/**
 * Run one materialization pass from `cwd`. Relative paths in `opts` resolve
 * against `cwd`.
 *
 * @returns true when every key succeeded (cache hit, regenerated or skipped).
 */
export const runMaterialize = async (
  cwd: string,
  opts: MaterializeCliOptions,
): Promise<boolean> => {
  try {
    const cfg = loadConfigSync(cwd);
    const contentDir = opts.contentDir
      ? path.resolve(cwd, opts.contentDir)
      : cfg.contentDir;
    const remoteName = opts.remote ?? cfg.remote;
    const push = opts.push ?? cfg.cliDefaults.push ?? false;
    const git = new Git(cwd, { timeoutMs: cfg.gitTimeoutMs });

    let mode: MaterializeMode;
    let host = git;
    if (opts.worktreesUnder) {
      mode = { kind: 'worktree', root: path.resolve(cwd, opts.worktreesUnder) };
    } else {
      const top = await git.topLevel();
      if (!top)
        throw new DocbranchError(
          `${cwd} is not inside a git repository (use --worktrees-under <dir> to materialize outside one)`,
        );
      mode = { kind: 'branch' };
      host = git.at(top);
    }

    const located = await locateSnippets(contentDir, {
      timeout: cfg.snippetTimeout,
      exitCode: 0,
    });
    let locatorFailed = false;
    const snippets: Snippet[] = [];
    for (const l of located) {
      if (l.ok) snippets.push(l.snippet);
      else {
        locatorFailed = true;
        console.error(`docbranch: ${colorError('invalid annotation')} ${l.error.message}`);
      }
    }

    const cache = new CacheStore(cfg.notesRef);
    const materializer = new Materializer({
      executor: new SnapshotExecutor(),
      openTarget: gitTargets(host, cache, mode, cfg.namespace),
      remote: createRemoteIdentity(remoteName, { git: host }),
      sink: materializeLogger(),
      namespace: cfg.namespace,
      push,
    });
    const summary = await materializer.materializeAll(snippets);
    if (summary.results.length > 0) console.log(renderSummary(summary.results));
    else console.log(`docbranch: nothing to materialize under ${contentDir}`);
    return !summary.failed && !locatorFailed;
  } catch (e) {
    const err = toError(e);
    console.error(`docbranch: ${colorError('error')} ${err.message}`);
    return false;
  }
};
