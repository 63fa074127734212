/* src/runner/materialize/executor.ts
 * Run a snippet in a fresh temp area and locate the repository it produced.
 */
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import fg from 'fast-glob';
import { ensureDir, remove } from 'fs-extra';

import { type CommandRunner, runCommand } from '@/runner/exec/command';
import { SnippetExecutionError, toError } from '@/runner/errors';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_EXECUTOR_CLEANUP } from '@/runner/util/debug-scopes';

import type { Snapshot, Snippet } from './types';

/** How deep below the work area the produced repository may sit. */
const SEARCH_DEPTH = 8;

export type ExecutorOptions = {
  runner?: CommandRunner;
  /** Parent of the per-call temp roots (default: OS temp dir). */
  tempParent?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Shallowest directory named `target` under `workDir` that is a git work
 * tree (contains `.git`). Ties resolve alphabetically.
 */
export const findTargetRepo = async (
  workDir: string,
  target: string,
): Promise<string | undefined> => {
  const hits = await fg(`**/${fg.escapePath(target)}/.git`, {
    cwd: workDir,
    dot: true,
    onlyFiles: false,
    followSymbolicLinks: false,
    deep: SEARCH_DEPTH,
    suppressErrors: true,
  });
  const repos = hits
    .filter((h) => !h.split('/').slice(0, -2).includes('.git'))
    .map((h) => path.posix.dirname(h))
    .sort((a, b) => a.split('/').length - b.split('/').length || a.localeCompare(b));
  const first = repos[0];
  return first === undefined ? undefined : path.join(workDir, first);
};

const tail = (s: string, max = 4000): string =>
  s.length > max ? `…${s.slice(s.length - max)}` : s;

export class SnapshotExecutor {
  private readonly runner: CommandRunner;
  private readonly tempParent: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(opts: ExecutorOptions = {}) {
    this.runner = opts.runner ?? runCommand;
    this.tempParent = opts.tempParent ?? tmpdir();
    this.env = opts.env ?? process.env;
  }

  /**
   * Execute `snippet` and hand the repository produced for `target` to `use`.
   * The temp area is removed on every exit path. The produced history is
   * returned as the snippet left it.
   *
   * @throws SnippetExecutionError on exit code mismatch, timeout, or when no
   * repository named `target` was produced.
   */
  async withSnapshot<T>(
    snippet: Snippet,
    target: string,
    use: (snapshot: Snapshot) => Promise<T>,
  ): Promise<T> {
    await ensureDir(this.tempParent);
    const root = await mkdtemp(
      path.join(this.tempParent, `docbranch-${snippet.runId}-`),
    );
    try {
      const work = path.join(root, 'work');
      await ensureDir(work);
      const script = path.join(root, 'script.sh');
      await writeFile(script, snippet.body, 'utf8');

      const res = await this.runner('sh', [script], {
        cwd: work,
        env: { ...this.env, TMPDIR: work },
        timeoutMs: snippet.timeout * 1000,
      });
      const output = `${res.stdout}${res.stderr}`;
      const label = `${snippet.documentId}/${snippet.runId}`;
      if (res.timedOut) {
        throw new SnippetExecutionError(
          `snippet ${label} timed out after ${snippet.timeout.toString()}s\n${tail(output)}`,
          output,
          null,
          true,
        );
      }
      if (res.code !== snippet.exitCode) {
        throw new SnippetExecutionError(
          `snippet ${label} exited with code ${res.code.toString()} (expected ${snippet.exitCode.toString()})\n${tail(output)}`,
          output,
          res.code,
        );
      }
      const repoPath = await findTargetRepo(work, target);
      if (!repoPath) {
        throw new SnippetExecutionError(
          `snippet ${label} did not produce a repository named "${target}"`,
          output,
          res.code,
        );
      }
      return await use({ root, repoPath, output });
    } finally {
      await remove(root).catch((e: unknown) => {
        debugFallback(DBG_SCOPE_EXECUTOR_CLEANUP, `${root}: ${toError(e).message}`);
      });
    }
  }
}
