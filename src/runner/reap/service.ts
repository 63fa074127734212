/* src/runner/reap/service.ts
 * Enumerate and delete materialized branches on a remote.
 * Independent of the cache: notes of deleted tips are left orphaned.
 */
import { BranchWriteError, GitError } from '@/runner/errors';
import type { Git } from '@/runner/git';
import { DEFAULT_NAMESPACE } from '@/runner/materialize/branch';

export type ReapEvent =
  | { type: 'listed'; scope: 'remote' | 'local'; branches: string[] }
  | { type: 'would-delete'; scope: 'remote' | 'local'; branch: string }
  | { type: 'deleted'; scope: 'remote' | 'local'; branch: string };

export type ReapOptions = {
  git: Git;
  remote: string;
  namespace?: string;
  /** List and report only. */
  dryRun?: boolean;
  /** Also delete local branches under the namespace. */
  local?: boolean;
  sink?: (event: ReapEvent) => void;
};

export type ReapResult = {
  remote: string[];
  local: string[];
  /** Remote branches deleted (empty on dry run). */
  deleted: string[];
};

/** Branch ids under `refs/heads/<namespace>/` on `remote`, sorted. */
export const listMaterialized = async (
  git: Git,
  remote: string,
  namespace = DEFAULT_NAMESPACE,
): Promise<string[]> => {
  const prefix = `refs/heads/${namespace}/`;
  const out = await git.ok(['ls-remote', '--heads', remote, `${prefix}*`]);
  return out
    .split('\n')
    .map((line) => line.split('\t')[1]?.trim() ?? '')
    .filter((ref) => ref.startsWith(prefix))
    .map((ref) => ref.slice('refs/heads/'.length))
    .sort();
};

/** Local branch ids under the namespace, sorted. */
export const listLocalMaterialized = async (
  git: Git,
  namespace = DEFAULT_NAMESPACE,
): Promise<string[]> => {
  const out = await git.ok([
    'for-each-ref',
    '--format=%(refname:lstrip=2)',
    `refs/heads/${namespace}/`,
  ]);
  return out
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .sort();
};

export const deleteBranch = async (
  git: Git,
  remote: string,
  branch: string,
): Promise<void> => {
  try {
    await git.ok(['push', '--quiet', remote, '--delete', branch]);
  } catch (e) {
    if (e instanceof GitError) throw new BranchWriteError(branch, e.message);
    throw e;
  }
};

const deleteLocalBranch = async (git: Git, branch: string): Promise<void> => {
  try {
    await git.ok(['branch', '--quiet', '-D', branch]);
  } catch (e) {
    if (e instanceof GitError) throw new BranchWriteError(branch, e.message);
    throw e;
  }
};

/**
 * List (and unless dry-run, delete) materialized branches.
 * The first deletion failure aborts the run.
 */
export const reap = async (opts: ReapOptions): Promise<ReapResult> => {
  const { git, remote, sink } = opts;
  const namespace = opts.namespace ?? DEFAULT_NAMESPACE;
  const deleted: string[] = [];

  const remoteBranches = await listMaterialized(git, remote, namespace);
  sink?.({ type: 'listed', scope: 'remote', branches: remoteBranches });
  for (const branch of remoteBranches) {
    if (opts.dryRun) {
      sink?.({ type: 'would-delete', scope: 'remote', branch });
      continue;
    }
    await deleteBranch(git, remote, branch);
    deleted.push(branch);
    sink?.({ type: 'deleted', scope: 'remote', branch });
  }

  let localBranches: string[] = [];
  if (opts.local) {
    localBranches = await listLocalMaterialized(git, namespace);
    sink?.({ type: 'listed', scope: 'local', branches: localBranches });
    for (const branch of localBranches) {
      if (opts.dryRun) {
        sink?.({ type: 'would-delete', scope: 'local', branch });
        continue;
      }
      await deleteLocalBranch(git, branch);
      sink?.({ type: 'deleted', scope: 'local', branch });
    }
  }

  return { remote: remoteBranches, local: localBranches, deleted };
};
