/* src/runner/materialize/target.ts
 * Where a materialized branch is written: the host repository (branch mode)
 * or a per-key checkout directory (worktree mode).
 */
import { existsSync } from 'node:fs';
import path from 'node:path';

import { ensureDir } from 'fs-extra';

import { BranchWriteError, GitError } from '@/runner/errors';
import type { Git } from '@/runner/git';

import { branchRef, worktreePath } from './branch';
import type { CacheEntry, CacheStore } from './cache';
import type { MaterializationKey, MaterializeMode, Snapshot } from './types';

/** Operations the materializer needs from the repository holding a branch. */
export interface ArtifactTarget {
  readonly branch: string;
  /** Repository directory the branch lives in. */
  readonly location: string;
  lookup(): Promise<CacheEntry | undefined>;
  /** Point the branch at the snapshot's HEAD (history as produced). */
  write(snapshot: Snapshot): Promise<string>;
  record(commit: string, fingerprint: string): Promise<void>;
  /** True when `remote` already has the branch at `tip`. */
  isPublished(remote: string, tip: string): Promise<boolean>;
  publish(remote: string): Promise<void>;
}

export type OpenTarget = (
  key: MaterializationKey,
  branch: string,
) => Promise<ArtifactTarget>;

const asWriteError = (branch: string, e: unknown): unknown =>
  e instanceof GitError ? new BranchWriteError(branch, e.message) : e;

/** scheme://… or scp-like user@host:path */
const isRemoteUrl = (url: string): boolean =>
  /^[a-z][a-z0-9+.-]*:\/\//i.test(url) || /^[^/\\]+:/.test(url);

export class GitArtifactTarget implements ArtifactTarget {
  private readonly checkout: boolean;

  /**
   * @param host - Repository whose remotes are used when `git` is a standalone
   * checkout (worktree mode); omit in branch mode, where `git` is the host.
   */
  constructor(
    private readonly git: Git,
    readonly branch: string,
    private readonly cache: CacheStore,
    private readonly host?: Git,
  ) {
    this.checkout = host !== undefined;
  }

  /** Push destination for `remote`: the host's URL for it in checkout mode. */
  private async destination(remote: string): Promise<string> {
    if (!this.host) return remote;
    const url = await this.host.ok(['remote', 'get-url', remote]);
    return isRemoteUrl(url) || path.isAbsolute(url)
      ? url
      : path.resolve(this.host.cwd, url);
  }

  get location(): string {
    return this.git.cwd;
  }

  async lookup(): Promise<CacheEntry | undefined> {
    // A checkout directory without its own .git would resolve refs of an
    // enclosing repository.
    const probe = this.checkout
      ? path.join(this.git.cwd, '.git')
      : this.git.cwd;
    if (!existsSync(probe)) return undefined;
    return this.cache.lookup(this.git, branchRef(this.branch));
  }

  async write(snapshot: Snapshot): Promise<string> {
    const ref = branchRef(this.branch);
    try {
      if (this.checkout && !existsSync(path.join(this.git.cwd, '.git'))) {
        await ensureDir(this.git.cwd);
        await this.git.ok(['init', '--quiet']);
      }
      // One forced ref update; objects land before the ref moves.
      await this.git.ok([
        'fetch',
        '--quiet',
        '--no-tags',
        ...(this.checkout ? ['--update-head-ok'] : []),
        snapshot.repoPath,
        `+HEAD:${ref}`,
      ]);
      if (this.checkout) {
        await this.git.ok(['symbolic-ref', 'HEAD', ref]);
        await this.git.ok(['reset', '--hard', '--quiet']);
        await this.git.ok(['clean', '-ffdxq']);
      }
    } catch (e) {
      throw asWriteError(this.branch, e);
    }
    const tip = await this.git.resolveCommit(ref);
    if (!tip) throw new BranchWriteError(this.branch, `${ref} did not resolve`);
    return tip;
  }

  async record(commit: string, fingerprint: string): Promise<void> {
    await this.cache.record(this.git, commit, fingerprint, this.branch);
  }

  async isPublished(remote: string, tip: string): Promise<boolean> {
    const ref = branchRef(this.branch);
    try {
      const out = await this.git.ok(['ls-remote', await this.destination(remote), ref]);
      return out.split('\n').some((line) => line.split('\t')[0] === tip);
    } catch (e) {
      throw asWriteError(this.branch, e);
    }
  }

  async publish(remote: string): Promise<void> {
    const ref = branchRef(this.branch);
    const notes = this.cache.notesRef;
    try {
      const dest = await this.destination(remote);
      await this.git.ok(['push', '--quiet', '--force', dest, `${ref}:${ref}`]);
      // Last writer wins on the notes ref; concurrent runs need external locking.
      await this.git.ok(['push', '--quiet', '--force', dest, `${notes}:${notes}`]);
    } catch (e) {
      throw asWriteError(this.branch, e);
    }
  }
}

/** Target factory for the given mode. `git` is bound to the host repository. */
export const gitTargets = (
  git: Git,
  cache: CacheStore,
  mode: MaterializeMode,
  namespace?: string,
): OpenTarget => {
  return (key, branch) =>
    Promise.resolve(
      mode.kind === 'worktree'
        ? new GitArtifactTarget(
            git.at(worktreePath(mode.root, key, namespace)),
            branch,
            cache,
            git,
          )
        : new GitArtifactTarget(git, branch, cache),
    );
};
