/* src/runner/materialize/cache.ts
 * Fingerprint records kept in git notes on the branch tip.
 * Notes live outside the commit graph, so branch history stays exactly what
 * the snippet produced.
 */
import { CacheRecordCorruptError } from '@/runner/errors';
import type { Git } from '@/runner/git';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CACHE_LOOKUP } from '@/runner/util/debug-scopes';

export const DEFAULT_NOTES_REF = 'refs/notes/docbranch';

export const FINGERPRINT_LABEL = 'Fingerprint';

/** Identity for notes commits; bookkeeping should not need a configured user. */
const NOTES_IDENTITY: NodeJS.ProcessEnv = {
  GIT_AUTHOR_NAME: 'docbranch',
  GIT_AUTHOR_EMAIL: 'docbranch@localhost',
  GIT_COMMITTER_NAME: 'docbranch',
  GIT_COMMITTER_EMAIL: 'docbranch@localhost',
};

export const formatRecord = (fingerprint: string, branch: string): string =>
  `${FINGERPRINT_LABEL}: ${fingerprint}\nBranch: ${branch}\n`;

/** Extract the fingerprint from a note body. */
export const parseRecord = (text: string): string => {
  const m = /^Fingerprint:[ \t]*([0-9a-f]{64})[ \t]*$/m.exec(text);
  if (!m?.[1])
    throw new CacheRecordCorruptError(
      `no "${FINGERPRINT_LABEL}:" line in cache record`,
    );
  return m[1];
};

export type CacheEntry = {
  /** Commit the ref currently points at. */
  tip: string;
  /** Recorded fingerprint, when a readable record is attached to tip. */
  fingerprint?: string;
};

export class CacheStore {
  constructor(readonly notesRef = DEFAULT_NOTES_REF) {}

  /**
   * Read the record attached to the current tip of `ref`.
   * Returns undefined when the ref does not exist; a tip without a (readable)
   * record yields an entry with no fingerprint, which callers treat as a miss.
   */
  async lookup(git: Git, ref: string): Promise<CacheEntry | undefined> {
    const tip = await git.resolveCommit(ref);
    if (!tip) return undefined;
    const res = await git.run(['notes', '--ref', this.notesRef, 'show', tip]);
    if (res.code !== 0) return { tip };
    try {
      return { tip, fingerprint: parseRecord(res.stdout) };
    } catch (e) {
      if (!(e instanceof CacheRecordCorruptError)) throw e;
      debugFallback(DBG_SCOPE_CACHE_LOOKUP, `${ref} @ ${tip}: ${e.message}`);
      return { tip };
    }
  }

  /** Attach `fingerprint` to `commit`, replacing any prior record. */
  async record(
    git: Git,
    commit: string,
    fingerprint: string,
    branch: string,
  ): Promise<void> {
    await git.ok(
      ['notes', '--ref', this.notesRef, 'add', '-f', '-F', '-', commit],
      { input: formatRecord(fingerprint, branch), env: NOTES_IDENTITY },
    );
  }
}
