/* src/runner/materialize/service.ts
 * Materializer: per (document, run, target) decide cache hit vs regenerate,
 * then write the produced history to a branch (or worktree) and record the
 * fingerprint out of band.
 */
import { missingTools } from '@/runner/exec/which';
import { RemoteNotFoundError, toError } from '@/runner/errors';
import { Git } from '@/runner/git';
import { fingerprint } from '@/runner/util/hash';

import { branchId, DEFAULT_NAMESPACE } from './branch';
import type { RemoteIdentity } from './remote';
import { applySubmoduleRewrite } from './submodules';
import type { OpenTarget } from './target';
import type {
  KeyResult,
  MaterializationKey,
  MaterializeEvent,
  MaterializeSink,
  MaterializeSummary,
  Snapshot,
  Snippet,
} from './types';

/** Scoped snapshot source (SnapshotExecutor in production). */
export interface SnapshotSource {
  withSnapshot<T>(
    snippet: Snippet,
    target: string,
    use: (snapshot: Snapshot) => Promise<T>,
  ): Promise<T>;
}

/** Prepare a snapshot for publishing (submodule URL rewrite). */
export type SnapshotRewriter = (
  snapshot: Snapshot,
  snippet: Snippet,
  remote: RemoteIdentity,
  namespace: string,
) => Promise<void>;

export const rewriteSnapshotSubmodules: SnapshotRewriter = async (
  snapshot,
  snippet,
  remote,
  namespace,
) => {
  await applySubmoduleRewrite(new Git(snapshot.repoPath), {
    documentId: snippet.documentId,
    runId: snippet.runId,
    targets: snippet.targets,
    namespace,
    baseUrl: () => remote.url(),
  });
};

export type MaterializerOptions = {
  executor: SnapshotSource;
  openTarget: OpenTarget;
  remote: RemoteIdentity;
  rewrite?: SnapshotRewriter;
  sink?: MaterializeSink;
  namespace?: string;
  /**
   * Push branch and notes to `remote` after each regeneration, and on a cache
   * hit whose tip the remote does not have yet.
   */
  push?: boolean;
  /** Tools missing from PATH (injectable for tests). */
  checkTools?: (requires: readonly string[]) => Promise<string[]>;
};

const keyOf = (s: Snippet, target: string): MaterializationKey => ({
  documentId: s.documentId,
  runId: s.runId,
  target,
});

export class Materializer {
  private readonly rewrite: SnapshotRewriter;
  private readonly namespace: string;
  private readonly checkTools: (r: readonly string[]) => Promise<string[]>;

  constructor(private readonly opts: MaterializerOptions) {
    this.rewrite = opts.rewrite ?? rewriteSnapshotSubmodules;
    this.namespace = opts.namespace ?? DEFAULT_NAMESPACE;
    this.checkTools = opts.checkTools ?? ((r) => missingTools(r));
  }

  private emit(event: MaterializeEvent): void {
    this.opts.sink?.(event);
  }

  /**
   * Materialize one target of one snippet.
   * Never throws for per-key failures (reported as status "failed");
   * RemoteNotFoundError propagates because no key can be published safely.
   */
  async materializeKey(snippet: Snippet, target: string): Promise<KeyResult> {
    const key = keyOf(snippet, target);
    const branch = branchId(key.documentId, key.runId, target, this.namespace);
    const fp = fingerprint(snippet.body);

    try {
      const artifact = await this.opts.openTarget(key, branch);
      const cached = await artifact.lookup();
      if (cached?.fingerprint === fp) {
        this.emit({ type: 'cache-hit', key, branch, commit: cached.tip });
        // A previous push may have failed after the record was written.
        if (
          this.opts.push &&
          !(await artifact.isPublished(this.opts.remote.name, cached.tip))
        ) {
          await artifact.publish(this.opts.remote.name);
          this.emit({ type: 'pushed', key, branch, remote: this.opts.remote.name });
        }
        return { key, branch, status: 'cache-hit', commit: cached.tip, fingerprint: fp };
      }

      const reason = !cached
        ? 'no existing branch'
        : cached.fingerprint
          ? 'snippet changed'
          : 'no cache record on tip';
      this.emit({ type: 'regenerating', key, branch, reason });

      const commit = await this.opts.executor.withSnapshot(
        snippet,
        target,
        async (snapshot) => {
          await this.rewrite(snapshot, snippet, this.opts.remote, this.namespace);
          return artifact.write(snapshot);
        },
      );
      await artifact.record(commit, fp);
      if (this.opts.push) {
        await artifact.publish(this.opts.remote.name);
        this.emit({ type: 'pushed', key, branch, remote: this.opts.remote.name });
      }
      this.emit({ type: 'done', key, branch, commit });
      return { key, branch, status: 'regenerated', commit, fingerprint: fp };
    } catch (e) {
      if (e instanceof RemoteNotFoundError) throw e;
      const error = toError(e);
      this.emit({ type: 'failed', key, branch, error });
      return { key, branch, status: 'failed', fingerprint: fp, error };
    }
  }

  /** Every target of every snippet, sequentially; failures do not stop the batch. */
  async materializeAll(snippets: readonly Snippet[]): Promise<MaterializeSummary> {
    const results: KeyResult[] = [];
    for (const snippet of snippets) {
      if (snippet.targets.length === 0) continue;
      const missing = await this.checkTools(snippet.requires);
      for (const target of snippet.targets) {
        if (missing.length > 0) {
          const key = keyOf(snippet, target);
          const branch = branchId(key.documentId, key.runId, target, this.namespace);
          const reason = `missing: ${missing.join(', ')}`;
          this.emit({ type: 'skipped', key, branch, reason });
          results.push({
            key,
            branch,
            status: 'skipped',
            fingerprint: fingerprint(snippet.body),
            reason,
          });
          continue;
        }
        results.push(await this.materializeKey(snippet, target));
      }
    }
    return { results, failed: results.some((r) => r.status === 'failed') };
  }
}
