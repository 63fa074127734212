/* src/runner/materialize/types.ts
 * Shared types for snippets, materialization keys and run events.
 */

/** A runnable snippet extracted from one Markdown document. */
export type Snippet = {
  /** Document id (file stem). */
  documentId: string;
  /** `# pragma: testrun <id>` */
  runId: string;
  body: string;
  /** `# pragma: materialize <name>` in declaration order. */
  targets: readonly string[];
  /** Expected exit code (default 0). */
  exitCode: number;
  /** Execution timeout in seconds (default 60). */
  timeout: number;
  /** External tools that must be on PATH (default ["sh"]). */
  requires: readonly string[];
};

/** Identifies one materialized artifact. */
export type MaterializationKey = {
  documentId: string;
  runId: string;
  target: string;
};

export type MaterializeMode =
  | { kind: 'branch' }
  | { kind: 'worktree'; root: string };

/** Tree produced by one snippet execution (valid only inside withSnapshot). */
export type Snapshot = {
  /** Temp root (removed when the scope ends). */
  root: string;
  /** Repository the snippet left behind for the target. */
  repoPath: string;
  /** Combined stdout/stderr of the snippet. */
  output: string;
};

export type KeyStatus = 'cache-hit' | 'regenerated' | 'failed' | 'skipped';

export type KeyResult = {
  key: MaterializationKey;
  branch: string;
  status: KeyStatus;
  /** New tip (regenerated) or current tip (cache hit). */
  commit?: string;
  fingerprint: string;
  error?: Error;
  /** Reason for a skip (missing tools). */
  reason?: string;
};

export type MaterializeEvent =
  | { type: 'cache-hit'; key: MaterializationKey; branch: string; commit: string }
  | { type: 'regenerating'; key: MaterializationKey; branch: string; reason: string }
  | { type: 'done'; key: MaterializationKey; branch: string; commit: string }
  | { type: 'failed'; key: MaterializationKey; branch: string; error: Error }
  | { type: 'skipped'; key: MaterializationKey; branch: string; reason: string }
  | { type: 'pushed'; key: MaterializationKey; branch: string; remote: string };

export type MaterializeSink = (event: MaterializeEvent) => void;

export type MaterializeSummary = {
  results: KeyResult[];
  /** True when any key failed. */
  failed: boolean;
};
