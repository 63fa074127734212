/* src/runner/errors.ts
 * Error taxonomy for materialization and reaping.
 */

/** Base class; lets the CLI tell expected failures from crashes. */
export class DocbranchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed snippet annotation. Aborts that snippet only. */
export class LocatorError extends DocbranchError {
  constructor(
    readonly documentId: string,
    message: string,
  ) {
    super(`${documentId}: ${message}`);
  }
}

/** Unexpected exit code, timeout, or no resulting repository. */
export class SnippetExecutionError extends DocbranchError {
  constructor(
    message: string,
    readonly output: string,
    readonly exitCode: number | null = null,
    readonly timedOut = false,
  ) {
    super(message);
  }
}

/** No resolvable remote URL. Fatal to the whole run. */
export class RemoteNotFoundError extends DocbranchError {
  constructor(readonly remote: string) {
    super(
      `could not resolve a URL for remote "${remote}" (set GITHUB_REPOSITORY or configure the remote)`,
    );
  }
}

/** A note exists on the tip but carries no readable fingerprint. */
export class CacheRecordCorruptError extends DocbranchError {}

/** A ref update (local or remote) failed. */
export class BranchWriteError extends DocbranchError {
  constructor(
    readonly branch: string,
    message: string,
  ) {
    super(`${branch}: ${message}`);
  }
}

/** A git invocation exited non-zero. */
export class GitError extends DocbranchError {
  constructor(
    readonly args: readonly string[],
    readonly code: number,
    readonly stderr: string,
  ) {
    const detail = stderr.trim();
    super(
      `git ${args.join(' ')} exited with code ${code.toString()}${detail ? `: ${detail}` : ''}`,
    );
  }
}

/** Normalize an unknown thrown value. */
export const toError = (e: unknown): Error =>
  e instanceof Error ? e : new Error(String(e));
