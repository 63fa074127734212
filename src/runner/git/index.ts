/* src/runner/git/index.ts
 * Thin git wrapper bound to one repository directory.
 */
import { type CommandResult, type CommandRunner, runCommand } from '@/runner/exec/command';
import { GitError } from '@/runner/errors';
import { debugTrace } from '@/runner/util/debug';
import { DBG_SCOPE_GIT } from '@/runner/util/debug-scopes';

/** Default timeout for git operations (network included). */
export const DEFAULT_GIT_TIMEOUT_MS = 120_000;

export type GitOptions = {
  runner?: CommandRunner;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
};

export type GitRunOptions = {
  input?: string;
  env?: NodeJS.ProcessEnv;
};

export class Git {
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;
  private readonly env: NodeJS.ProcessEnv | undefined;

  constructor(
    readonly cwd: string,
    opts: GitOptions = {},
  ) {
    this.runner = opts.runner ?? runCommand;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_GIT_TIMEOUT_MS;
    this.env = opts.env;
  }

  /** Same runner/timeout, different repository. */
  at(cwd: string): Git {
    return new Git(cwd, {
      runner: this.runner,
      timeoutMs: this.timeoutMs,
      env: this.env,
    });
  }

  /** Run git; never throws on a non-zero exit. */
  async run(
    args: readonly string[],
    opts: GitRunOptions = {},
  ): Promise<CommandResult> {
    debugTrace(DBG_SCOPE_GIT, `(${this.cwd}) git ${args.join(' ')}`);
    const base = this.env ?? process.env;
    return this.runner('git', args, {
      cwd: this.cwd,
      env: opts.env ? { ...base, ...opts.env } : base,
      timeoutMs: this.timeoutMs,
      input: opts.input,
    });
  }

  /** Run git; throw GitError on a non-zero exit. Returns trimmed stdout. */
  async ok(
    args: readonly string[],
    opts: GitRunOptions = {},
  ): Promise<string> {
    const res = await this.run(args, opts);
    if (res.code !== 0 || res.timedOut)
      throw new GitError(
        args,
        res.code,
        res.timedOut ? `timed out\n${res.stderr}` : res.stderr,
      );
    return res.stdout.trim();
  }

  /** Commit id a ref points at, or undefined when it does not resolve. */
  async resolveCommit(ref: string): Promise<string | undefined> {
    const res = await this.run([
      'rev-parse',
      '--verify',
      '--quiet',
      `${ref}^{commit}`,
    ]);
    const sha = res.stdout.trim();
    return res.code === 0 && sha.length > 0 ? sha : undefined;
  }

  /** Top level of the work tree containing cwd, or undefined outside one. */
  async topLevel(): Promise<string | undefined> {
    const res = await this.run(['rev-parse', '--show-toplevel']);
    const top = res.stdout.trim();
    return res.code === 0 && top.length > 0 ? top : undefined;
  }
}
