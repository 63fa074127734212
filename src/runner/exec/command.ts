/* src/runner/exec/command.ts
 * Run one external command: capture stdout/stderr, enforce a timeout.
 */
import { spawn } from 'node:child_process';

import treeKill from 'tree-kill';

import { toError } from '@/runner/errors';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_EXEC } from '@/runner/util/debug-scopes';

export type CommandResult = {
  /** Exit code; -1 when the process was terminated by a signal. */
  code: number;
  stdout: string;
  stderr: string;
  /** True when the timeout fired and the process tree was killed. */
  timedOut: boolean;
};

export type CommandOptions = {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  /** Milliseconds before the process tree is terminated. 0/undefined = none. */
  timeoutMs?: number;
  /** Written to stdin, which is then closed. */
  input?: string;
};

/** Narrow capability used by the executor and the git wrapper. */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  opts: CommandOptions,
) => Promise<CommandResult>;

/** Milliseconds between SIGTERM and SIGKILL on timeout. */
const KILL_GRACE_MS = 2000;

const killTree = (pid: number, signal: string): void => {
  treeKill(pid, signal, (e) => {
    if (e) debugFallback(DBG_SCOPE_EXEC, `kill ${pid.toString()}: ${e.message}`);
  });
};

/** Spawn-based runner. Rejects only when the process cannot be started. */
export const runCommand: CommandRunner = (file, args, opts) =>
  new Promise<CommandResult>((resolveP, rejectP) => {
    const child = spawn(file, [...args], {
      cwd: opts.cwd,
      env: opts.env ?? process.env,
      windowsHide: true,
    });

    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    child.stdout.on('data', (d: Buffer) => {
      stdout += d.toString('utf8');
    });
    child.stderr.on('data', (d: Buffer) => {
      stderr += d.toString('utf8');
    });

    const timeoutMs = opts.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        if (typeof child.pid !== 'number') return;
        const pid = child.pid;
        killTree(pid, 'SIGTERM');
        killTimer = setTimeout(() => killTree(pid, 'SIGKILL'), KILL_GRACE_MS);
      }, timeoutMs);
    }

    const clear = () => {
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
    };

    child.on('error', (e) => {
      clear();
      rejectP(toError(e));
    });
    child.on('close', (code) => {
      clear();
      resolveP({ code: code ?? -1, stdout, stderr, timedOut });
    });

    // EPIPE when the child exits before reading stdin.
    child.stdin.on('error', (e) => {
      debugFallback(DBG_SCOPE_EXEC, `stdin: ${e.message}`);
    });
    if (typeof opts.input === 'string') child.stdin.end(opts.input, 'utf8');
    else child.stdin.end();
  });
