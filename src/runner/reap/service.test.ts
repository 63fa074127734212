import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BranchWriteError } from '@/runner/errors';
import { Git } from '@/runner/git';
import { fakeRunner } from '@/test/fake-runner';
import { git, hasGitAndSh, initRepo, makeTempDir, rmDirWithRetries } from '@/test';

import { type ReapEvent, listMaterialized, reap } from './service';

const A = 'examples/test-example/demo-1/myrepo';
const B = 'examples/test-example/demo-2/other';

describe('listMaterialized', () => {
  it('parses ls-remote output under the namespace', async () => {
    const { run, calls } = fakeRunner(() => ({
      stdout: [
        `aaaa\trefs/heads/${B}`,
        `bbbb\trefs/heads/${A}`,
        'cccc\trefs/heads/examples-not/x',
        '',
      ].join('\n'),
    }));
    expect(await listMaterialized(new Git('/r', { runner: run }), 'origin')).toEqual([A, B]);
    expect(calls[0]?.args).toEqual(['ls-remote', '--heads', 'origin', 'refs/heads/examples/*']);
  });

  it('stops at the first failed deletion', async () => {
    const { run, calls } = fakeRunner(({ args }) =>
      args[0] === 'ls-remote'
        ? { stdout: `a\trefs/heads/${A}\nb\trefs/heads/${B}\n` }
        : { code: 1, stderr: 'remote rejected' },
    );
    await expect(reap({ git: new Git('/r', { runner: run }), remote: 'origin' })).rejects.toThrow(
      BranchWriteError,
    );
    expect(calls).toHaveLength(2);
  });
});

describe.skipIf(!hasGitAndSh())('reap (git)', () => {
  let dir = '';
  let host = '';
  let bare = '';

  beforeEach(async () => {
    dir = await makeTempDir('reap');
    host = path.join(dir, 'host');
    bare = path.join(dir, 'remote.git');
    await initRepo(host);
    git(dir, 'init', '--quiet', '--bare', bare);
    git(host, 'remote', 'add', 'origin', bare);
    for (const b of [A, B, 'feature']) git(host, 'branch', b);
    git(host, 'push', '--quiet', 'origin', 'main', A, B, 'feature');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  const remoteHeads = () =>
    git(host, 'ls-remote', '--heads', 'origin')
      .split('\n')
      .map((l) => l.split('\t')[1])
      .sort();

  it('lists without deleting on a dry run', async () => {
    const events: ReapEvent[] = [];
    const res = await reap({
      git: new Git(host),
      remote: 'origin',
      dryRun: true,
      sink: (e) => events.push(e),
    });
    expect(res).toEqual({ remote: [A, B], local: [], deleted: [] });
    expect(events.filter((e) => e.type === 'would-delete')).toHaveLength(2);
    expect(remoteHeads()).toEqual([
      `refs/heads/${A}`,
      `refs/heads/${B}`,
      'refs/heads/feature',
      'refs/heads/main',
    ]);
  });

  it('deletes every materialized remote branch and nothing else', async () => {
    const res = await reap({ git: new Git(host), remote: 'origin' });
    expect(res.deleted).toEqual([A, B]);
    expect(remoteHeads()).toEqual(['refs/heads/feature', 'refs/heads/main']);
    // Local branches stay unless asked.
    expect(git(host, 'branch', '--list', 'examples/*')).not.toBe('');
  });

  it('also deletes local branches with local', async () => {
    const res = await reap({ git: new Git(host), remote: 'origin', local: true });
    expect(res.local).toEqual([A, B]);
    expect(git(host, 'branch', '--list', 'examples/*')).toBe('');
    expect(git(host, 'branch', '--list', 'feature')).toBe('feature');
  });
});
