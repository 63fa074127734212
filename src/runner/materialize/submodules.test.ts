import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { Git } from '@/runner/git';
import { fakeRunner } from '@/test/fake-runner';
import { makeTempDir, rmDirWithRetries, writeUtf8 } from '@/test';

import {
  applySubmoduleRewrite,
  isRelativeUrl,
  nestedTargetName,
  rewriteGitmodulesText,
  rewriteSubmodules,
} from './submodules';

const BASE = 'https://github.com/myyoda/principles-examples';

const manifest = [
  '[submodule "raw-data"]',
  '\tpath = raw-data',
  '\turl = ../raw-data.git',
  '[submodule "upstream"]',
  '\tpath = upstream',
  '\turl = https://example.test/upstream.git',
  '',
].join('\n');

const ctx = {
  documentId: 'stamped-awk-evolution',
  runId: 'scenario-4',
  baseUrl: BASE,
  targets: ['raw-data-work', 'processed'],
};

describe('isRelativeUrl', () => {
  it('accepts ./ and ../ only', () => {
    expect(isRelativeUrl('./x')).toBe(true);
    expect(isRelativeUrl('../x.git')).toBe(true);
    expect(isRelativeUrl('/abs/x')).toBe(false);
    expect(isRelativeUrl('https://h/x')).toBe(false);
    expect(isRelativeUrl('git@h:x.git')).toBe(false);
  });
});

describe('nestedTargetName', () => {
  it('uses an exact target match', () => {
    expect(nestedTargetName('../raw-data.git', ['raw-data', 'raw-data-work'])).toBe('raw-data');
  });
  it('uses the single target extending the stem', () => {
    expect(nestedTargetName('../raw-data.git', ['raw-data-work'])).toBe('raw-data-work');
  });
  it('falls back to the stem', () => {
    expect(nestedTargetName('./lib/', [])).toBe('lib');
    expect(nestedTargetName('../raw-data.git', ['raw-data-a', 'raw-data-b'])).toBe('raw-data');
  });
});

describe('rewriteGitmodulesText', () => {
  it('rewrites relative URLs to branch-scoped absolute URLs', () => {
    const out = rewriteGitmodulesText(manifest, ctx);
    const to = `${BASE}/examples/stamped-awk-evolution/scenario-4/raw-data-work`;
    expect(out.changed).toBe(true);
    expect(out.rewritten).toEqual([{ submodule: 'raw-data', from: '../raw-data.git', to }]);
    expect(out.text.split('\n')[2]).toBe(`\turl = ${to}`);
    expect(out.text.split('\n')[5]).toBe('\turl = https://example.test/upstream.git');
  });

  it('uses the bare URL stem when no targets are given', () => {
    const out = rewriteGitmodulesText(manifest, { ...ctx, targets: undefined });
    expect(out.rewritten[0]?.to).toBe(`${BASE}/examples/stamped-awk-evolution/scenario-4/raw-data`);
  });

  it('is idempotent', () => {
    const once = rewriteGitmodulesText(manifest, ctx).text;
    const twice = rewriteGitmodulesText(once, ctx);
    expect(twice.changed).toBe(false);
    expect(twice.text).toBe(once);
  });

  it('ignores url keys outside submodule sections', () => {
    const text = '[remote "origin"]\n\turl = ../elsewhere.git\n';
    expect(rewriteGitmodulesText(text, ctx)).toEqual({ text, changed: false, rewritten: [] });
  });

  it('drops a trailing slash from the base and honors the namespace', () => {
    const out = rewriteGitmodulesText(manifest, {
      ...ctx,
      baseUrl: `${BASE}/`,
      namespace: 'docs',
    });
    expect(out.rewritten[0]?.to).toBe(`${BASE}/docs/stamped-awk-evolution/scenario-4/raw-data-work`);
  });
});

describe('rewriteSubmodules (files)', () => {
  let dir = '';
  beforeEach(async () => {
    dir = await makeTempDir('submodules');
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('is a no-op without a manifest', async () => {
    const baseUrl = vi.fn(() => Promise.resolve(BASE));
    expect(await rewriteSubmodules(dir, { ...ctx, baseUrl })).toEqual([]);
    expect(baseUrl).not.toHaveBeenCalled();
  });

  it('does not resolve the base URL when nothing is relative', async () => {
    await writeUtf8(path.join(dir, '.gitmodules'), '[submodule "u"]\n\turl = https://h/u.git\n');
    const baseUrl = vi.fn(() => Promise.resolve(BASE));
    expect(await rewriteSubmodules(dir, { ...ctx, baseUrl })).toEqual([]);
    expect(baseUrl).not.toHaveBeenCalled();
  });

  it('writes the rewritten manifest in place', async () => {
    await writeUtf8(path.join(dir, '.gitmodules'), manifest);
    const baseUrl = vi.fn(() => Promise.resolve(BASE));
    const out = await rewriteSubmodules(dir, { ...ctx, baseUrl });
    expect(out).toHaveLength(1);
    expect(baseUrl).toHaveBeenCalledTimes(1);
    const text = await readFile(path.join(dir, '.gitmodules'), 'utf8');
    expect(text).toContain(`url = ${BASE}/examples/stamped-awk-evolution/scenario-4/raw-data-work\n`);
  });

  it('amends the tip keeping its committer when the manifest is tracked', async () => {
    await writeUtf8(path.join(dir, '.gitmodules'), manifest);
    const { run, calls } = fakeRunner(({ args }) =>
      args[0] === 'log' ? { stdout: 'Alice\nalice@example.test\n' } : undefined,
    );
    await applySubmoduleRewrite(new Git(dir, { runner: run }), ctx);
    expect(calls.map((c) => c.args[0])).toEqual(['ls-files', 'log', 'commit']);
    const commit = calls[2];
    expect(commit?.args).toEqual([
      'commit',
      '--amend',
      '--no-edit',
      '--no-verify',
      '--quiet',
      '--only',
      '--',
      '.gitmodules',
    ]);
    expect(commit?.opts.env?.GIT_COMMITTER_NAME).toBe('Alice');
    expect(commit?.opts.env?.GIT_COMMITTER_EMAIL).toBe('alice@example.test');
  });

  it('leaves history alone when the manifest is untracked', async () => {
    await writeUtf8(path.join(dir, '.gitmodules'), manifest);
    const { run, calls } = fakeRunner(() => ({ code: 1 }));
    const out = await applySubmoduleRewrite(new Git(dir, { runner: run }), ctx);
    expect(out).toHaveLength(1);
    expect(calls.map((c) => c.args[0])).toEqual(['ls-files']);
  });
});
