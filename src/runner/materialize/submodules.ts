/* src/runner/materialize/submodules.ts
 * Rewrite relative submodule URLs in a snapshot's .gitmodules to absolute,
 * branch-scoped URLs so the materialized branch is clonable on its own.
 */
import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Git } from '@/runner/git';

import { branchId, DEFAULT_NAMESPACE } from './branch';

export type SubmoduleRewriteContext = {
  documentId: string;
  runId: string;
  baseUrl: string;
  /** Targets declared by the snippet; used to resolve nested target names. */
  targets?: readonly string[];
  namespace?: string;
};

export type RewrittenEntry = {
  submodule: string;
  from: string;
  to: string;
};

export const isRelativeUrl = (url: string): boolean =>
  url.startsWith('./') || url.startsWith('../');

/**
 * Name of the materialized target a relative URL refers to.
 * `../raw-data.git` resolves to "raw-data" when that is a target, else to the
 * single target named "raw-data-…", else to "raw-data".
 */
export const nestedTargetName = (
  url: string,
  targets: readonly string[] = [],
): string => {
  const last = url.replace(/\/+$/, '').split('/').pop() ?? '';
  const stem = last.endsWith('.git') ? last.slice(0, -'.git'.length) : last;
  if (targets.includes(stem)) return stem;
  const prefixed = targets.filter((t) => t.startsWith(`${stem}-`));
  return prefixed.length === 1 && prefixed[0] ? prefixed[0] : stem;
};

const SECTION_RE = /^\s*\[\s*submodule\s+"([^"]*)"\s*\]\s*$/;
const OTHER_SECTION_RE = /^\s*\[/;
const URL_RE = /^(\s*url\s*=\s*)(.*?)(\s*)$/;

/** Rewrite .gitmodules text; every line other than rewritten URLs is kept. */
export const rewriteGitmodulesText = (
  text: string,
  ctx: SubmoduleRewriteContext,
): { text: string; changed: boolean; rewritten: RewrittenEntry[] } => {
  const base = ctx.baseUrl.replace(/\/+$/, '');
  const namespace = ctx.namespace ?? DEFAULT_NAMESPACE;
  const rewritten: RewrittenEntry[] = [];
  let section: string | null = null;

  const lines = text.split('\n').map((line) => {
    const sec = SECTION_RE.exec(line);
    if (sec) {
      section = sec[1] ?? '';
      return line;
    }
    if (OTHER_SECTION_RE.test(line)) {
      section = null;
      return line;
    }
    if (section === null) return line;
    const m = URL_RE.exec(line);
    if (!m) return line;
    const [, lead = '', value = '', trail = ''] = m;
    if (!isRelativeUrl(value)) return line;
    const nested = nestedTargetName(value, ctx.targets);
    const to = `${base}/${branchId(ctx.documentId, ctx.runId, nested, namespace)}`;
    rewritten.push({ submodule: section, from: value, to });
    return `${lead}${to}${trail}`;
  });

  return { text: lines.join('\n'), changed: rewritten.length > 0, rewritten };
};

/**
 * Rewrite `<snapshotPath>/.gitmodules` in place. No manifest = no-op.
 * `baseUrl` is only awaited when a relative URL is present.
 * Without `targets`, nested names are the bare URL stem (`../raw-data.git`
 * becomes `.../raw-data`); pass the snippet's targets to resolve
 * `raw-data-work`.
 */
export const rewriteSubmodules = async (
  snapshotPath: string,
  ctx: Omit<SubmoduleRewriteContext, 'baseUrl'> & {
    baseUrl: string | (() => Promise<string>);
  },
): Promise<RewrittenEntry[]> => {
  const manifest = path.join(snapshotPath, '.gitmodules');
  if (!existsSync(manifest)) return [];
  const before = await readFile(manifest, 'utf8');
  // Cheap probe so the remote is only resolved when it matters.
  const probe = rewriteGitmodulesText(before, { ...ctx, baseUrl: '' });
  if (!probe.changed) return [];
  const baseUrl =
    typeof ctx.baseUrl === 'string' ? ctx.baseUrl : await ctx.baseUrl();
  const out = rewriteGitmodulesText(before, { ...ctx, baseUrl });
  await writeFile(manifest, out.text, 'utf8');
  return out.rewritten;
};

/**
 * Rewrite the manifest and fold the change into the snippet's tip commit
 * (amend, same message and committer), so no commit is added.
 */
export const applySubmoduleRewrite = async (
  git: Git,
  ctx: Parameters<typeof rewriteSubmodules>[1],
): Promise<RewrittenEntry[]> => {
  const rewritten = await rewriteSubmodules(git.cwd, ctx);
  if (rewritten.length === 0) return rewritten;
  const tracked = await git.run([
    'ls-files',
    '--error-unmatch',
    '--',
    '.gitmodules',
  ]);
  if (tracked.code !== 0) return rewritten;
  const who = (await git.ok(['log', '-1', '--format=%cn%n%ce'])).split('\n');
  // --only: whatever else the snippet staged stays out of the tip.
  await git.ok(
    [
      'commit',
      '--amend',
      '--no-edit',
      '--no-verify',
      '--quiet',
      '--only',
      '--',
      '.gitmodules',
    ],
    {
      env: {
        GIT_COMMITTER_NAME: who[0] ?? 'docbranch',
        GIT_COMMITTER_EMAIL: who[1] ?? 'docbranch@localhost',
      },
    },
  );
  return rewritten;
};
