/* src/cli/config/load.ts
 * Locate, parse and validate docbranch.config.* and merge built-in defaults.
 */
import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import { ZodError } from 'zod';

import { type CliDefaults, configSchema } from '@/cli/config/schema';
import { parseConfigText } from '@/common/config/parse';
import { DEFAULT_NOTES_REF } from '@/runner/materialize/cache';
import { DEFAULT_NAMESPACE } from '@/runner/materialize/branch';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

export const CONFIG_FILES = [
  'docbranch.config.yml',
  'docbranch.config.yaml',
  'docbranch.config.json',
];

export type LoadedConfig = {
  /** Directory holding the config file (or the search start when none). */
  root: string;
  /** Absolute path of the config file, when one was found. */
  path?: string;
  contentDir: string;
  namespace: string;
  notesRef: string;
  remote: string;
  gitTimeoutMs: number;
  snippetTimeout: number;
  cliDefaults: NonNullable<CliDefaults>;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

/** Nearest docbranch.config.* walking up from cwd. */
export const findConfigPathSync = (cwd: string): string | null => {
  let cur = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILES) {
      const p = path.join(cur, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};

/**
 * Load the effective configuration for `cwd`.
 * Relative `contentDir` resolves against the config file's directory.
 *
 * @throws Error listing every invalid key when the file fails validation.
 */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  const root = cfgPath ? path.dirname(cfgPath) : path.resolve(cwd);
  let raw: unknown = {};
  if (cfgPath) {
    raw = parseConfigText(cfgPath, readFileSync(cfgPath, 'utf8'));
  } else {
    debugFallback(DBG_SCOPE_CLI_CONFIG_LOAD, `no config under ${root}; using defaults`);
  }
  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const rel = (cfgPath ?? root).replace(/\\/g, '/');
    throw new Error(
      `docbranch: invalid config in ${rel}\n${formatZodError(parsed.error)}`,
    );
  }
  const c = parsed.data;
  return {
    root,
    ...(cfgPath ? { path: cfgPath } : {}),
    contentDir: path.resolve(root, c.contentDir ?? 'content/examples'),
    namespace: c.namespace ?? DEFAULT_NAMESPACE,
    notesRef: c.notesRef ?? DEFAULT_NOTES_REF,
    remote: c.remote ?? 'origin',
    gitTimeoutMs: (c.gitTimeout ?? 120) * 1000,
    snippetTimeout: c.snippetTimeout ?? 60,
    cliDefaults: c.cliDefaults ?? {},
  };
};
