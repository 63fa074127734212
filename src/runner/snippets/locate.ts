/* src/runner/snippets/locate.ts
 * Find `sh`/`bash` fenced blocks marked `# pragma: testrun` in Markdown docs.
 */
import { readFile } from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { LocatorError, toError } from '@/runner/errors';
import type { Snippet } from '@/runner/materialize/types';

import { type SnippetDefaults, SNIPPET_DEFAULTS, toSnippet } from './annotations';

/** Fenced code block with an sh or bash tag; group 1 is the body. */
export const FENCE_RE = /^```(?:sh|bash)[ \t]*\r?\n([\s\S]*?)^```/gm;

export const TESTRUN_MARKER = '# pragma: testrun';

/** Bodies of every runnable block in a Markdown text. */
export const extractBlocks = (markdown: string): string[] => {
  const out: string[] = [];
  for (const m of markdown.matchAll(FENCE_RE)) {
    const code = m[1] ?? '';
    if (code.includes(TESTRUN_MARKER)) out.push(code);
  }
  return out;
};

export type LocatedSnippet =
  | { ok: true; file: string; snippet: Snippet }
  | { ok: false; file: string; error: LocatorError };

/** Snippets (or annotation errors) of one document, in document order. */
export const snippetsInDocument = async (
  file: string,
  defaults: SnippetDefaults = SNIPPET_DEFAULTS,
): Promise<LocatedSnippet[]> => {
  const documentId = path.basename(file, path.extname(file));
  const text = await readFile(file, 'utf8');
  return extractBlocks(text).map((body): LocatedSnippet => {
    try {
      return { ok: true, file, snippet: toSnippet(documentId, body, undefined, defaults) };
    } catch (e) {
      if (e instanceof LocatorError) return { ok: false, file, error: e };
      throw toError(e);
    }
  });
};

/** All Markdown documents directly under `contentDir`, sorted. */
export const locateSnippets = async (
  contentDir: string,
  defaults: SnippetDefaults = SNIPPET_DEFAULTS,
): Promise<LocatedSnippet[]> => {
  const files = await fg('*.md', { cwd: contentDir, absolute: true, onlyFiles: true });
  const out: LocatedSnippet[] = [];
  for (const file of files.sort()) out.push(...(await snippetsInDocument(file, defaults)));
  return out;
};
