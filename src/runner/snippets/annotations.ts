/* src/runner/snippets/annotations.ts
 * `# pragma: <key> <value>` annotations inside shell snippets.
 */
import { z, ZodError } from 'zod';

import { LocatorError } from '@/runner/errors';
import type { Snippet } from '@/runner/materialize/types';

export const PRAGMA_PREFIX = '# pragma:';

export type Pragmas = {
  /** Last value per key (materialize excluded). */
  values: Record<string, string>;
  /** `materialize` values in declaration order. */
  materialize: string[];
};

/** Extract pragma directives from script text. */
export const parsePragmas = (code: string): Pragmas => {
  const values: Record<string, string> = {};
  const materialize: string[] = [];
  for (const line of code.split(/\r?\n/)) {
    const stripped = line.trim();
    if (!stripped.startsWith(PRAGMA_PREFIX)) continue;
    // "# pragma: testrun scenario-1" -> key "testrun", value "scenario-1"
    const rest = stripped.slice(PRAGMA_PREFIX.length).trim();
    if (!rest) continue;
    const m = /^(\S+)(?:\s+(.*))?$/.exec(rest);
    if (!m?.[1]) continue;
    const key = m[1];
    const value = (m[2] ?? '').trim();
    if (key === 'materialize') materialize.push(value);
    else values[key] = value;
  }
  return { values, materialize };
};

const intString = (what: string) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, { message: `${what} must be a non-negative integer` })
    .transform((s) => Number.parseInt(s, 10));

const annotationSchema = z.object({
  testrun: z.string().trim().min(1, { message: 'testrun requires a run id' }),
  exitcode: intString('exitcode').optional(),
  timeout: intString('timeout')
    .refine((n) => n > 0, { message: 'timeout must be positive' })
    .optional(),
  requires: z.string().optional(),
  materialize: z.array(
    z
      .string()
      .trim()
      .min(1, { message: 'materialize requires a target name' })
      .regex(/^[^\s/]+$/, {
        message: 'materialize target must not contain spaces or "/"',
      }),
  ),
});

const formatZodError = (e: ZodError): string =>
  e.issues
    .map((i) => `pragma ${i.path.join('.') || '(root)'}: ${i.message}`)
    .join('; ');

export type SnippetDefaults = {
  timeout: number;
  exitCode: number;
};

export const SNIPPET_DEFAULTS: SnippetDefaults = { timeout: 60, exitCode: 0 };

/**
 * Validate annotations and build a Snippet.
 *
 * @throws LocatorError when an annotation is malformed.
 */
export const toSnippet = (
  documentId: string,
  body: string,
  pragmas: Pragmas = parsePragmas(body),
  defaults: SnippetDefaults = SNIPPET_DEFAULTS,
): Snippet => {
  const parsed = annotationSchema.safeParse({
    ...pragmas.values,
    materialize: pragmas.materialize,
  });
  if (!parsed.success)
    throw new LocatorError(documentId, formatZodError(parsed.error));
  const a = parsed.data;
  const requires = (a.requires ?? 'sh').split(/\s+/).filter((t) => t.length > 0);
  return {
    documentId,
    runId: a.testrun,
    body,
    targets: a.materialize,
    exitCode: a.exitcode ?? defaults.exitCode,
    timeout: a.timeout ?? defaults.timeout,
    requires,
  };
};
