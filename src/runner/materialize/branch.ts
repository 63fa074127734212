/* src/runner/materialize/branch.ts
 * Branch (and worktree path) naming for materialized snippets.
 */
import path from 'node:path';

import type { MaterializationKey } from './types';

export const DEFAULT_NAMESPACE = 'examples';

/** `<namespace>/<documentId>/<runId>/<target>` */
export const branchId = (
  documentId: string,
  runId: string,
  target: string,
  namespace = DEFAULT_NAMESPACE,
): string => [namespace, documentId, runId, target].join('/');

export const branchRef = (branch: string): string => `refs/heads/${branch}`;

/** Same hierarchy as branchId, with path separators, under root. */
export const worktreePath = (
  root: string,
  key: MaterializationKey,
  namespace = DEFAULT_NAMESPACE,
): string =>
  path.join(path.resolve(root), namespace, key.documentId, key.runId, key.target);

/** Inverse of branchId; null when the name is not a materialized branch. */
export const parseBranchId = (
  branch: string,
  namespace = DEFAULT_NAMESPACE,
): MaterializationKey | null => {
  const parts = branch.split('/');
  if (parts.length !== 4 || parts[0] !== namespace) return null;
  const [, documentId, runId, target] = parts;
  if (!documentId || !runId || !target) return null;
  return { documentId, runId, target };
};
