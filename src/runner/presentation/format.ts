/* src/runner/presentation/format.ts
 * End-of-run summary table.
 */
import { table } from 'table';

import type { KeyResult, KeyStatus } from '@/runner/materialize/types';
import { bold, dim } from '@/runner/util/color';

import { label, type StatusKind } from './labels';

const STATUS: Record<KeyStatus, StatusKind> = {
  'cache-hit': 'hit',
  regenerated: 'ok',
  failed: 'fail',
  skipped: 'skip',
};

export const shortSha = (sha?: string): string => (sha ? sha.slice(0, 7) : '');

export const headerCells = (): string[] =>
  ['Branch', 'Status', 'Commit'].map((h) => bold(h));

export const summaryRows = (results: readonly KeyResult[]): string[][] =>
  results.map((r) => [
    r.branch,
    label(STATUS[r.status]),
    r.commit ? shortSha(r.commit) : dim(r.reason ?? '-'),
  ]);

/** Borderless, left-aligned table of per-key outcomes. */
export const renderSummary = (results: readonly KeyResult[]): string =>
  table([headerCells(), ...summaryRows(results)], {
    border: {
      topBody: ``,
      topJoin: ``,
      topLeft: ``,
      topRight: ``,
      bottomBody: ``,
      bottomJoin: ``,
      bottomLeft: ``,
      bottomRight: ``,
      bodyLeft: ``,
      bodyRight: ``,
      bodyJoin: ``,
      joinBody: ``,
      joinLeft: ``,
      joinRight: ``,
      joinJoin: ``,
    },
    drawHorizontalLine: () => false,
    columns: {
      0: { alignment: 'left' },
      1: { alignment: 'left' },
      2: { alignment: 'left' },
    },
  });
