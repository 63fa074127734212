/* src/runner/presentation/labels.ts
 * Shared BORING/TTY-aware status labels for log lines and the summary table.
 */
import { alert, cancel, error, go, isBoring, ok } from '@/runner/util/color';

export type StatusKind = 'hit' | 'regen' | 'ok' | 'fail' | 'skip' | 'delete';

/**
 * Render a status label suitable for table/log rows.
 * Honors BORING/TTY via util/color.
 */
export const label = (kind: StatusKind): string => {
  if (isBoring()) {
    // Bracketed tokens for BORING/non‑TTY to keep log parsing stable.
    switch (kind) {
      case 'hit':
        return '[HIT]';
      case 'regen':
        return '[REGEN]';
      case 'ok':
        return '[OK]';
      case 'fail':
        return '[FAIL]';
      case 'skip':
        return '[SKIP]';
      case 'delete':
        return '[DELETE]';
    }
  }
  switch (kind) {
    case 'hit':
      return alert('● hit');
    case 'regen':
      return go('▶︎ regen');
    case 'ok':
      return ok('✔︎ ok');
    case 'fail':
      return error('✖︎ fail');
    case 'skip':
      return cancel('⏸︎ skip');
    case 'delete':
      return error('✖︎ delete');
  }
};
