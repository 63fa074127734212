/* src/runner/presentation/logger.ts
 * Console sinks: one line per materialize/reap decision.
 */
import type { MaterializeEvent } from '@/runner/materialize/types';
import type { ReapEvent } from '@/runner/reap/service';

import { shortSha } from './format';
import { label } from './labels';

type Log = (line: string) => void;

const defaultLog: Log = (line) => console.log(line);

export const materializeLine = (e: MaterializeEvent): string => {
  switch (e.type) {
    case 'cache-hit':
      return `docbranch: ${label('hit')} cache hit ${e.branch} (${shortSha(e.commit)})`;
    case 'regenerating':
      return `docbranch: ${label('regen')} regenerating ${e.branch} (${e.reason})`;
    case 'done':
      return `docbranch: ${label('ok')} done ${e.branch} -> ${shortSha(e.commit)}`;
    case 'pushed':
      return `docbranch: ${label('ok')} pushed ${e.branch} to ${e.remote}`;
    case 'skipped':
      return `docbranch: ${label('skip')} skipped ${e.branch} (${e.reason})`;
    case 'failed':
      return `docbranch: ${label('fail')} failed ${e.branch}: ${e.error.message}`;
  }
};

export const reapLine = (e: ReapEvent): string => {
  switch (e.type) {
    case 'listed':
      return `docbranch: ${e.branches.length.toString()} materialized ${e.scope} branch(es)`;
    case 'would-delete':
      return `docbranch: would delete ${e.scope} ${e.branch} (dry run)`;
    case 'deleted':
      return `docbranch: ${label('delete')} deleted ${e.scope} ${e.branch}`;
  }
};

export const materializeLogger =
  (log: Log = defaultLog) =>
  (e: MaterializeEvent): void =>
    log(materializeLine(e));

export const reapLogger =
  (log: Log = defaultLog) =>
  (e: ReapEvent): void =>
    log(reapLine(e));
