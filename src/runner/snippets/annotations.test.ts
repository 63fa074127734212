import { describe, expect, it } from 'vitest';

import { LocatorError } from '@/runner/errors';

import { parsePragmas, toSnippet } from './annotations';

const body = [
  '# pragma: testrun demo-1',
  '# pragma: materialize myrepo',
  '  # pragma: materialize other',
  '# pragma: exitcode 3',
  'git init myrepo',
  '',
].join('\n');

describe('parsePragmas', () => {
  it('collects values and ordered materialize targets', () => {
    expect(parsePragmas(body)).toEqual({
      values: { testrun: 'demo-1', exitcode: '3' },
      materialize: ['myrepo', 'other'],
    });
  });

  it('ignores ordinary comments and bare prefixes', () => {
    expect(parsePragmas('# just a comment\n# pragma:\necho hi\n')).toEqual({
      values: {},
      materialize: [],
    });
  });
});

describe('toSnippet', () => {
  it('builds a snippet with defaults', () => {
    const s = toSnippet('doc', '# pragma: testrun r1\necho hi\n');
    expect(s).toEqual({
      documentId: 'doc',
      runId: 'r1',
      body: '# pragma: testrun r1\necho hi\n',
      targets: [],
      exitCode: 0,
      timeout: 60,
      requires: ['sh'],
    });
  });

  it('reads exitcode, timeout and requires', () => {
    const s = toSnippet(
      'doc',
      '# pragma: testrun r1\n# pragma: timeout 5\n# pragma: requires git  awk\n',
    );
    expect(s.timeout).toBe(5);
    expect(s.requires).toEqual(['git', 'awk']);
    expect(toSnippet('doc', body).exitCode).toBe(3);
  });

  it('takes fallback defaults from the caller', () => {
    const s = toSnippet('doc', '# pragma: testrun r1\n', undefined, { timeout: 9, exitCode: 1 });
    expect(s.timeout).toBe(9);
    expect(s.exitCode).toBe(1);
  });

  it('rejects malformed annotations', () => {
    expect(() => toSnippet('doc', '# pragma: testrun r1\n# pragma: timeout 0\n')).toThrow(
      LocatorError,
    );
    expect(() => toSnippet('doc', '# pragma: testrun r1\n# pragma: exitcode x\n')).toThrow(
      'pragma exitcode: exitcode must be a non-negative integer',
    );
    expect(() => toSnippet('doc', '# pragma: testrun r1\n# pragma: materialize a/b\n')).toThrow(
      'materialize target must not contain spaces or "/"',
    );
  });
});
