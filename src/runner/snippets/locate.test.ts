import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, rmDirWithRetries, writeUtf8 } from '@/test';

import { extractBlocks, locateSnippets } from './locate';

const doc = [
  '# Title',
  '',
  '```sh',
  '# pragma: testrun demo-1',
  '# pragma: materialize myrepo',
  'git init myrepo',
  '```',
  '',
  '```bash',
  'echo not a test run',
  '```',
  '',
  '```python',
  '# pragma: testrun nope',
  '```',
  '',
  '```bash',
  '# pragma: testrun demo-2',
  'echo two',
  '```',
  '',
].join('\n');

describe('extractBlocks', () => {
  it('returns marked sh/bash blocks only, in order', () => {
    expect(extractBlocks(doc)).toEqual([
      '# pragma: testrun demo-1\n# pragma: materialize myrepo\ngit init myrepo\n',
      '# pragma: testrun demo-2\necho two\n',
    ]);
  });
});

describe('locateSnippets', () => {
  let dir = '';
  beforeEach(async () => {
    dir = await makeTempDir('locate');
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('names documents by file stem and keeps document order', async () => {
    await writeUtf8(path.join(dir, 'test-example.md'), doc);
    await writeUtf8(path.join(dir, 'notes.txt'), doc);
    const found = await locateSnippets(dir);
    expect(found.map((f) => (f.ok ? `${f.snippet.documentId}/${f.snippet.runId}` : 'error'))).toEqual([
      'test-example/demo-1',
      'test-example/demo-2',
    ]);
    const first = found[0];
    expect(first?.ok && first.snippet.targets).toEqual(['myrepo']);
  });

  it('reports malformed annotations per snippet', async () => {
    await writeUtf8(
      path.join(dir, 'bad.md'),
      '```sh\n# pragma: testrun r\n# pragma: timeout soon\n```\n',
    );
    const [only] = await locateSnippets(dir);
    expect(only?.ok).toBe(false);
    if (only && !only.ok) {
      expect(only.error.documentId).toBe('bad');
      expect(only.file).toBe(path.join(dir, 'bad.md'));
    }
  });

  it('returns nothing for an empty directory', async () => {
    expect(await locateSnippets(dir)).toEqual([]);
  });
});
