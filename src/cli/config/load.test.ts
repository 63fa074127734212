import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, rmDirWithRetries, writeUtf8 } from '@/test';

import { findConfigPathSync, loadConfigSync } from './load';

describe('loadConfigSync', () => {
  let dir = '';
  beforeEach(async () => {
    dir = await makeTempDir('config');
  });
  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  it('returns defaults without a config file', () => {
    const cfg = loadConfigSync(dir);
    expect(cfg).toEqual({
      root: dir,
      contentDir: path.join(dir, 'content', 'examples'),
      namespace: 'examples',
      notesRef: 'refs/notes/docbranch',
      remote: 'origin',
      gitTimeoutMs: 120_000,
      snippetTimeout: 60,
      cliDefaults: {},
    });
  });

  it('reads YAML from an ancestor and resolves contentDir against it', async () => {
    await writeUtf8(
      path.join(dir, 'docbranch.config.yml'),
      [
        'contentDir: docs',
        'namespace: snapshots',
        'remote: upstream',
        'gitTimeout: 30',
        'snippetTimeout: 10',
        'cliDefaults:',
        '  push: "true"',
        '  boring: 1',
        '',
      ].join('\n'),
    );
    const nested = path.join(dir, 'a', 'b');
    await writeUtf8(path.join(nested, '.keep'), '');
    expect(findConfigPathSync(nested)).toBe(path.join(dir, 'docbranch.config.yml'));
    const cfg = loadConfigSync(nested);
    expect(cfg.root).toBe(dir);
    expect(cfg.contentDir).toBe(path.join(dir, 'docs'));
    expect(cfg.namespace).toBe('snapshots');
    expect(cfg.remote).toBe('upstream');
    expect(cfg.gitTimeoutMs).toBe(30_000);
    expect(cfg.snippetTimeout).toBe(10);
    expect(cfg.cliDefaults).toEqual({ push: true, boring: true });
  });

  it('reads JSON and treats an empty YAML document as defaults', async () => {
    await writeUtf8(path.join(dir, 'docbranch.config.json'), '{"notesRef":"refs/notes/other"}');
    expect(loadConfigSync(dir).notesRef).toBe('refs/notes/other');

    const other = path.join(dir, 'other');
    await writeUtf8(path.join(other, 'docbranch.config.yaml'), '');
    expect(loadConfigSync(other).namespace).toBe('examples');
  });

  it('lists every invalid key', async () => {
    await writeUtf8(
      path.join(dir, 'docbranch.config.yml'),
      'namespace: a/b\nnotesRef: notes\nextra: 1\n',
    );
    const cfgPath = path.join(dir, 'docbranch.config.yml');
    expect(() => loadConfigSync(dir)).toThrow(`docbranch: invalid config in ${cfgPath}\n`);
    expect(() => loadConfigSync(dir)).toThrow(/namespace: must be a single ref segment/);
    expect(() => loadConfigSync(dir)).toThrow(/notesRef: must start with refs\/notes\//);
    expect(() => loadConfigSync(dir)).toThrow(/Unrecognized key\(s\) in object: 'extra'/);
  });

  it('names the file when it does not parse', async () => {
    const cfgPath = path.join(dir, 'docbranch.config.json');
    await writeUtf8(cfgPath, '{ nope');
    expect(() => loadConfigSync(dir)).toThrow(`docbranch: cannot parse ${cfgPath}: `);
  });
});
