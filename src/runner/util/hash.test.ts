import { describe, expect, it } from 'vitest';

import { fingerprint, FINGERPRINT_RE } from './hash';

describe('fingerprint', () => {
  it('is the lowercase hex SHA-256 of the body', () => {
    expect(fingerprint('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
    expect(fingerprint('echo hello\n')).toBe(
      '5dbad7dd0b9b122dcd9956884390f4aac4738caba8ff53498a7ab6718b176c30',
    );
  });

  it('is stable across calls and matches the record format', () => {
    const a = fingerprint('echo hello\n');
    expect(fingerprint('echo hello\n')).toBe(a);
    expect(a).toMatch(FINGERPRINT_RE);
  });

  it('changes with any byte of the body', () => {
    expect(fingerprint('echo hello\n')).not.toBe(fingerprint('echo world\n'));
    expect(fingerprint('echo hello\n')).not.toBe(fingerprint('echo hello'));
    expect(fingerprint('a')).not.toBe(fingerprint('A'));
  });

  it('hashes strings and their UTF-8 bytes identically', () => {
    expect(fingerprint(Buffer.from('héllo', 'utf8'))).toBe(fingerprint('héllo'));
  });
});
