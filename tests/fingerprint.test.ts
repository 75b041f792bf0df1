import { describe, expect, it } from 'vitest';
import { cacheKey, computeFingerprint, isWellFormed } from '../src/shared/fingerprint.js';

describe('computeFingerprint', () => {
  it('hashes the length-prefixed version and the text', () => {
    expect(computeFingerprint('x = 1\n')).toBe('d75a2588165877143d60a5d3671664e594a7c14f3c8b6ccb5e7e2e62d8593144');
    expect(computeFingerprint('x = 1\n', '3.12')).toBe('e55933f03f9c222095c2fea1e3e571b83fbe11d8fae1ebbd9ba008570fe26532');
  });

  it('treats a missing version like an empty one', () => {
    expect(computeFingerprint('x = 1\n', null)).toBe(computeFingerprint('x = 1\n', ''));
  });

  it('hashes UTF-8 bytes', () => {
    expect(computeFingerprint('s = "héllo"\n')).toBe('a967cf035f45c542a1f142150dbcf04b0db0db90720f5a007ab79fe20450b705');
  });

  it('does not normalize whitespace', () => {
    expect(computeFingerprint('x = 1')).not.toBe(computeFingerprint('x = 1 '));
    expect(computeFingerprint('x = 1\n')).not.toBe(computeFingerprint('x = 1\r\n'));
  });

  it('keeps version and text from colliding', () => {
    expect(computeFingerprint('b', 'a\n')).not.toBe(computeFingerprint('\nb', 'a'));
  });

  it('tells lone surrogates apart', () => {
    const high = computeFingerprint('x = "\ud800"\n');
    const low = computeFingerprint('x = "\udfff"\n');

    expect(high).not.toBe(low);
    expect(high).not.toBe(computeFingerprint('x = "\ufffd"\n'));
    expect(high).toMatch(/^[0-9a-f]{64}$/);
  });

  it('keeps UTF-8 hashing for surrogate pairs', () => {
    expect(computeFingerprint('s = "\ud83d\ude00"\n')).toBe(computeFingerprint('s = "😀"\n'));
  });
});

describe('isWellFormed', () => {
  it('rejects unpaired surrogates only', () => {
    expect(isWellFormed('😀 héllo')).toBe(true);
    expect(isWellFormed('a\ud800')).toBe(false);
    expect(isWellFormed('\udc00a')).toBe(false);
    expect(isWellFormed('\udc00\ud800')).toBe(false);
  });
});

describe('cacheKey', () => {
  it('prefixes the fingerprint', () => {
    expect(cacheKey('abc')).toBe('analysis:abc');
  });
});
