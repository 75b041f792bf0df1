import { createHash } from 'node:crypto';

export const CACHE_KEY_PREFIX = 'analysis:';

// A high surrogate not followed by a low one, or a low one not preceded by a high one
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

// Never occurs in UTF-8, so the two encodings below cannot produce the same bytes
const UTF16_MARKER = Buffer.from([0xff]);

export function isWellFormed(text: string): boolean {
  return !LONE_SURROGATE.test(text);
}

/**
 * SHA-256 over the UTF-8 bytes of `<version-length>:<version>\n<text>`.
 * The length prefix keeps (version, text) pairs from colliding when the
 * version itself contains a newline. No normalization is applied.
 *
 * UTF-8 cannot carry a lone surrogate, so input holding one is hashed as a
 * marker byte followed by its UTF-16LE code units instead.
 */
export function computeFingerprint(text: string, languageVersion: string | null = null): string {
  const version = languageVersion ?? '';
  const framed = `${version.length}:${version}\n${text}`;
  const hash = createHash('sha256');

  if (isWellFormed(framed)) {
    hash.update(framed, 'utf8');
  } else {
    hash.update(UTF16_MARKER).update(framed, 'utf16le');
  }
  return hash.digest('hex');
}

export function cacheKey(fingerprint: string): string {
  return `${CACHE_KEY_PREFIX}${fingerprint}`;
}
