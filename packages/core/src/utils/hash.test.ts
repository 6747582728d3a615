import { describe, it, expect } from 'vitest';
import { contentHash } from './hash.js';

describe('contentHash', () => {
  it('produces the SHA-256 hex digest of the bytes', () => {
    const hash = contentHash(new Uint8Array([0x61, 0x62, 0x63]));
    expect(hash).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('hashes strings and their UTF-8 bytes identically', () => {
    expect(contentHash('abc')).toBe(contentHash(new TextEncoder().encode('abc')));
  });

  it('produces different hashes for different content', () => {
    expect(contentHash('track-a')).not.toBe(contentHash('track-b'));
  });

  it('handles empty input', () => {
    expect(contentHash(new Uint8Array())).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });
});
