import { describe, expect, it } from 'vitest';
import { calculateHash } from '../../src/utils/hash.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('calculateHash', () => {
  it('uses sha256 by default', () => {
    expect(calculateHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('accepts algorithm names in any case', () => {
    expect(calculateHash('abc', 'SHA256')).toBe(calculateHash('abc', 'sha256'));
    expect(calculateHash('abc', 'MD5')).toBe('900150983cd24fb0d6963f7d28e17f72');
  });

  it('hashes null as the empty string', () => {
    expect(calculateHash(null)).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('rejects unknown algorithms', () => {
    expect(() => calculateHash('abc', 'nope')).toThrow(ValidationError);
    expect(() => calculateHash('abc', 'nope')).toThrow('Unsupported hash algorithm: nope');
  });
});
