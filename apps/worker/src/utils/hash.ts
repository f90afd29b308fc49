import crypto from 'node:crypto';
import { DEFAULT_HASH_METHOD } from '@redline/shared';
import { ValidationError } from './errors.js';

const supportedHashes = new Set(crypto.getHashes());

/**
 * Hex digest of a record's text. The algorithm name is case-insensitive
 * and must be one Node's crypto module provides.
 */
export function calculateHash(text: string | null, method: string = DEFAULT_HASH_METHOD): string {
  const algorithm = method.toLowerCase();
  if (!supportedHashes.has(algorithm)) {
    throw new ValidationError(`Unsupported hash algorithm: ${method}`);
  }
  return crypto
    .createHash(algorithm)
    .update(text ?? '', 'utf8')
    .digest('hex');
}
