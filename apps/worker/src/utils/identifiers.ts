import { ValidationError } from './errors.js';

const IDENTIFIER_PATTERN = /^[A-Za-z0-9_]+$/;

/**
 * Table and column names are interpolated into source SQL, so only plain
 * word characters are accepted.
 */
export function sanitizeIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new ValidationError(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

/**
 * Coerce an id as drivers deliver it (number, bigint or numeric string)
 * into a safe integer. Returns null for null/undefined/empty input.
 */
export function toIntegerId(value: unknown): number | null {
  if (value === null || value === undefined || value === '') return null;

  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'bigint') {
    n = Number(value);
  } else if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    n = Number(value.trim());
  } else {
    throw new ValidationError(`Identifier is not an integer: ${String(value)}`);
  }

  if (!Number.isSafeInteger(n)) {
    throw new ValidationError(`Identifier is not an integer: ${String(value)}`);
  }
  return n;
}
