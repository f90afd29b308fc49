/**
 * Mappers from raw driver rows to the fixed record shape the sync engines
 * work with.
 */

import { toIntegerId } from '../../utils/identifiers.js';
import { ValidationError } from '../../utils/errors.js';

export type SourceRow = Record<string, unknown>;

export interface SourceRecord {
  remoteId: number;
  textValue: string;
}

function pick(row: SourceRow, key: string): unknown {
  if (key in row) return row[key];
  // some drivers upper-case aliases
  const match = Object.keys(row).find((k) => k.toLowerCase() === key);
  return match === undefined ? undefined : row[match];
}

function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (Buffer.isBuffer(value)) return value.toString('utf8');
  return String(value);
}

/**
 * Returns null for rows without an id; such rows cannot be paginated and
 * are skipped by the engines.
 */
export function toSourceRecord(row: SourceRow): SourceRecord | null {
  const remoteId = toIntegerId(pick(row, 'remote_id'));
  if (remoteId === null) return null;
  return { remoteId, textValue: toText(pick(row, 'text_value')) };
}

/**
 * Reads an aggregate column (COUNT, MAX). Missing or NULL means 0.
 */
export function toScalar(row: SourceRow | undefined, key: string): number {
  if (!row) return 0;
  const value = pick(row, key);
  try {
    return toIntegerId(value) ?? 0;
  } catch {
    throw new ValidationError(`Source returned a non-integer ${key}: ${String(value)}`);
  }
}
