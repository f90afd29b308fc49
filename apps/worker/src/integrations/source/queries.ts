/**
 * Statement builders for the source databases read by the sync engines.
 *
 * Table and column names are validated and interpolated; the pagination
 * marker is always a bound parameter in the dialect's placeholder style.
 */

import type { DbDialect } from '@redline/shared';
import { sanitizeIdentifier } from '../../utils/identifiers.js';
import { ValidationError } from '../../utils/errors.js';

export interface SourceTarget {
  table: string;
  idColumn: string;
  textColumn: string;
}

export interface SourceStatement {
  text: string;
  params: unknown[];
}

function validated(target: SourceTarget): SourceTarget {
  return {
    table: sanitizeIdentifier(target.table),
    idColumn: sanitizeIdentifier(target.idColumn),
    textColumn: sanitizeIdentifier(target.textColumn),
  };
}

function placeholder(dialect: DbDialect, position: number): string {
  switch (dialect) {
    case 'pgsql':
      return `$${position}`;
    case 'mssql':
      return `@p${position}`;
    case 'mysql':
    case 'sqlite':
      return '?';
  }
}

function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new ValidationError(`Batch size must be a positive integer, got ${limit}`);
  }
}

/**
 * Single-row read used to check that the id and text columns exist.
 */
export function buildProbeQuery(dialect: DbDialect, target: SourceTarget): SourceStatement {
  const { table, idColumn, textColumn } = validated(target);
  const columns = `${idColumn} AS remote_id, ${textColumn} AS text_value`;

  if (dialect === 'mssql') {
    return { text: `SELECT TOP 1 ${columns} FROM ${table} ORDER BY ${idColumn} ASC`, params: [] };
  }
  return { text: `SELECT ${columns} FROM ${table} ORDER BY ${idColumn} ASC LIMIT 1`, params: [] };
}

export function buildCountQuery(target: SourceTarget): SourceStatement {
  const { table } = validated(target);
  return { text: `SELECT COUNT(*) AS total_count FROM ${table}`, params: [] };
}

export function buildMaxIdQuery(target: SourceTarget): SourceStatement {
  const { table, idColumn } = validated(target);
  return { text: `SELECT MAX(${idColumn}) AS max_id FROM ${table}`, params: [] };
}

/**
 * Next page of rows with id strictly greater than `afterId`, ascending.
 */
export function buildFetchQuery(
  dialect: DbDialect,
  target: SourceTarget,
  afterId: number,
  limit: number,
): SourceStatement {
  assertLimit(limit);
  const { table, idColumn, textColumn } = validated(target);
  const columns = `${idColumn} AS remote_id, ${textColumn} AS text_value`;
  const marker = placeholder(dialect, 1);

  if (dialect === 'mssql') {
    return {
      text: `SELECT TOP ${limit} ${columns} FROM ${table} WHERE ${idColumn} > ${marker} ORDER BY ${idColumn} ASC`,
      params: [afterId],
    };
  }
  return {
    text: `SELECT ${columns} FROM ${table} WHERE ${idColumn} > ${marker} ORDER BY ${idColumn} ASC LIMIT ${limit}`,
    params: [afterId],
  };
}
