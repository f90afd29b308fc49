import type { DbDialect } from '@redline/shared';
import { logger } from '../../utils/logger.js';
import { ValidationError, describeError } from '../../utils/errors.js';
import { toScalar, toSourceRecord, type SourceRecord, type SourceRow } from './mapper.js';
import {
  buildCountQuery,
  buildFetchQuery,
  buildMaxIdQuery,
  buildProbeQuery,
  type SourceStatement,
  type SourceTarget,
} from './queries.js';

/** Minimal read-only surface each source dialect implements. */
export interface SourceDriver {
  readonly dialect: DbDialect;
  all(statement: SourceStatement): Promise<SourceRow[]>;
  close(): Promise<void>;
}

export class SourceReader {
  constructor(
    private readonly driver: SourceDriver,
    private readonly target: SourceTarget,
  ) {}

  get dialect(): DbDialect {
    return this.driver.dialect;
  }

  /**
   * Reads a single row to prove the table and both columns exist.
   */
  async probe(): Promise<void> {
    const statement = buildProbeQuery(this.driver.dialect, this.target);
    try {
      await this.driver.all(statement);
    } catch (error) {
      throw new ValidationError(
        `Source columns ${this.target.table}.${this.target.idColumn}/${this.target.textColumn} are not readable: ${describeError(error)}`,
      );
    }
  }

  async count(): Promise<number> {
    const rows = await this.driver.all(buildCountQuery(this.target));
    return toScalar(rows[0], 'total_count');
  }

  /** 0 for an empty table. */
  async maxId(): Promise<number> {
    const rows = await this.driver.all(buildMaxIdQuery(this.target));
    return toScalar(rows[0], 'max_id');
  }

  /**
   * Next page after `marker`. `rowCount` is the number of rows the source
   * returned, which may exceed `records.length` when some ids were NULL.
   */
  async fetchAfter(marker: number, limit: number): Promise<{ records: SourceRecord[]; rowCount: number }> {
    const rows = await this.driver.all(buildFetchQuery(this.driver.dialect, this.target, marker, limit));
    const records: SourceRecord[] = [];
    for (const row of rows) {
      const record = toSourceRecord(row);
      if (record) records.push(record);
    }
    return { records, rowCount: rows.length };
  }

  async close(): Promise<void> {
    try {
      await this.driver.close();
    } catch (error) {
      logger.warn({ error: describeError(error), dialect: this.driver.dialect }, 'Failed to close source connection');
    }
  }
}
