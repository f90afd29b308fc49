import Database from 'better-sqlite3';
import type { DatabaseConnection } from '@redline/shared';
import type { SourceDriver } from '../client.js';
import type { SourceStatement } from '../queries.js';
import type { SourceRow } from '../mapper.js';

function isRow(value: unknown): value is SourceRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Embedded file source. `db_name` holds the path of the database file.
 */
export class SqliteDriver implements SourceDriver {
  readonly dialect = 'sqlite' as const;

  constructor(private readonly db: Database.Database) {}

  static async connect(descriptor: DatabaseConnection): Promise<SqliteDriver> {
    return new SqliteDriver(new Database(descriptor.dbName, { readonly: true, fileMustExist: true }));
  }

  async all(statement: SourceStatement): Promise<SourceRow[]> {
    const rows: unknown[] = this.db.prepare(statement.text).all(...statement.params);
    return rows.filter(isRow);
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
