import type { DatabaseConnection, Task } from '@redline/shared';
import { decryptCredential } from '../../services/credentials.service.js';
import { ConnectivityError, ValidationError, describeError } from '../../utils/errors.js';
import { sanitizeIdentifier } from '../../utils/identifiers.js';
import { SourceReader, type SourceDriver } from './client.js';
import { MssqlDriver } from './drivers/mssql.js';
import { MysqlDriver } from './drivers/mysql.js';
import { PostgresDriver } from './drivers/postgres.js';
import { SqliteDriver } from './drivers/sqlite.js';

export { SourceReader, type SourceDriver } from './client.js';
export type { SourceRecord, SourceRow } from './mapper.js';
export type { SourceStatement, SourceTarget } from './queries.js';

export type SourceOpener = (connection: DatabaseConnection, task: Task) => Promise<SourceReader>;

async function connectDriver(connection: DatabaseConnection): Promise<SourceDriver> {
  const password = connection.dbPassword === null ? undefined : decryptCredential(connection.dbPassword);
  switch (connection.dbType) {
    case 'mysql':
      return MysqlDriver.connect(connection, password);
    case 'mssql':
      return MssqlDriver.connect(connection, password);
    case 'pgsql':
      return PostgresDriver.connect(connection, password);
    case 'sqlite':
      return SqliteDriver.connect(connection);
  }
}

/**
 * Opens a read-only reader over the task's source table.
 */
export const openSource: SourceOpener = async (connection, task) => {
  const target = {
    table: sanitizeIdentifier(task.tableName),
    idColumn: sanitizeIdentifier(task.idColumnName),
    textColumn: sanitizeIdentifier(task.columnName),
  };

  let driver: SourceDriver;
  try {
    driver = await connectDriver(connection);
  } catch (error) {
    if (error instanceof ValidationError) throw error;
    throw new ConnectivityError(
      `Cannot connect to ${connection.dbType} source ${connection.host ?? 'localhost'}:${connection.port ?? 'default'}/${connection.dbName}: ${describeError(error)}`,
    );
  }
  return new SourceReader(driver, target);
};
