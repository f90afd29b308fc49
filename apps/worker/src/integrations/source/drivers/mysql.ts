import mysql, { type Connection, type RowDataPacket } from 'mysql2/promise';
import type { DatabaseConnection } from '@redline/shared';
import type { SourceDriver } from '../client.js';
import type { SourceStatement } from '../queries.js';
import type { SourceRow } from '../mapper.js';

export class MysqlDriver implements SourceDriver {
  readonly dialect = 'mysql' as const;

  constructor(private readonly connection: Connection) {}

  static async connect(descriptor: DatabaseConnection, password: string | undefined): Promise<MysqlDriver> {
    const connection = await mysql.createConnection({
      host: descriptor.host ?? undefined,
      port: descriptor.port ?? undefined,
      database: descriptor.dbName,
      user: descriptor.dbUser ?? undefined,
      password,
      // large BIGINT ids arrive as strings and are normalised by the mapper
      supportBigNumbers: true,
    });
    return new MysqlDriver(connection);
  }

  async all(statement: SourceStatement): Promise<SourceRow[]> {
    const [rows] = await this.connection.query<RowDataPacket[]>(statement.text, statement.params);
    return rows;
  }

  async close(): Promise<void> {
    await this.connection.end();
  }
}
