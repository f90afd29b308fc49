import sql, { type ConnectionPool } from 'mssql';
import type { DatabaseConnection } from '@redline/shared';
import type { SourceDriver } from '../client.js';
import type { SourceStatement } from '../queries.js';
import type { SourceRow } from '../mapper.js';

export class MssqlDriver implements SourceDriver {
  readonly dialect = 'mssql' as const;

  constructor(private readonly pool: ConnectionPool) {}

  static async connect(descriptor: DatabaseConnection, password: string | undefined): Promise<MssqlDriver> {
    const pool = new sql.ConnectionPool({
      server: descriptor.host ?? 'localhost',
      port: descriptor.port ?? undefined,
      database: descriptor.dbName,
      user: descriptor.dbUser ?? undefined,
      password,
      options: { trustServerCertificate: true },
    });
    await pool.connect();
    return new MssqlDriver(pool);
  }

  async all(statement: SourceStatement): Promise<SourceRow[]> {
    const request = this.pool.request();
    // statements name their parameters @p1, @p2, ...
    statement.params.forEach((value, index) => {
      request.input(`p${index + 1}`, value);
    });
    const result = await request.query<SourceRow>(statement.text);
    return result.recordset;
  }

  async close(): Promise<void> {
    await this.pool.close();
  }
}
