import pg, { type Client } from 'pg';
import type { DatabaseConnection } from '@redline/shared';
import type { SourceDriver } from '../client.js';
import type { SourceStatement } from '../queries.js';
import type { SourceRow } from '../mapper.js';

export class PostgresDriver implements SourceDriver {
  readonly dialect = 'pgsql' as const;

  constructor(private readonly client: Client) {}

  static async connect(descriptor: DatabaseConnection, password: string | undefined): Promise<PostgresDriver> {
    const client = new pg.Client({
      host: descriptor.host ?? undefined,
      port: descriptor.port ?? undefined,
      database: descriptor.dbName,
      user: descriptor.dbUser ?? undefined,
      password,
    });
    await client.connect();
    await client.query('SET SESSION CHARACTERISTICS AS TRANSACTION READ ONLY');
    return new PostgresDriver(client);
  }

  async all(statement: SourceStatement): Promise<SourceRow[]> {
    const result = await this.client.query<SourceRow>(statement.text, statement.params);
    return result.rows;
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}
