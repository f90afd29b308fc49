import { pgTable, serial, varchar, integer, timestamp } from 'drizzle-orm/pg-core';

export const databaseConnections = pgTable('database_connection', {
  id: serial('id_database').primaryKey(),
  dbType: varchar('db_type', { length: 20 }).notNull(),
  host: varchar('host', { length: 255 }),
  port: integer('port'),
  dbName: varchar('db_name', { length: 1024 }).notNull(),
  dbUser: varchar('db_user', { length: 255 }),
  dbPassword: varchar('db_password', { length: 1024 }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});
