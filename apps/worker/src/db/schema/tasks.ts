import { pgTable, serial, integer, bigint, varchar, text, numeric, timestamp, index } from 'drizzle-orm/pg-core';
import type { TaskStage, TaskStatus } from '@redline/shared';
import { databaseConnections } from './database-connections.js';
import { aiModels } from './ai-models.js';

export const tasks = pgTable('task', {
  id: serial('id_task').primaryKey(),
  stage: varchar('stage', { length: 20 }).$type<TaskStage>().notNull().default('new'),
  status: varchar('status', { length: 20 }).$type<TaskStatus>().notNull().default('idle'),
  databaseConnectionId: integer('id_database_connection').notNull().references(() => databaseConnections.id),
  tableName: varchar('table_name', { length: 128 }).notNull(),
  idColumnName: varchar('id_column_name', { length: 128 }).notNull(),
  columnName: varchar('column_name', { length: 128 }).notNull(),
  hashMethod: varchar('hash_method', { length: 32 }).notNull().default('sha256'),
  markerId: bigint('marker_id', { mode: 'number' }).notNull().default(0),
  resyncMarkerId: bigint('resync_marker_id', { mode: 'number' }).notNull().default(0),
  markerMaxId: bigint('marker_max_id', { mode: 'number' }).notNull().default(0),
  recordsTotal: integer('records_total').notNull().default(0),
  recordsFetched: integer('records_fetched').notNull().default(0),
  recordsNew: integer('records_new').notNull().default(0),
  recordsUpdated: integer('records_updated').notNull().default(0),
  recordsProcessed: integer('records_processed').notNull().default(0),
  syncProgress: numeric('sync_progress', { precision: 5, scale: 2 }).notNull().default('0'),
  aiProgress: numeric('ai_progress', { precision: 5, scale: 2 }).notNull().default('0'),
  aiModelId: integer('id_ai_model').references(() => aiModels.id),
  aiUserRules: text('ai_user_rules'),
  description: text('description'),
  errorLog: text('error_log'),
  lockedBy: varchar('locked_by', { length: 64 }),
  lockedAt: timestamp('locked_at', { withTimezone: true }),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
}, (table) => [
  index('task_stage_idx').on(table.stage, table.id),
]);
