import { pgTable, serial, integer, bigint, varchar, text, numeric, timestamp, index, unique } from 'drizzle-orm/pg-core';
import type { ItemStatus } from '@redline/shared';
import { tasks } from './tasks.js';

export const taskItems = pgTable('task_item', {
  id: serial('id_task_item').primaryKey(),
  taskId: integer('id_task').notNull().references(() => tasks.id),
  remoteId: bigint('remote_id', { mode: 'number' }),
  textOriginal: text('text_original'),
  originalHash: varchar('original_hash', { length: 128 }),
  textCorrected: text('text_corrected'),
  status: varchar('status', { length: 20 }).$type<ItemStatus>().notNull().default('pending'),
  similarityScore: numeric('similarity_score', { precision: 5, scale: 2 }),
  tokensInput: integer('tokens_input'),
  tokensOutput: integer('tokens_output'),
  aiModel: varchar('ai_model', { length: 128 }),
  finishReason: varchar('finish_reason', { length: 64 }),
  fetchedAt: timestamp('fetched_at', { withTimezone: true }),
  processedAt: timestamp('processed_at', { withTimezone: true }),
}, (table) => [
  unique('task_item_task_remote_uq').on(table.taskId, table.remoteId),
  index('task_item_task_status_idx').on(table.taskId, table.status, table.id),
]);
