import { pgTable, serial, varchar, text, integer, numeric, boolean } from 'drizzle-orm/pg-core';

export const aiModels = pgTable('ai_model', {
  id: serial('id_ai_model').primaryKey(),
  provider: varchar('provider', { length: 50 }).notNull(),
  modelName: varchar('model_name', { length: 128 }).notNull(),
  apiKeyEncrypted: text('api_key_encrypted'),
  baseUrl: varchar('base_url', { length: 1024 }),
  temperature: numeric('temperature', { precision: 3, scale: 2 }),
  maxTokens: integer('max_tokens'),
  maxCharInput: integer('max_char_input'),
  isActive: boolean('is_active').notNull().default(true),
});
