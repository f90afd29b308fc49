export * from './database-connections.js';
export * from './ai-models.js';
export * from './tasks.js';
export * from './task-items.js';
