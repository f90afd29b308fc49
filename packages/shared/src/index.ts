export * from './constants/sync.js';
export * from './constants/providers.js';
export * from './types/task.js';
export * from './types/ai.js';
export * from './validation/ai-response.js';
