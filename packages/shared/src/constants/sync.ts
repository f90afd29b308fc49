export const TASK_STAGES = ['new', 'fetch', 'resync', 'ai', 'export', 'done'] as const;
export const TASK_STATUSES = ['idle', 'running', 'error'] as const;
export const ITEM_STATUSES = ['pending', 'changed', 'unchanged'] as const;

/** Stages picked up by the sync runner. */
export const SYNC_STAGES = ['new', 'fetch', 'resync'] as const;
/** Stages picked up by the correction runner. */
export const AI_STAGES = ['ai'] as const;

export const DB_DIALECTS = ['mysql', 'mssql', 'pgsql', 'sqlite'] as const;

export const DEFAULT_HASH_METHOD = 'sha256';

export type TaskStage = typeof TASK_STAGES[number];
export type TaskStatus = typeof TASK_STATUSES[number];
export type ItemStatus = typeof ITEM_STATUSES[number];
export type DbDialect = typeof DB_DIALECTS[number];

export function isTaskStage(value: string): value is TaskStage {
  return TASK_STAGES.some((stage) => stage === value);
}

export function isDbDialect(value: string): value is DbDialect {
  return DB_DIALECTS.some((dialect) => dialect === value);
}
