import type { ProgressSummary } from '@redline/shared';

export type CycleResult =
  | { outcome: 'no-task' }
  | { outcome: 'completed'; taskId: number; progress: ProgressSummary; updated: number }
  | { outcome: 'failed'; taskId: number; error: string };
