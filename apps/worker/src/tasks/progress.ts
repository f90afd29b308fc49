import type { ProgressSummary } from '@redline/shared';
import type { TaskStore } from '../store/task-store.js';
import { ValidationError } from '../utils/errors.js';
import { resolveStage } from './lifecycle.js';

function percentage(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.min(100, Math.round((part / whole) * 10000) / 100);
}

/**
 * Recounts the task's items and writes the derived counters, progress
 * figures and stage. Must be given the transaction of the write that
 * changed the items.
 */
export async function recomputeProgress(tx: TaskStore, taskId: number): Promise<ProgressSummary> {
  const task = await tx.getTask(taskId);
  if (!task) throw new ValidationError(`Task ${taskId} not found`);

  const counts = await tx.countItems(taskId);
  const recordsFetched = counts.total;
  const recordsProcessed = counts.changed + counts.unchanged;
  const syncProgress = percentage(recordsFetched, task.recordsTotal);
  const aiProgress = percentage(recordsProcessed, task.recordsTotal);
  const stage = resolveStage(task.stage, {
    recordsTotal: task.recordsTotal,
    recordsFetched,
    recordsProcessed,
  });

  await tx.updateTask(taskId, { recordsFetched, recordsProcessed, syncProgress, aiProgress, stage });

  return {
    taskId,
    stage,
    recordsTotal: task.recordsTotal,
    recordsFetched,
    recordsProcessed,
    pendingCount: counts.pending,
    syncProgress,
    aiProgress,
  };
}
