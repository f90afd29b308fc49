import type { TaskStage } from '@redline/shared';
import type { TaskStore } from '../store/task-store.js';
import { ValidationError } from '../utils/errors.js';

const TRANSITIONS: Record<TaskStage, readonly TaskStage[]> = {
  new: ['fetch'],
  fetch: ['ai', 'resync'],
  resync: ['fetch'],
  ai: ['export', 'resync'],
  export: ['done', 'resync'],
  done: ['resync'],
};

export function canTransition(from: TaskStage, to: TaskStage): boolean {
  return from === to || TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TaskStage, to: TaskStage): void {
  if (!canTransition(from, to)) {
    throw new ValidationError(`Illegal stage transition: ${from} -> ${to}`);
  }
}

export interface StageCounters {
  recordsTotal: number;
  recordsFetched: number;
  recordsProcessed: number;
}

/**
 * Stage implied by the counters. A completed fetch moves to `ai`, and a
 * completed correction pass moves on to `export` in the same evaluation.
 */
export function resolveStage(stage: TaskStage, counters: StageCounters): TaskStage {
  const { recordsTotal, recordsFetched, recordsProcessed } = counters;
  let next = stage;

  if (next === 'fetch' && recordsTotal > 0 && recordsFetched === recordsTotal) {
    next = 'ai';
  }
  if (next === 'ai' && recordsTotal > 0 && recordsProcessed === recordsTotal) {
    next = 'export';
  }
  return next;
}

/**
 * Explicit resync request. The resync cursor starts over from the first id.
 */
export async function requestResync(store: TaskStore, taskId: number): Promise<void> {
  await store.transaction(async (tx) => {
    const task = await tx.getTask(taskId);
    if (!task) throw new ValidationError(`Task ${taskId} not found`);
    assertTransition(task.stage, 'resync');

    await tx.updateTask(taskId, { stage: 'resync', resyncMarkerId: 0 });
    await tx.appendDescription(taskId, `Resync requested from stage ${task.stage}`);
  });
}

/** Marks an exported task as finished. */
export async function completeExport(store: TaskStore, taskId: number): Promise<void> {
  await store.transaction(async (tx) => {
    const task = await tx.getTask(taskId);
    if (!task) throw new ValidationError(`Task ${taskId} not found`);
    assertTransition(task.stage, 'done');
    if (task.stage === 'done') return;

    await tx.updateTask(taskId, { stage: 'done' });
    await tx.appendDescription(taskId, 'Export completed');
  });
}
