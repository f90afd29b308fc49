import { SYNC_STAGES, type Task } from '@redline/shared';
import type { SourceOpener, SourceReader } from '../integrations/source/index.js';
import type { TaskStore } from '../store/task-store.js';
import { fetchTask } from '../sync/fetch-engine.js';
import { recordFailure } from '../tasks/error-log.js';
import { resyncTask } from '../sync/resync-engine.js';
import { ValidationError, describeError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { CycleResult } from './cycle.js';

export const SYNC_JOB_NAME = 'sync';

export interface SyncCycleOptions {
  store: TaskStore;
  openSource: SourceOpener;
  batchSize: number;
  workerId: string;
  logger?: Logger;
}

async function openTaskSource(
  store: TaskStore,
  task: Task,
  openSource: SourceOpener,
  log: Logger,
): Promise<SourceReader> {
  try {
    const connection = await store.getDatabaseConnection(task.databaseConnectionId);
    if (!connection) {
      throw new ValidationError(`Database connection ${task.databaseConnectionId} not found`);
    }
    return await openSource(connection, task);
  } catch (error) {
    await recordFailure(store, task.id, 'Source unavailable', error, log);
    throw error;
  }
}

/**
 * Claims the oldest sync-eligible task, runs resync when requested and
 * then fetch, and releases the claim. Task-level failures are already in
 * the task's error log when this returns.
 */
export async function runSyncCycle(options: SyncCycleOptions): Promise<CycleResult> {
  const { store, workerId } = options;
  const baseLogger = options.logger ?? rootLogger;

  const task = await store.claimNextTask(SYNC_STAGES, workerId);
  if (!task) {
    baseLogger.info('No task eligible for sync');
    return { outcome: 'no-task' };
  }

  const log = baseLogger.child({ taskId: task.id, workerId });
  log.info({ stage: task.stage, table: task.tableName }, 'Sync task claimed');

  let failed = false;
  try {
    const source = await openTaskSource(store, task, options.openSource, log);
    try {
      let current = task;
      if (current.stage === 'resync') {
        await resyncTask(store, current, source, { batchSize: options.batchSize, logger: log });
        const reloaded = await store.getTask(task.id);
        if (!reloaded) throw new ValidationError(`Task ${task.id} disappeared during resync`);
        current = reloaded;
      }

      const result = await fetchTask(store, current, source, { batchSize: options.batchSize, logger: log });
      return { outcome: 'completed', taskId: task.id, progress: result.progress, updated: result.fetched };
    } finally {
      await source.close();
    }
  } catch (error) {
    failed = true;
    log.error({ error: describeError(error) }, 'Sync task failed');
    return { outcome: 'failed', taskId: task.id, error: describeError(error) };
  } finally {
    await store.releaseTask(task.id, workerId, failed ? 'error' : 'idle');
  }
}
