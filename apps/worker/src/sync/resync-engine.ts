import type { Task } from '@redline/shared';
import type { SourceReader } from '../integrations/source/index.js';
import type { TaskStore } from '../store/task-store.js';
import { assertTransition } from '../tasks/lifecycle.js';
import { logger as rootLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { toItemInputs, type SyncOptions } from './fetch-engine.js';
import { recordFailure } from '../tasks/error-log.js';

export interface ResyncResult {
  batches: number;
  compared: number;
  updated: number;
  ceiling: number;
}

/**
 * Re-reads already fetched source ids up to the recorded ceiling and
 * refreshes text and hash of the items whose content changed. Item status
 * and corrections are left as they are. On completion the task returns
 * to `fetch` so ids beyond the ceiling are still picked up.
 */
export async function resyncTask(
  store: TaskStore,
  task: Task,
  source: SourceReader,
  options: SyncOptions,
): Promise<ResyncResult> {
  const log = (options.logger ?? rootLogger).child({ taskId: task.id, stage: 'resync' });

  if (task.stage !== 'resync') {
    throw new ValidationError(`Task ${task.id} cannot be resynced in stage ${task.stage}`);
  }

  try {
    await source.probe();

    const ceiling = task.markerMaxId;
    let cursor = task.resyncMarkerId >= ceiling ? 0 : task.resyncMarkerId;
    let batches = 0;
    let compared = 0;
    let updated = 0;

    log.info({ cursor, ceiling }, 'Resync started');

    while (cursor < ceiling) {
      const { records, rowCount } = await source.fetchAfter(cursor, options.batchSize);
      const inRange = records.filter((record) => record.remoteId <= ceiling);
      if (records.length === 0) break;

      const items = toItemInputs(inRange, task.hashMethod);
      const nextCursor = Math.min(records[records.length - 1].remoteId, ceiling);

      const touched = await store.transaction(async (tx) => {
        const stored = await tx.getItemHashes(task.id, items.map((item) => item.remoteId));
        const changed = items.filter(
          (item) => stored.has(item.remoteId) && stored.get(item.remoteId) !== item.originalHash,
        );
        const count = await tx.updateItemSources(task.id, changed);
        await tx.incrementCounters(task.id, { recordsUpdated: count });
        await tx.updateTask(task.id, { resyncMarkerId: nextCursor });
        if (task.lockedBy !== null) await tx.touchClaim(task.id, task.lockedBy);
        return count;
      });

      cursor = nextCursor;
      batches += 1;
      compared += items.length;
      updated += touched;
      log.debug({ cursor, compared: items.length, updated: touched }, 'Resync batch committed');

      if (rowCount < options.batchSize) break;
    }

    assertTransition('resync', 'fetch');
    await store.transaction(async (tx) => {
      await tx.appendDescription(task.id, `Resync finished: ${compared} compared, ${updated} updated up to id ${ceiling}`);
      await tx.updateTask(task.id, { resyncMarkerId: ceiling, stage: 'fetch' });
    });
    log.info({ batches, compared, updated, ceiling }, 'Resync finished');

    return { batches, compared, updated, ceiling };
  } catch (error) {
    await recordFailure(store, task.id, 'Resync failed', error, log);
    throw error;
  }
}
