import type { ProgressSummary, Task } from '@redline/shared';
import type { SourceReader } from '../integrations/source/index.js';
import type { ItemSourceInput, TaskStore } from '../store/task-store.js';
import { assertTransition } from '../tasks/lifecycle.js';
import { recomputeProgress } from '../tasks/progress.js';
import { calculateHash } from '../utils/hash.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';
import { recordFailure } from '../tasks/error-log.js';

export interface SyncOptions {
  batchSize: number;
  logger?: Logger;
}

export interface FetchResult {
  batches: number;
  fetched: number;
  inserted: number;
  markerId: number;
  progress: ProgressSummary;
}

export function toItemInputs(records: readonly { remoteId: number; textValue: string }[], hashMethod: string): ItemSourceInput[] {
  return records.map((record) => ({
    remoteId: record.remoteId,
    textOriginal: record.textValue,
    originalHash: calculateHash(record.textValue, hashMethod),
  }));
}

/**
 * Copies source rows with ids above the task's fetch marker into the local
 * store. Each batch commits its items, counters and marker together, and
 * refreshes the claim, so a rerun after a failure resumes at the last
 * committed marker.
 */
export async function fetchTask(
  store: TaskStore,
  task: Task,
  source: SourceReader,
  options: SyncOptions,
): Promise<FetchResult> {
  const log = (options.logger ?? rootLogger).child({ taskId: task.id, stage: 'fetch' });

  if (task.stage !== 'new' && task.stage !== 'fetch') {
    throw new ValidationError(`Task ${task.id} cannot be fetched in stage ${task.stage}`);
  }
  assertTransition(task.stage, 'fetch');

  try {
    await source.probe();

    const recordsTotal = await source.count();
    const markerMaxId = await source.maxId();
    await store.updateTask(task.id, { recordsTotal, markerMaxId, stage: 'fetch' });
    log.info({ recordsTotal, markerMaxId, markerId: task.markerId }, 'Source measured');

    let marker = task.markerId;
    let batches = 0;
    let fetched = 0;
    let inserted = 0;

    if (marker >= markerMaxId) {
      await store.appendDescription(task.id, `No new records after id ${marker}`);
    }

    while (marker < markerMaxId) {
      const page = await source.fetchAfter(marker, options.batchSize);
      // rows added after the measurement wait for the next pass
      const records = page.records.filter((record) => record.remoteId <= markerMaxId);
      if (records.length === 0) break;

      const items = toItemInputs(records, task.hashMethod);
      const nextMarker = records[records.length - 1].remoteId;

      const result = await store.transaction(async (tx) => {
        const upserted = await tx.upsertItems(task.id, items);
        await tx.incrementCounters(task.id, { recordsFetched: items.length, recordsNew: upserted.inserted });
        await tx.updateTask(task.id, { markerId: nextMarker });
        if (task.lockedBy !== null) await tx.touchClaim(task.id, task.lockedBy);
        await tx.appendDescription(
          task.id,
          `Fetched ${items.length} records (${upserted.inserted} new), marker ${nextMarker}/${markerMaxId}`,
        );
        return upserted;
      });

      marker = nextMarker;
      batches += 1;
      fetched += items.length;
      inserted += result.inserted;
      log.debug({ marker, batch: items.length, inserted: result.inserted }, 'Batch committed');

      if (page.rowCount < options.batchSize) break;
    }

    const progress = await store.transaction((tx) => recomputeProgress(tx, task.id));
    log.info({ batches, fetched, inserted, marker, stage: progress.stage }, 'Fetch finished');

    return { batches, fetched, inserted, markerId: marker, progress };
  } catch (error) {
    await recordFailure(store, task.id, 'Fetch failed', error, log);
    throw error;
  }
}
