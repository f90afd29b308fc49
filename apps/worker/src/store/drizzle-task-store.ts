import { and, asc, eq, gt, inArray, isNull, lt, or, sql, type SQL } from 'drizzle-orm';
import {
  isDbDialect,
  type AiModelConfig,
  type DatabaseConnection,
  type ItemCounts,
  type PendingItem,
  type Task,
  type TaskStage,
  type TaskStatus,
} from '@redline/shared';
import type { Executor } from '../db/client.js';
import { aiModels, databaseConnections, taskItems, tasks } from '../db/schema/index.js';
import { ValidationError } from '../utils/errors.js';
import type {
  ItemOutcome,
  ItemRef,
  ItemSourceInput,
  PendingQuery,
  TaskCounter,
  TaskPatch,
  TaskStore,
  UpsertResult,
} from './task-store.js';

export interface DrizzleTaskStoreOptions {
  /** Claims older than this are considered abandoned and may be taken over. */
  lockTimeoutMs: number;
}

type TaskRow = typeof tasks.$inferSelect;

const COUNTERS: readonly TaskCounter[] = ['recordsFetched', 'recordsNew', 'recordsUpdated'];

function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    stage: row.stage,
    status: row.status,
    databaseConnectionId: row.databaseConnectionId,
    tableName: row.tableName,
    idColumnName: row.idColumnName,
    columnName: row.columnName,
    hashMethod: row.hashMethod,
    markerId: row.markerId,
    resyncMarkerId: row.resyncMarkerId,
    markerMaxId: row.markerMaxId,
    recordsTotal: row.recordsTotal,
    recordsFetched: row.recordsFetched,
    recordsNew: row.recordsNew,
    recordsUpdated: row.recordsUpdated,
    recordsProcessed: row.recordsProcessed,
    syncProgress: Number(row.syncProgress),
    aiProgress: Number(row.aiProgress),
    aiModelId: row.aiModelId,
    aiUserRules: row.aiUserRules,
    description: row.description,
    errorLog: row.errorLog,
    lockedBy: row.lockedBy,
    lockedAt: row.lockedAt,
  };
}

/** `existing + "\n" + message`, or just `message` when the column is empty. */
function appendLine(column: typeof tasks.description | typeof tasks.errorLog, message: string): SQL {
  return sql`coalesce(nullif(${column}, '') || chr(10), '') || ${message}`;
}

function itemColumn(ref: ItemRef) {
  return ref.column === 'remoteId' ? taskItems.remoteId : taskItems.id;
}

export class DrizzleTaskStore implements TaskStore {
  constructor(
    private readonly db: Executor,
    private readonly options: DrizzleTaskStoreOptions,
  ) {}

  async transaction<T>(work: (tx: TaskStore) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => work(new DrizzleTaskStore(tx, this.options)));
  }

  /**
   * Row-locks the candidate with SKIP LOCKED so concurrent invocations
   * never claim the same task, then stamps the claim column.
   */
  async claimNextTask(stages: readonly TaskStage[], workerId: string): Promise<Task | null> {
    if (stages.length === 0) return null;
    const staleBefore = new Date(Date.now() - this.options.lockTimeoutMs);

    return this.db.transaction(async (tx) => {
      const candidates = await tx
        .select({ id: tasks.id })
        .from(tasks)
        .where(and(
          inArray(tasks.stage, [...stages]),
          or(isNull(tasks.lockedBy), lt(tasks.lockedAt, staleBefore)),
        ))
        .orderBy(asc(tasks.id))
        .limit(1)
        .for('update', { skipLocked: true });

      if (candidates.length === 0) return null;

      const now = new Date();
      const claimed = await tx
        .update(tasks)
        .set({ lockedBy: workerId, lockedAt: now, status: 'running', updatedAt: now })
        .where(eq(tasks.id, candidates[0].id))
        .returning();

      return claimed.length > 0 ? toTask(claimed[0]) : null;
    });
  }

  async releaseTask(taskId: number, workerId: string, status: TaskStatus): Promise<void> {
    await this.db
      .update(tasks)
      .set({ lockedBy: null, lockedAt: null, status, updatedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.lockedBy, workerId)));
  }

  async touchClaim(taskId: number, workerId: string): Promise<void> {
    await this.db
      .update(tasks)
      .set({ lockedAt: new Date() })
      .where(and(eq(tasks.id, taskId), eq(tasks.lockedBy, workerId)));
  }

  async getTask(taskId: number): Promise<Task | null> {
    const rows = await this.db.select().from(tasks).where(eq(tasks.id, taskId)).limit(1);
    return rows.length > 0 ? toTask(rows[0]) : null;
  }

  async getDatabaseConnection(id: number): Promise<DatabaseConnection | null> {
    const rows = await this.db
      .select()
      .from(databaseConnections)
      .where(eq(databaseConnections.id, id))
      .limit(1);

    if (rows.length === 0) return null;
    const row = rows[0];
    if (!isDbDialect(row.dbType)) {
      throw new ValidationError(`Unsupported source database type: ${row.dbType}`);
    }

    return {
      id: row.id,
      dbType: row.dbType,
      host: row.host,
      port: row.port,
      dbName: row.dbName,
      dbUser: row.dbUser,
      dbPassword: row.dbPassword,
    };
  }

  async getActiveAiModel(id: number): Promise<AiModelConfig | null> {
    const rows = await this.db
      .select()
      .from(aiModels)
      .where(and(eq(aiModels.id, id), eq(aiModels.isActive, true)))
      .limit(1);

    if (rows.length === 0) return null;
    const row = rows[0];
    return {
      id: row.id,
      provider: row.provider,
      modelName: row.modelName,
      apiKeyEncrypted: row.apiKeyEncrypted,
      baseUrl: row.baseUrl,
      temperature: row.temperature === null ? null : Number(row.temperature),
      maxTokens: row.maxTokens,
      maxCharInput: row.maxCharInput,
    };
  }

  async updateTask(taskId: number, patch: TaskPatch): Promise<void> {
    const { syncProgress, aiProgress, ...rest } = patch;
    await this.db
      .update(tasks)
      .set({
        ...rest,
        ...(syncProgress !== undefined ? { syncProgress: syncProgress.toFixed(2) } : {}),
        ...(aiProgress !== undefined ? { aiProgress: aiProgress.toFixed(2) } : {}),
        updatedAt: new Date(),
      })
      .where(eq(tasks.id, taskId));
  }

  async incrementCounters(taskId: number, increments: Partial<Record<TaskCounter, number>>): Promise<void> {
    const set: Partial<Record<TaskCounter, SQL>> = {};
    for (const counter of COUNTERS) {
      const amount = increments[counter];
      if (amount) set[counter] = sql`${tasks[counter]} + ${amount}`;
    }
    if (Object.keys(set).length === 0) return;

    await this.db
      .update(tasks)
      .set({ ...set, updatedAt: new Date() })
      .where(eq(tasks.id, taskId));
  }

  async appendDescription(taskId: number, message: string): Promise<void> {
    await this.db
      .update(tasks)
      .set({ description: appendLine(tasks.description, message) })
      .where(eq(tasks.id, taskId));
  }

  async appendError(taskId: number, message: string): Promise<void> {
    await this.db
      .update(tasks)
      .set({ errorLog: appendLine(tasks.errorLog, message) })
      .where(eq(tasks.id, taskId));
  }

  async upsertItems(taskId: number, items: readonly ItemSourceInput[]): Promise<UpsertResult> {
    if (items.length === 0) return { inserted: 0, updated: 0 };
    const now = new Date();

    // xmax is 0 only for rows created by this statement
    const rows = await this.db
      .insert(taskItems)
      .values(items.map((item) => ({
        taskId,
        remoteId: item.remoteId,
        textOriginal: item.textOriginal,
        originalHash: item.originalHash,
        status: 'pending' as const,
        fetchedAt: now,
      })))
      .onConflictDoUpdate({
        target: [taskItems.taskId, taskItems.remoteId],
        set: {
          textOriginal: sql`excluded.text_original`,
          originalHash: sql`excluded.original_hash`,
          fetchedAt: sql`excluded.fetched_at`,
        },
      })
      .returning({ inserted: sql<boolean>`(xmax = 0)` });

    const inserted = rows.filter((row) => row.inserted).length;
    return { inserted, updated: rows.length - inserted };
  }

  async getItemHashes(taskId: number, remoteIds: readonly number[]): Promise<Map<number, string | null>> {
    const hashes = new Map<number, string | null>();
    if (remoteIds.length === 0) return hashes;

    const rows = await this.db
      .select({ remoteId: taskItems.remoteId, originalHash: taskItems.originalHash })
      .from(taskItems)
      .where(and(eq(taskItems.taskId, taskId), inArray(taskItems.remoteId, [...remoteIds])));

    for (const row of rows) {
      if (row.remoteId !== null) hashes.set(row.remoteId, row.originalHash);
    }
    return hashes;
  }

  async updateItemSources(taskId: number, items: readonly ItemSourceInput[]): Promise<number> {
    let touched = 0;
    const now = new Date();
    for (const item of items) {
      const result = await this.db
        .update(taskItems)
        .set({ textOriginal: item.textOriginal, originalHash: item.originalHash, fetchedAt: now })
        .where(and(eq(taskItems.taskId, taskId), eq(taskItems.remoteId, item.remoteId)));
      touched += result.rowCount ?? 0;
    }
    return touched;
  }

  /**
   * Reads pending items in id order, a chunk at a time, up to `maxItems`.
   */
  async listPendingItems(taskId: number, query: PendingQuery): Promise<PendingItem[]> {
    const items: PendingItem[] = [];
    let lastId = 0;

    while (items.length < query.maxItems) {
      const batch = await this.db
        .select({ id: taskItems.id, remoteId: taskItems.remoteId, textOriginal: taskItems.textOriginal })
        .from(taskItems)
        .where(and(
          eq(taskItems.taskId, taskId),
          eq(taskItems.status, 'pending'),
          gt(taskItems.id, lastId),
        ))
        .orderBy(asc(taskItems.id))
        .limit(query.chunkSize);

      if (batch.length === 0) break;
      items.push(...batch);
      lastId = batch[batch.length - 1].id;
      if (batch.length < query.chunkSize) break;
    }

    return items.slice(0, query.maxItems);
  }

  async getOriginalText(taskId: number, ref: ItemRef): Promise<string | null | undefined> {
    const rows = await this.db
      .select({ textOriginal: taskItems.textOriginal })
      .from(taskItems)
      .where(and(eq(taskItems.taskId, taskId), eq(itemColumn(ref), ref.value)))
      .limit(1);

    return rows.length > 0 ? rows[0].textOriginal : undefined;
  }

  async applyOutcome(taskId: number, ref: ItemRef, outcome: ItemOutcome): Promise<number> {
    const stamp = {
      tokensInput: outcome.tokensInput,
      tokensOutput: outcome.tokensOutput,
      aiModel: outcome.aiModel,
      finishReason: outcome.finishReason,
      processedAt: new Date(),
    };

    const result = await this.db
      .update(taskItems)
      .set(outcome.status === 'unchanged'
        ? { ...stamp, status: 'unchanged', textCorrected: sql`${taskItems.textOriginal}`, similarityScore: '100.00' }
        : {
            ...stamp,
            status: 'changed',
            textCorrected: outcome.textCorrected,
            similarityScore: outcome.similarityScore.toFixed(2),
          })
      .where(and(eq(taskItems.taskId, taskId), eq(itemColumn(ref), ref.value)));

    return result.rowCount ?? 0;
  }

  async countItems(taskId: number): Promise<ItemCounts> {
    const rows = await this.db
      .select({ status: taskItems.status, count: sql<number>`count(*)::int` })
      .from(taskItems)
      .where(eq(taskItems.taskId, taskId))
      .groupBy(taskItems.status);

    const counts: ItemCounts = { total: 0, pending: 0, changed: 0, unchanged: 0 };
    for (const row of rows) {
      counts[row.status] = row.count;
      counts.total += row.count;
    }
    return counts;
  }
}
