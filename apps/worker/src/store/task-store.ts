import type {
  AiModelConfig,
  DatabaseConnection,
  ItemCounts,
  PendingItem,
  Task,
  TaskStage,
  TaskStatus,
} from '@redline/shared';

export type TaskPatch = Partial<Pick<Task,
  | 'stage'
  | 'status'
  | 'markerId'
  | 'resyncMarkerId'
  | 'markerMaxId'
  | 'recordsTotal'
  | 'recordsFetched'
  | 'recordsProcessed'
  | 'syncProgress'
  | 'aiProgress'
>>;

export type TaskCounter = 'recordsFetched' | 'recordsNew' | 'recordsUpdated';

export interface ItemSourceInput {
  remoteId: number;
  textOriginal: string;
  originalHash: string;
}

export interface UpsertResult {
  inserted: number;
  updated: number;
}

/** Which identifier scheme a reply element refers to. */
export interface ItemRef {
  column: 'remoteId' | 'id';
  value: number;
}

interface OutcomeStamp {
  tokensInput: number;
  tokensOutput: number;
  aiModel: string | null;
  finishReason: string | null;
}

export type ItemOutcome =
  | (OutcomeStamp & { status: 'unchanged' })
  | (OutcomeStamp & { status: 'changed'; textCorrected: string; similarityScore: number });

export interface PendingQuery {
  chunkSize: number;
  maxItems: number;
}

/**
 * Persistence contract of the pipeline. Every write made inside
 * `transaction` commits or rolls back together; the store passed to the
 * callback must be used for all work belonging to that transaction.
 */
export interface TaskStore {
  transaction<T>(work: (tx: TaskStore) => Promise<T>): Promise<T>;

  /** Claim the lowest-id task in one of the given stages. */
  claimNextTask(stages: readonly TaskStage[], workerId: string): Promise<Task | null>;
  releaseTask(taskId: number, workerId: string, status: TaskStatus): Promise<void>;
  /** Restamp the claim time so a long run is not taken over as stale. */
  touchClaim(taskId: number, workerId: string): Promise<void>;

  getTask(taskId: number): Promise<Task | null>;
  getDatabaseConnection(id: number): Promise<DatabaseConnection | null>;
  getActiveAiModel(id: number): Promise<AiModelConfig | null>;

  updateTask(taskId: number, patch: TaskPatch): Promise<void>;
  incrementCounters(taskId: number, increments: Partial<Record<TaskCounter, number>>): Promise<void>;
  appendDescription(taskId: number, message: string): Promise<void>;
  appendError(taskId: number, message: string): Promise<void>;

  /** Insert new items as pending; existing items only get text, hash and fetch time refreshed. */
  upsertItems(taskId: number, items: readonly ItemSourceInput[]): Promise<UpsertResult>;
  getItemHashes(taskId: number, remoteIds: readonly number[]): Promise<Map<number, string | null>>;
  /** Refresh text and hash of existing items. Returns the number of rows touched. */
  updateItemSources(taskId: number, items: readonly ItemSourceInput[]): Promise<number>;

  listPendingItems(taskId: number, query: PendingQuery): Promise<PendingItem[]>;
  /** Undefined when no item matches the reference. */
  getOriginalText(taskId: number, ref: ItemRef): Promise<string | null | undefined>;
  applyOutcome(taskId: number, ref: ItemRef, outcome: ItemOutcome): Promise<number>;
  countItems(taskId: number): Promise<ItemCounts>;
}
