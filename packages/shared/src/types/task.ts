import type { DbDialect, ItemStatus, TaskStage, TaskStatus } from '../constants/sync.js';

export interface Task {
  id: number;
  stage: TaskStage;
  status: TaskStatus;
  databaseConnectionId: number;
  tableName: string;
  idColumnName: string;
  columnName: string;
  hashMethod: string;
  /** Last source id applied by the fetch engine. */
  markerId: number;
  /** Last source id compared by the resync engine. */
  resyncMarkerId: number;
  /** Highest source id seen when the current fetch pass began. */
  markerMaxId: number;
  recordsTotal: number;
  recordsFetched: number;
  recordsNew: number;
  recordsUpdated: number;
  recordsProcessed: number;
  syncProgress: number;
  aiProgress: number;
  aiModelId: number | null;
  aiUserRules: string | null;
  description: string | null;
  errorLog: string | null;
  lockedBy: string | null;
  lockedAt: Date | null;
}

export interface TaskItem {
  id: number;
  taskId: number;
  remoteId: number | null;
  textOriginal: string | null;
  originalHash: string | null;
  textCorrected: string | null;
  status: ItemStatus;
  similarityScore: number | null;
  tokensInput: number | null;
  tokensOutput: number | null;
  aiModel: string | null;
  finishReason: string | null;
  fetchedAt: Date | null;
  processedAt: Date | null;
}

/** The subset of a task item sent to the correction model. */
export type PendingItem = Pick<TaskItem, 'id' | 'remoteId' | 'textOriginal'>;

export interface DatabaseConnection {
  id: number;
  dbType: DbDialect;
  host: string | null;
  port: number | null;
  dbName: string;
  dbUser: string | null;
  dbPassword: string | null;
}

export interface ItemCounts {
  total: number;
  pending: number;
  changed: number;
  unchanged: number;
}

export interface ProgressSummary {
  taskId: number;
  stage: TaskStage;
  recordsTotal: number;
  recordsFetched: number;
  recordsProcessed: number;
  pendingCount: number;
  syncProgress: number;
  aiProgress: number;
}
