import type { TaskStore } from '../store/task-store.js';
import { describeError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Append the failure to the task's error log in its own statement. The
 * original error is what the caller sees, even if this write fails too.
 */
export async function recordFailure(store: TaskStore, taskId: number, prefix: string, error: unknown, log: Logger): Promise<void> {
  const message = `${prefix}: ${describeError(error)}`;
  log.error({ error: describeError(error) }, prefix);
  try {
    await store.appendError(taskId, message);
  } catch (logError) {
    log.error({ error: describeError(logError) }, 'Failed to append to task error log');
  }
}
