import { runCommand } from '../bootstrap.js';
import type { TaskStore } from '../store/task-store.js';
import { ValidationError, describeError } from '../utils/errors.js';
import { toIntegerId } from '../utils/identifiers.js';
import { logger } from '../utils/logger.js';

/**
 * Shared body of the commands that act on one task given as the first
 * argument. Task-level failures are logged and leave the exit status at 0.
 */
export async function runTaskCommand(
  name: string,
  action: (store: TaskStore, taskId: number) => Promise<void>,
): Promise<void> {
  let taskId: number | null = null;
  try {
    taskId = toIntegerId(process.argv[2]);
  } catch {
    taskId = null;
  }
  if (taskId === null || taskId <= 0) {
    logger.fatal({ argument: process.argv[2] ?? null }, `Usage: redline-${name} <taskId>`);
    process.exitCode = 1;
    return;
  }
  const id = taskId;

  await runCommand(name, async (context) => {
    try {
      await action(context.store, id);
      context.logger.info({ taskId: id }, `${name} done`);
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      context.logger.error({ taskId: id, error: describeError(error) }, `${name} rejected`);
    }
  });
}
