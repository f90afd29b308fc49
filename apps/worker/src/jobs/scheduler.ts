import cron, { type ScheduledTask } from 'node-cron';
import { ConfigurationError, describeError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface ScheduledCycle {
  name: string;
  expression: string;
  run: () => Promise<unknown>;
}

/**
 * Wraps a cycle so a tick is skipped while the previous run of the same
 * cycle is still in flight. Errors are logged; the schedule keeps going.
 */
export function createGuardedTick(name: string, run: () => Promise<unknown>): () => Promise<boolean> {
  let running = false;

  return async () => {
    if (running) {
      logger.warn({ job: name }, 'Previous run still in progress, skipping tick');
      return false;
    }
    running = true;
    try {
      await run();
    } catch (error) {
      logger.error({ job: name, error: describeError(error) }, 'Scheduled run failed');
    } finally {
      running = false;
    }
    return true;
  };
}

/**
 * Start all scheduled cycles. Returns a function that stops them.
 */
export function startScheduler(cycles: readonly ScheduledCycle[]): () => void {
  for (const cycle of cycles) {
    if (!cron.validate(cycle.expression)) {
      throw new ConfigurationError(`Invalid cron expression for ${cycle.name}: ${cycle.expression}`);
    }
  }

  const tasks: ScheduledTask[] = cycles.map((cycle) => {
    const tick = createGuardedTick(cycle.name, cycle.run);
    return cron.schedule(cycle.expression, async () => {
      await tick();
    });
  });

  logger.info(
    { jobs: cycles.map((cycle) => `${cycle.name} (${cycle.expression})`) },
    'Job scheduler started',
  );

  return () => {
    for (const task of tasks) task.stop();
    logger.info('Job scheduler stopped');
  };
}
