import { createGateway } from './ai/providers/index.js';
import { bootstrap } from './bootstrap.js';
import { openSource } from './integrations/source/index.js';
import { AI_JOB_NAME, runCorrectionCycle } from './jobs/ai.job.js';
import { startScheduler } from './jobs/scheduler.js';
import { SYNC_JOB_NAME, runSyncCycle } from './jobs/sync.job.js';
import { ConfigurationError, ConnectivityError, describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function start() {
  const { env, store, workerId, logger: log, pool } = await bootstrap('scheduler');
  const gateway = createGateway();

  const stop = startScheduler([
    {
      name: SYNC_JOB_NAME,
      expression: env.SYNC_CRON,
      run: () => runSyncCycle({ store, openSource, batchSize: env.BATCH_SIZE, workerId, logger: log }),
    },
    {
      name: AI_JOB_NAME,
      expression: env.AI_CRON,
      run: () => runCorrectionCycle({
        store,
        gateway,
        chunkSize: env.AI_CHUNK_SIZE,
        maxItems: env.AI_MAX_ITEMS,
        workerId,
        logger: log,
      }),
    },
  ]);

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    stop();
    pool.end().catch((err: unknown) => {
      log.error({ error: describeError(err) }, 'Failed to close local store pool');
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

start().catch((err: unknown) => {
  const code = err instanceof ConfigurationError || err instanceof ConnectivityError ? err.code : 'UNEXPECTED';
  logger.fatal({ error: describeError(err), code }, 'Failed to start scheduler');
  process.exit(1);
});
