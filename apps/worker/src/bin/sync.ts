#!/usr/bin/env tsx
import { runCommand } from '../bootstrap.js';
import { openSource } from '../integrations/source/index.js';
import { runSyncCycle } from '../jobs/sync.job.js';

await runCommand('sync', async ({ env, store, workerId, logger }) => {
  const result = await runSyncCycle({ store, openSource, batchSize: env.BATCH_SIZE, workerId, logger });
  logger.info({ result }, 'Sync cycle finished');
});
