#!/usr/bin/env tsx
import { createGateway } from '../ai/providers/index.js';
import { runCommand } from '../bootstrap.js';
import { runCorrectionCycle } from '../jobs/ai.job.js';

await runCommand('ai', async ({ env, store, workerId, logger }) => {
  const result = await runCorrectionCycle({
    store,
    gateway: createGateway(),
    chunkSize: env.AI_CHUNK_SIZE,
    maxItems: env.AI_MAX_ITEMS,
    workerId,
    logger,
  });
  logger.info({ result }, 'Correction cycle finished');
});
