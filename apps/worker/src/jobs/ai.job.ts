import { AI_STAGES, type Task } from '@redline/shared';
import type { AiGateway } from '../ai/gateway.js';
import { buildCorrectionPrompt, selectPromptItems } from '../ai/prompt.js';
import { buildOriginalTextLookup, reconcileResponse } from '../ai/reconcile.js';
import { parseJsonResponse } from '../ai/response-parser.js';
import type { TaskStore } from '../store/task-store.js';
import { recordFailure } from '../tasks/error-log.js';
import { recomputeProgress } from '../tasks/progress.js';
import { ProviderError, ValidationError, describeError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { CycleResult } from './cycle.js';

export const AI_JOB_NAME = 'ai';

export interface CorrectionCycleOptions {
  store: TaskStore;
  gateway: AiGateway;
  /** Pending items read per query. */
  chunkSize: number;
  /** Upper bound of items sent in one prompt. */
  maxItems: number;
  workerId: string;
  logger?: Logger;
}

async function correctTask(options: CorrectionCycleOptions, task: Task, log: Logger): Promise<CycleResult> {
  const { store, gateway } = options;

  if (task.aiModelId === null) {
    throw new ValidationError(`Task ${task.id} has no AI model assigned`);
  }
  const model = await store.getActiveAiModel(task.aiModelId);
  if (!model) {
    throw new ValidationError(`Active AI model ${task.aiModelId} not found`);
  }
  if (!gateway.isProviderSupported(model.provider)) {
    throw new ProviderError(`AI provider ${model.provider} is not supported`);
  }
  if (!(await gateway.isModelSupported(model))) {
    throw new ProviderError(`Model ${model.modelName} is not available from ${model.provider}`);
  }

  const pending = await store.listPendingItems(task.id, {
    chunkSize: options.chunkSize,
    maxItems: options.maxItems,
  });
  if (pending.length === 0) {
    log.info('No pending items');
    const progress = await store.transaction((tx) => recomputeProgress(tx, task.id));
    return { outcome: 'completed', taskId: task.id, progress, updated: 0 };
  }

  const items = selectPromptItems(pending, model.maxCharInput);
  const lookup = buildOriginalTextLookup(items);
  const prompt = buildCorrectionPrompt(items, task.aiUserRules);
  const request = gateway.buildRequest(model, prompt);

  log.info({ provider: model.provider, model: model.modelName, items: items.length }, 'Sending correction request');
  const response = await gateway.execute(request);
  log.debug({ raw: response.raw }, 'Model reply received');

  const parsed = parseJsonResponse(response.text);

  const { updated, progress } = await store.transaction(async (tx) => {
    const updatedCount = await reconcileResponse(tx, {
      taskId: task.id,
      items: parsed,
      lookup,
      tokensInput: response.tokensInput,
      tokensOutput: response.tokensOutput,
      responseModel: response.metadata.model,
      configuredModel: model.modelName,
      finishReason: response.metadata.finishReason,
    });
    const summary = await recomputeProgress(tx, task.id);
    await tx.touchClaim(task.id, options.workerId);
    await tx.appendDescription(
      task.id,
      `Corrected ${updatedCount} of ${items.length} records with ${model.modelName} (${model.provider})`,
    );
    return { updated: updatedCount, progress: summary };
  });

  log.info({ updated, stage: progress.stage, aiProgress: progress.aiProgress }, 'Correction batch reconciled');
  return { outcome: 'completed', taskId: task.id, progress, updated };
}

/**
 * Claims the oldest task in the `ai` stage and sends one batch of its
 * pending items through the configured model. Any failure rolls back the
 * reconciliation, is appended to the task's error log and leaves the
 * items pending for the next cycle.
 */
export async function runCorrectionCycle(options: CorrectionCycleOptions): Promise<CycleResult> {
  const { store, workerId } = options;
  const baseLogger = options.logger ?? rootLogger;

  const task = await store.claimNextTask(AI_STAGES, workerId);
  if (!task) {
    baseLogger.info('No task eligible for correction');
    return { outcome: 'no-task' };
  }

  const log = baseLogger.child({ taskId: task.id, workerId, stage: task.stage });
  let failed = false;
  try {
    return await correctTask(options, task, log);
  } catch (error) {
    failed = true;
    await recordFailure(store, task.id, 'Correction failed', error, log);
    return { outcome: 'failed', taskId: task.id, error: describeError(error) };
  } finally {
    await store.releaseTask(task.id, workerId, failed ? 'error' : 'idle');
  }
}
