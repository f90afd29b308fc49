import { aiResponseItemSchema, type PendingItem } from '@redline/shared';
import type { ItemOutcome, ItemRef, TaskStore } from '../store/task-store.js';
import { ValidationError } from '../utils/errors.js';
import { toIntegerId } from '../utils/identifiers.js';
import { calculateSimilarity } from '../utils/similarity.js';
import type { ParsedItem } from './response-parser.js';

/**
 * Original texts of the items sent in one prompt, keyed by both id
 * schemes, plus the identifiers the reply may reference.
 */
export interface OriginalTextLookup {
  expected: Set<number>;
  byRemoteId: Map<number, string | null>;
  byItemId: Map<number, string | null>;
  /** Item ids that were sent under their own id because the remote id was missing. */
  sentByItemId: Set<number>;
}

export function buildOriginalTextLookup(items: readonly PendingItem[]): OriginalTextLookup {
  const lookup: OriginalTextLookup = {
    expected: new Set(),
    byRemoteId: new Map(),
    byItemId: new Map(),
    sentByItemId: new Set(),
  };

  for (const item of items) {
    if (item.remoteId !== null) {
      lookup.expected.add(item.remoteId);
      lookup.byRemoteId.set(item.remoteId, item.textOriginal);
    } else {
      lookup.expected.add(item.id);
      lookup.sentByItemId.add(item.id);
    }
    lookup.byItemId.set(item.id, item.textOriginal);
  }
  return lookup;
}

export interface ReconcileInput {
  taskId: number;
  items: readonly ParsedItem[];
  lookup: OriginalTextLookup;
  tokensInput: number;
  tokensOutput: number;
  /** Model name reported by the provider, if any. */
  responseModel: string | null;
  /** Configured model name, used when the provider reports none. */
  configuredModel: string;
  finishReason: string | null;
}

interface ResolvedElement {
  ref: ItemRef;
  alternate: number | null;
  textCorrected: string;
}

function resolveElement(raw: ParsedItem, position: number, lookup: OriginalTextLookup): ResolvedElement {
  const parsed = aiResponseItemSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Reply element #${position} has malformed fields`);
  }
  const element = parsed.data;

  const remoteId = toIntegerId(element.remote_id);
  const fallbackId = toIntegerId(element.id_task_item ?? element.id);
  if (remoteId === null && fallbackId === null) {
    throw new ValidationError(`Reply element #${position} has no remote_id or id`);
  }
  if (element.text_corrected === null || element.text_corrected === undefined) {
    throw new ValidationError(`Reply element #${position} has no text_corrected`);
  }

  if (remoteId !== null) {
    // an item without a remote id was numbered by its own id in the prompt
    const column = !lookup.byRemoteId.has(remoteId) && lookup.sentByItemId.has(remoteId) ? 'id' : 'remoteId';
    return { ref: { column, value: remoteId }, alternate: fallbackId, textCorrected: element.text_corrected };
  }
  if (fallbackId === null) {
    throw new ValidationError(`Reply element #${position} has no remote_id or id`);
  }
  return { ref: { column: 'id', value: fallbackId }, alternate: null, textCorrected: element.text_corrected };
}

async function originalTextFor(
  tx: TaskStore,
  taskId: number,
  element: ResolvedElement,
  lookup: OriginalTextLookup,
): Promise<string | null> {
  const primary = element.ref.column === 'remoteId' ? lookup.byRemoteId : lookup.byItemId;
  const secondary = element.ref.column === 'remoteId' ? lookup.byItemId : lookup.byRemoteId;

  const direct = primary.get(element.ref.value);
  if (direct !== undefined && direct !== null) return direct;

  const alternateKey = element.alternate ?? element.ref.value;
  const crossed = secondary.get(alternateKey);
  if (crossed !== undefined && crossed !== null) return crossed;

  return (await tx.getOriginalText(taskId, element.ref)) ?? null;
}

/**
 * Writes the model's corrections onto the task's items. Every element is
 * validated before anything is written; any failure throws and the
 * caller's transaction is expected to roll back. Returns the number of
 * items actually updated.
 */
export async function reconcileResponse(tx: TaskStore, input: ReconcileInput): Promise<number> {
  const { taskId, items, lookup } = input;
  if (items.length === 0) return 0;

  const seen = new Set<number>();
  const resolved = items.map((raw, index) => {
    const element = resolveElement(raw, index + 1, lookup);
    const { value } = element.ref;

    if (lookup.expected.size > 0 && !lookup.expected.has(value)) {
      throw new ValidationError(`Identifier ${value} was not part of the request`);
    }
    // remote ids and item ids share one namespace in the reply
    if (seen.has(value)) {
      throw new ValidationError(`Identifier ${value} appears more than once in the reply`);
    }
    seen.add(value);
    return element;
  });

  // remainders of the division are not attributed to any item
  const tokensInput = Math.floor(input.tokensInput / items.length);
  const tokensOutput = Math.floor(input.tokensOutput / items.length);
  const aiModel = input.responseModel || input.configuredModel;
  const stamp = { tokensInput, tokensOutput, aiModel, finishReason: input.finishReason };

  let updated = 0;
  for (const element of resolved) {
    let outcome: ItemOutcome;
    if (element.textCorrected === '') {
      outcome = { ...stamp, status: 'unchanged' };
    } else {
      const original = await originalTextFor(tx, taskId, element, lookup);
      outcome = {
        ...stamp,
        status: 'changed',
        textCorrected: element.textCorrected,
        similarityScore: calculateSimilarity(original ?? '', element.textCorrected),
      };
    }

    const affected = await tx.applyOutcome(taskId, element.ref, outcome);
    if (affected > 0) updated += 1;
  }
  return updated;
}
