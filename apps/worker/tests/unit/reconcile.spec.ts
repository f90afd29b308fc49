import { beforeEach, describe, expect, it } from 'vitest';
import type { PendingItem } from '@redline/shared';
import { buildOriginalTextLookup, reconcileResponse, type ReconcileInput } from '../../src/ai/reconcile.js';
import type { ParsedItem } from '../../src/ai/response-parser.js';
import { ValidationError } from '../../src/utils/errors.js';
import { MemoryTaskStore } from '../helpers/memory-task-store.js';

const TASK_ID = 1;

function pendingOf(store: MemoryTaskStore): PendingItem[] {
  return store.items(TASK_ID).map(({ id, remoteId, textOriginal }) => ({ id, remoteId, textOriginal }));
}

function inputFor(store: MemoryTaskStore, items: ParsedItem[], overrides: Partial<ReconcileInput> = {}): ReconcileInput {
  return {
    taskId: TASK_ID,
    items,
    lookup: buildOriginalTextLookup(pendingOf(store)),
    tokensInput: 100,
    tokensOutput: 50,
    responseModel: null,
    configuredModel: 'gpt-4o-mini',
    finishReason: 'stop',
    ...overrides,
  };
}

describe('reconcileResponse', () => {
  let store: MemoryTaskStore;

  beforeEach(() => {
    store = new MemoryTaskStore();
    store.addTask({ id: TASK_ID, stage: 'ai', recordsTotal: 3 });
    store.addItem(TASK_ID, 1, 'ok');
    store.addItem(TASK_ID, 2, 'bad txt');
    store.addItem(TASK_ID, 3, 'fine');
  });

  it('writes changed and unchanged outcomes with split tokens', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [
      { remote_id: 1, text_corrected: '' },
      { remote_id: 2, text_corrected: 'bad text' },
      { remote_id: 3, text_corrected: '' },
    ]));

    expect(updated).toBe(3);
    expect(store.item(TASK_ID, 1)).toMatchObject({
      status: 'unchanged',
      textCorrected: 'ok',
      similarityScore: 100,
      tokensInput: 33,
      tokensOutput: 16,
      aiModel: 'gpt-4o-mini',
      finishReason: 'stop',
    });
    expect(store.item(TASK_ID, 2)).toMatchObject({
      status: 'changed',
      textCorrected: 'bad text',
      similarityScore: 93.33,
    });
    expect(store.item(TASK_ID, 2).processedAt).toBeInstanceOf(Date);
  });

  it('prefers the model name reported by the provider', async () => {
    await reconcileResponse(store, inputFor(store, [{ remote_id: 1, text_corrected: '' }], {
      responseModel: 'gpt-4o-mini-2024-07-18',
    }));

    expect(store.item(TASK_ID, 1).aiModel).toBe('gpt-4o-mini-2024-07-18');
  });

  it('drops the remainder of the token split', async () => {
    await reconcileResponse(store, inputFor(store, [
      { remote_id: 1, text_corrected: '' },
      { remote_id: 2, text_corrected: '' },
      { remote_id: 3, text_corrected: '' },
    ], { tokensInput: 10, tokensOutput: 2 }));

    const tokens = store.items(TASK_ID).map((item) => [item.tokensInput, item.tokensOutput]);
    expect(tokens).toEqual([[3, 0], [3, 0], [3, 0]]);
  });

  it('accepts numeric string identifiers', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [{ remote_id: '2', text_corrected: 'bad text' }]));

    expect(updated).toBe(1);
    expect(store.item(TASK_ID, 2).status).toBe('changed');
  });

  it('leaves items not mentioned in the reply pending', async () => {
    await reconcileResponse(store, inputFor(store, [{ remote_id: 2, text_corrected: '' }]));

    expect(store.items(TASK_ID).map((item) => item.status)).toEqual(['pending', 'unchanged', 'pending']);
  });

  it('returns 0 for an empty reply', async () => {
    expect(await reconcileResponse(store, inputFor(store, []))).toBe(0);
  });

  describe('rejections', () => {
    const cases: Array<[string, ParsedItem[], string]> = [
      [
        'a duplicated identifier',
        [{ remote_id: 1, text_corrected: '' }, { remote_id: 1, text_corrected: 'x' }],
        'Identifier 1 appears more than once in the reply',
      ],
      [
        'one record named under both id schemes',
        [{ remote_id: 2, text_corrected: '' }, { id: 2, text_corrected: 'bad text' }],
        'Identifier 2 appears more than once in the reply',
      ],
      [
        'an identifier that was not sent',
        [{ remote_id: 1, text_corrected: '' }, { remote_id: 9, text_corrected: 'x' }],
        'Identifier 9 was not part of the request',
      ],
      ['a missing text_corrected', [{ remote_id: 1 }], 'Reply element #1 has no text_corrected'],
      ['a missing identifier', [{ text_corrected: 'x' }], 'Reply element #1 has no remote_id or id'],
      ['a malformed field', [{ remote_id: { value: 1 }, text_corrected: 'x' }], 'Reply element #1 has malformed fields'],
    ];

    it.each(cases)('rejects %s before writing anything', async (_label, items, message) => {
      const attempt = reconcileResponse(store, inputFor(store, items));

      await expect(attempt).rejects.toThrow(ValidationError);
      await expect(reconcileResponse(store, inputFor(store, items))).rejects.toThrow(message);
      expect(store.items(TASK_ID).every((item) => item.status === 'pending')).toBe(true);
    });
  });
});

describe('reconcileResponse identifier fallbacks', () => {
  let store: MemoryTaskStore;

  beforeEach(() => {
    store = new MemoryTaskStore();
    store.addTask({ id: TASK_ID, stage: 'ai' });
    store.addItem(TASK_ID, 1, 'ok');
    store.addItem(TASK_ID, 2, 'fine');
    store.addItem(TASK_ID, 3, 'good');
    store.addItem(TASK_ID, null, 'teh cat');
  });

  it('matches an item sent under its own id through remote_id', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [{ remote_id: 4, text_corrected: 'the cat' }]));

    const [, , , orphan] = store.items(TASK_ID);
    expect(updated).toBe(1);
    expect(orphan).toMatchObject({ id: 4, status: 'changed', textCorrected: 'the cat', similarityScore: 85.71 });
  });

  it('matches through id_task_item when remote_id is absent', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [{ id_task_item: 4, text_corrected: 'the cat' }]));

    expect(updated).toBe(1);
    expect(store.items(TASK_ID)[3].status).toBe('changed');
  });

  it('reads the original text from the store when nothing was sent', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [{ id: 4, text_corrected: 'the cat' }], {
      lookup: buildOriginalTextLookup([]),
    }));

    expect(updated).toBe(1);
    expect(store.items(TASK_ID)[3].similarityScore).toBe(85.71);
  });

  it('counts only items the store actually updated', async () => {
    const updated = await reconcileResponse(store, inputFor(store, [{ remote_id: 40, text_corrected: 'x' }], {
      lookup: buildOriginalTextLookup([]),
    }));

    expect(updated).toBe(0);
  });
});
