import { describe, expect, it } from 'vitest';
import type { TaskStage } from '@redline/shared';
import {
  assertTransition,
  canTransition,
  completeExport,
  requestResync,
  resolveStage,
} from '../../src/tasks/lifecycle.js';
import { ValidationError } from '../../src/utils/errors.js';
import { MemoryTaskStore } from '../helpers/memory-task-store.js';

const allowed: Array<[TaskStage, TaskStage]> = [
  ['new', 'fetch'],
  ['fetch', 'ai'],
  ['fetch', 'resync'],
  ['resync', 'fetch'],
  ['ai', 'export'],
  ['ai', 'resync'],
  ['export', 'done'],
  ['export', 'resync'],
  ['done', 'resync'],
  ['ai', 'ai'],
];

const rejected: Array<[TaskStage, TaskStage]> = [
  ['new', 'ai'],
  ['new', 'resync'],
  ['fetch', 'done'],
  ['ai', 'fetch'],
  ['done', 'fetch'],
  ['resync', 'ai'],
];

describe('stage transitions', () => {
  it.each(allowed)('allows %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(true);
  });

  it.each(rejected)('rejects %s -> %s', (from, to) => {
    expect(canTransition(from, to)).toBe(false);
  });

  it('names the illegal transition', () => {
    expect(() => assertTransition('new', 'ai')).toThrow('Illegal stage transition: new -> ai');
  });
});

describe('resolveStage', () => {
  it('moves a completed fetch to ai', () => {
    expect(resolveStage('fetch', { recordsTotal: 3, recordsFetched: 3, recordsProcessed: 0 })).toBe('ai');
  });

  it('chains straight to export when everything is already processed', () => {
    expect(resolveStage('fetch', { recordsTotal: 3, recordsFetched: 3, recordsProcessed: 3 })).toBe('export');
    expect(resolveStage('ai', { recordsTotal: 3, recordsFetched: 3, recordsProcessed: 3 })).toBe('export');
  });

  it('stays put while work remains or the source is empty', () => {
    expect(resolveStage('fetch', { recordsTotal: 3, recordsFetched: 2, recordsProcessed: 0 })).toBe('fetch');
    expect(resolveStage('fetch', { recordsTotal: 0, recordsFetched: 0, recordsProcessed: 0 })).toBe('fetch');
    expect(resolveStage('ai', { recordsTotal: 3, recordsFetched: 3, recordsProcessed: 2 })).toBe('ai');
  });

  it('leaves the other stages alone', () => {
    const complete = { recordsTotal: 3, recordsFetched: 3, recordsProcessed: 3 };
    expect(resolveStage('new', complete)).toBe('new');
    expect(resolveStage('resync', complete)).toBe('resync');
    expect(resolveStage('done', complete)).toBe('done');
  });
});

describe('requestResync', () => {
  it('sends a finished task back to resync from the first id', async () => {
    const store = new MemoryTaskStore();
    store.addTask({ id: 4, stage: 'done', resyncMarkerId: 9 });

    await requestResync(store, 4);

    expect(store.task(4)).toMatchObject({ stage: 'resync', resyncMarkerId: 0, description: 'Resync requested from stage done' });
  });

  it('refuses tasks that were never fetched', async () => {
    const store = new MemoryTaskStore();
    store.addTask({ id: 4, stage: 'new' });

    await expect(requestResync(store, 4)).rejects.toThrow(ValidationError);
    expect(store.task(4).stage).toBe('new');
  });

  it('reports unknown tasks', async () => {
    await expect(requestResync(new MemoryTaskStore(), 9)).rejects.toThrow('Task 9 not found');
  });
});

describe('completeExport', () => {
  it('finishes an exported task', async () => {
    const store = new MemoryTaskStore();
    store.addTask({ id: 2, stage: 'export' });

    await completeExport(store, 2);

    expect(store.task(2)).toMatchObject({ stage: 'done', description: 'Export completed' });
  });

  it('rejects tasks still being corrected', async () => {
    const store = new MemoryTaskStore();
    store.addTask({ id: 2, stage: 'ai' });

    await expect(completeExport(store, 2)).rejects.toThrow('Illegal stage transition: ai -> done');
  });
});
