import pino from 'pino';
import { beforeEach, describe, expect, it } from 'vitest';
import { recordFailure } from '../../src/tasks/error-log.js';
import { MemoryTaskStore } from '../helpers/memory-task-store.js';

describe('recordFailure', () => {
  let lines: string[];
  let log: pino.Logger;
  let store: MemoryTaskStore;

  beforeEach(() => {
    lines = [];
    log = pino({ base: undefined, timestamp: false }, {
      write: (line: string) => {
        lines.push(line);
      },
    });
    store = new MemoryTaskStore();
    store.addTask({ id: 1 });
  });

  it('logs the message under the error key and appends it to the task', async () => {
    await recordFailure(store, 1, 'Fetch failed', new Error('disk full'), log);

    expect(lines.map((line) => JSON.parse(line))).toEqual([{ level: 50, error: 'disk full', msg: 'Fetch failed' }]);
    expect(store.task(1).errorLog).toBe('Fetch failed: disk full');
  });

  it('logs a failed append without throwing', async () => {
    store.failOn('appendError', new Error('connection reset'));

    await recordFailure(store, 1, 'Resync failed', 'timeout', log);

    expect(lines.map((line) => JSON.parse(line))).toEqual([
      { level: 50, error: 'timeout', msg: 'Resync failed' },
      { level: 50, error: 'connection reset', msg: 'Failed to append to task error log' },
    ]);
    expect(store.task(1).errorLog).toBeNull();
  });
});
