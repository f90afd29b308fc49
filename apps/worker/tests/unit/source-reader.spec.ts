import { afterEach, describe, expect, it } from 'vitest';
import { toScalar, toSourceRecord } from '../../src/integrations/source/mapper.js';
import { SourceReader } from '../../src/integrations/source/index.js';
import { SqliteDriver } from '../../src/integrations/source/drivers/sqlite.js';
import { ValidationError } from '../../src/utils/errors.js';
import { createSource, TARGET, type TestSource } from '../helpers/sqlite-source.js';

describe('SourceReader over sqlite', () => {
  let source: TestSource;

  afterEach(() => {
    source.db.close();
  });

  it('measures the table', async () => {
    source = createSource([[1, 'ok'], [2, 'bad txt'], [3, 'fine'], [5, null]]);
    await expect(source.reader.probe()).resolves.toBeUndefined();
    expect(await source.reader.count()).toBe(4);
    expect(await source.reader.maxId()).toBe(5);
  });

  it('reports 0 as the max id of an empty table', async () => {
    source = createSource([]);
    expect(await source.reader.count()).toBe(0);
    expect(await source.reader.maxId()).toBe(0);
  });

  it('pages in ascending id order after the marker', async () => {
    source = createSource([[3, 'fine'], [1, 'ok'], [2, 'bad txt'], [5, null]]);

    expect(await source.reader.fetchAfter(0, 2)).toEqual({
      records: [{ remoteId: 1, textValue: 'ok' }, { remoteId: 2, textValue: 'bad txt' }],
      rowCount: 2,
    });
    expect(await source.reader.fetchAfter(3, 10)).toEqual({
      records: [{ remoteId: 5, textValue: '' }],
      rowCount: 1,
    });
  });

  it('fails the probe when a column is missing', async () => {
    source = createSource([[1, 'ok']]);
    const reader = new SourceReader(new SqliteDriver(source.db), { ...TARGET, textColumn: 'missing' });
    await expect(reader.probe()).rejects.toThrow(ValidationError);
  });
});

describe('toSourceRecord', () => {
  it('normalises driver rows', () => {
    expect(toSourceRecord({ remote_id: '7', text_value: 'x' })).toEqual({ remoteId: 7, textValue: 'x' });
    expect(toSourceRecord({ REMOTE_ID: 8n, TEXT_VALUE: Buffer.from('zażółć') })).toEqual({
      remoteId: 8,
      textValue: 'zażółć',
    });
    expect(toSourceRecord({ remote_id: 9, text_value: 12 })).toEqual({ remoteId: 9, textValue: '12' });
  });

  it('skips rows without an id', () => {
    expect(toSourceRecord({ remote_id: null, text_value: 'x' })).toBeNull();
  });

  it('rejects non-integer ids', () => {
    expect(() => toSourceRecord({ remote_id: 'abc', text_value: 'x' })).toThrow(ValidationError);
  });
});

describe('toScalar', () => {
  it('reads aggregates and defaults to 0', () => {
    expect(toScalar({ total_count: '12' }, 'total_count')).toBe(12);
    expect(toScalar({ max_id: null }, 'max_id')).toBe(0);
    expect(toScalar(undefined, 'max_id')).toBe(0);
    expect(() => toScalar({ max_id: 'zz' }, 'max_id')).toThrow('Source returned a non-integer max_id: zz');
  });
});
