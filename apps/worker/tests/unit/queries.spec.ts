import { describe, expect, it } from 'vitest';
import {
  buildCountQuery,
  buildFetchQuery,
  buildMaxIdQuery,
  buildProbeQuery,
} from '../../src/integrations/source/queries.js';
import { ValidationError } from '../../src/utils/errors.js';

const target = { table: 'articles', idColumn: 'id', textColumn: 'body' };

describe('buildFetchQuery', () => {
  it('uses LIMIT and ? for mysql and sqlite', () => {
    const expected = {
      text: 'SELECT id AS remote_id, body AS text_value FROM articles WHERE id > ? ORDER BY id ASC LIMIT 500',
      params: [10],
    };
    expect(buildFetchQuery('mysql', target, 10, 500)).toEqual(expected);
    expect(buildFetchQuery('sqlite', target, 10, 500)).toEqual(expected);
  });

  it('numbers the placeholder for pgsql', () => {
    expect(buildFetchQuery('pgsql', target, 0, 50).text).toBe(
      'SELECT id AS remote_id, body AS text_value FROM articles WHERE id > $1 ORDER BY id ASC LIMIT 50',
    );
  });

  it('uses TOP and a named parameter for mssql', () => {
    expect(buildFetchQuery('mssql', target, 3, 25)).toEqual({
      text: 'SELECT TOP 25 id AS remote_id, body AS text_value FROM articles WHERE id > @p1 ORDER BY id ASC',
      params: [3],
    });
  });

  it('rejects unsafe identifiers and bad batch sizes', () => {
    expect(() => buildFetchQuery('mysql', { ...target, table: 'articles;--' }, 0, 10)).toThrow(ValidationError);
    expect(() => buildFetchQuery('mysql', { ...target, textColumn: 'body text' }, 0, 10)).toThrow(ValidationError);
    expect(() => buildFetchQuery('mysql', target, 0, 0)).toThrow('Batch size must be a positive integer, got 0');
    expect(() => buildFetchQuery('mysql', target, 0, 2.5)).toThrow(ValidationError);
  });
});

describe('probe and aggregate queries', () => {
  it('reads a single row', () => {
    expect(buildProbeQuery('mssql', target).text).toBe(
      'SELECT TOP 1 id AS remote_id, body AS text_value FROM articles ORDER BY id ASC',
    );
    expect(buildProbeQuery('sqlite', target).text).toBe(
      'SELECT id AS remote_id, body AS text_value FROM articles ORDER BY id ASC LIMIT 1',
    );
  });

  it('aliases count and max', () => {
    expect(buildCountQuery(target)).toEqual({ text: 'SELECT COUNT(*) AS total_count FROM articles', params: [] });
    expect(buildMaxIdQuery(target)).toEqual({ text: 'SELECT MAX(id) AS max_id FROM articles', params: [] });
  });
});
