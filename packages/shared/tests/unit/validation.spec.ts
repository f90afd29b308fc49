import { describe, expect, it } from 'vitest';
import {
  aiResponseEnvelopeSchema,
  aiResponseItemSchema,
  isAiProviderName,
  isDbDialect,
  isTaskStage,
} from '../../src/index.js';

describe('aiResponseItemSchema', () => {
  it('keeps unknown keys and accepts numeric strings', () => {
    const parsed = aiResponseItemSchema.parse({ remote_id: '7', text_corrected: 'x', note: 'kept' });

    expect(parsed).toEqual({ remote_id: '7', text_corrected: 'x', note: 'kept' });
  });

  it('allows a null text', () => {
    expect(aiResponseItemSchema.safeParse({ id: 1, text_corrected: null }).success).toBe(true);
  });

  it('rejects object identifiers', () => {
    expect(aiResponseItemSchema.safeParse({ remote_id: { id: 1 } }).success).toBe(false);
  });
});

describe('aiResponseEnvelopeSchema', () => {
  it('requires an items array', () => {
    expect(aiResponseEnvelopeSchema.safeParse({ items: [] }).success).toBe(true);
    expect(aiResponseEnvelopeSchema.safeParse({ items: {} }).success).toBe(false);
  });
});

describe('guards', () => {
  it('recognises task stages', () => {
    expect(isTaskStage('resync')).toBe(true);
    expect(isTaskStage('archived')).toBe(false);
  });

  it('recognises source dialects', () => {
    expect(isDbDialect('pgsql')).toBe(true);
    expect(isDbDialect('oracle')).toBe(false);
  });

  it('recognises provider names', () => {
    expect(isAiProviderName('Anthropic')).toBe(true);
    expect(isAiProviderName('anthropic')).toBe(false);
    expect(isAiProviderName(null)).toBe(false);
  });
});
