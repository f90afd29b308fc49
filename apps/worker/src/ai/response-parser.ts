import { aiResponseEnvelopeSchema } from '@redline/shared';
import { ValidationError } from '../utils/errors.js';

export type ParsedItem = Record<string, unknown>;

const FENCE_PATTERN = /```(?:json)?\s*([\s\S]*?)```/i;

/**
 * Reads a quoted string starting at `start` (the opening quote), resolving
 * backslash escapes. Returns null when the quote is never closed.
 */
function readQuoted(source: string, start: number): string | null {
  const quote = source[start];
  let out = '';
  for (let i = start + 1; i < source.length; i++) {
    const ch = source[i];
    if (ch === '\\' && i + 1 < source.length) {
      const next = source[++i];
      out += next === 'n' ? '\n' : next === 't' ? '\t' : next === 'r' ? '\r' : next;
      continue;
    }
    if (ch === quote) return out;
    out += ch;
  }
  return null;
}

/**
 * Locates the JSON payload in a model reply: the reply itself, a fenced
 * code block, or the quoted value after `content=` in a dumped object.
 */
export function extractJsonText(responseText: string): string {
  const stripped = responseText.trim();
  if (stripped.startsWith('{') || stripped.startsWith('[')) return stripped;

  const fenced = FENCE_PATTERN.exec(stripped);
  if (fenced) return fenced[1].trim();

  const markerIndex = stripped.indexOf('content=');
  if (markerIndex === -1) return stripped;

  const remainder = stripped.slice(markerIndex + 'content='.length).trimStart();
  if (remainder[0] !== '"' && remainder[0] !== "'") return stripped;
  return readQuoted(remainder, 0)?.trim() ?? stripped;
}

function isObject(value: unknown): value is ParsedItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses the reply into a list of objects. A top-level object must carry
 * the list under `items`.
 */
export function parseJsonResponse(responseText: string): ParsedItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJsonText(responseText));
  } catch {
    throw new ValidationError('Model reply is not valid JSON');
  }

  if (isObject(parsed)) {
    const envelope = aiResponseEnvelopeSchema.safeParse(parsed);
    if (!envelope.success) {
      throw new ValidationError('Model reply has no items list');
    }
    parsed = envelope.data.items;
  }

  if (!Array.isArray(parsed)) {
    throw new ValidationError('Model reply must be a JSON array of objects');
  }

  return parsed.map((item, index) => {
    if (!isObject(item)) {
      throw new ValidationError(`Element #${index + 1} of the model reply is not an object`);
    }
    return item;
  });
}
