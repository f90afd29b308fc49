import type { PendingItem } from '@redline/shared';

const BASE_RULES = [
  '- Every <INPUT> element must appear in the <OUTPUT_FORMAT> JSON array.',
  '- Do not change the meaning of any sentence.',
  '- Every entry must have a "remote_id" key equal to the sentence number.',
  '- Do not add any comments or text outside the JSON.',
  '- Treat every sentence as a separate unit.',
  '- Include every <INPUT> in the reply. If an <INPUT> needs no correction and the text would be returned unchanged, return "text_corrected" as an empty string.',
];

/** Number shown before each input line: remote id, else item id, else `?`. */
export function promptIdentifier(item: Pick<PendingItem, 'id' | 'remoteId'>): string {
  if (item.remoteId !== null) return String(item.remoteId);
  return Number.isInteger(item.id) ? String(item.id) : '?';
}

export function flattenText(text: string | null): string {
  return (text ?? '').replace(/[\r\n]/g, ' ').trim();
}

/**
 * Builds the correction prompt. Item order is preserved and the output is
 * fully determined by the inputs.
 */
export function buildCorrectionPrompt(items: readonly PendingItem[], userRules?: string | null): string {
  const rules = [...BASE_RULES];
  const extra = (userRules ?? '').trim();
  if (extra) rules.push(`- ${extra}`);

  return [
    '<SYSTEM>',
    'Model: keep the output strictly in JSON format and add no comments or text outside the JSON.',
    '</SYSTEM>',
    '<TASK>',
    'For every element of the <INPUT> list, correct spelling, punctuation or style where needed.',
    'Do not remove words, only correct the text.',
    'If no correction is needed, leave "text_corrected" as an empty string "".',
    '</TASK>',
    '<RULES>',
    ...rules,
    '</RULES>',
    '<OUTPUT_FORMAT>',
    '[',
    '  {"remote_id":1,"text_corrected":"..."}',
    ']',
    '</OUTPUT_FORMAT>',
    '<INPUT>',
    ...items.map((item) => `${promptIdentifier(item)}. ${flattenText(item.textOriginal)}`),
    '</INPUT>',
  ].join('\n');
}

/**
 * Leading items whose combined original text fits in `maxChars`. The first
 * item is always kept so an oversized record cannot stall the queue.
 */
export function selectPromptItems<T extends Pick<PendingItem, 'textOriginal'>>(
  items: readonly T[],
  maxChars: number | null,
): T[] {
  if (maxChars === null || maxChars <= 0) return [...items];

  const selected: T[] = [];
  let used = 0;
  for (const item of items) {
    const length = flattenText(item.textOriginal).length;
    if (selected.length > 0 && used + length > maxChars) break;
    selected.push(item);
    used += length;
  }
  return selected;
}
