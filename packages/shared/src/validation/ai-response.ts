import { z } from 'zod';

const identifierSchema = z.union([z.number(), z.string()]).nullable().optional();

/**
 * One element of the correction model's reply. Identifier and text fields
 * stay optional here; their presence is enforced during reconciliation so
 * the error names the offending element.
 */
export const aiResponseItemSchema = z
  .object({
    remote_id: identifierSchema,
    id_task_item: identifierSchema,
    id: identifierSchema,
    text_corrected: z.string().nullable().optional(),
  })
  .passthrough();

export const aiResponseEnvelopeSchema = z.object({
  items: z.array(z.unknown()),
});

export type AiResponseItem = z.infer<typeof aiResponseItemSchema>;
