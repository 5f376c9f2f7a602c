/**
 * Message Batches API request schemas
 */

import { z } from 'zod';
import { MessageParamsSchema } from './messages.js';

/**
 * Hard ceiling on entries per batch; the configured limit may be lower.
 */
export const MAX_BATCH_ENTRIES = 100;

export const BatchEntryInputSchema = z.object({
  custom_id: z
    .string()
    .min(1, 'custom_id cannot be empty')
    .max(64, 'custom_id cannot exceed 64 characters'),
  params: MessageParamsSchema,
});

export const CreateBatchRequestSchema = z
  .object({
    requests: z
      .array(BatchEntryInputSchema)
      .min(1, 'A batch needs at least one request')
      .max(MAX_BATCH_ENTRIES, `A batch cannot exceed ${MAX_BATCH_ENTRIES} requests`),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.requests.forEach((entry, index) => {
      if (seen.has(entry.custom_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate custom_id '${entry.custom_id}'`,
          path: ['requests', index, 'custom_id'],
        });
      }
      seen.add(entry.custom_id);
    });
  });

export type BatchEntryInput = z.input<typeof BatchEntryInputSchema>;
export type BatchEntryParams = z.infer<typeof BatchEntryInputSchema>;
export type CreateBatchRequest = z.infer<typeof CreateBatchRequestSchema>;
