import { z } from 'zod';
import { WorkItem } from '../services/pipeline/types.js';

/**
 * Pipeline Validation Schemas
 */

export const workItemSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_.-]{1,128}$/, 'Item id may only contain letters, digits, _ . -').optional(),
  title: z.string().trim().min(1, 'Title is required'),
  text: z.string().trim().min(1, 'Text is required'),
  url: z.string().url().optional(),
});

/**
 * Items without an id are numbered by position (`item-1`, `item-2`, ...)
 */
export const workItemListSchema = z
  .array(workItemSchema)
  .min(1, 'At least one item is required')
  .transform((items): WorkItem[] =>
    items.map((item, index) => ({
      id: item.id ?? `item-${index + 1}`,
      title: item.title,
      text: item.text,
      ...(item.url !== undefined && { url: item.url }),
    }))
  )
  .superRefine((items, ctx) => {
    const seen = new Set<string>();
    items.forEach((item, index) => {
      if (seen.has(item.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate item id: ${item.id}`,
        });
      }
      seen.add(item.id);
    });
  });

/**
 * POST /api/batches body
 */
export const createBatchSchema = z.object({
  items: workItemListSchema,
  interItemDelayMs: z.number().int().nonnegative().optional(),
  concurrency: z.number().int().min(1).max(16).optional(),
});

export type CreateBatchRequest = z.infer<typeof createBatchSchema>;

/**
 * Items file read by the CLI: a bare array, or an object with `items`
 */
export const itemsFileSchema = z.union([workItemListSchema, z.object({ items: workItemListSchema })]);

export const runIdParamSchema = z.object({
  runId: z.string().uuid('Invalid run id'),
});
