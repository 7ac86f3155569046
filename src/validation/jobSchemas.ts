import { z } from 'zod';
import { JOB_KINDS, JOB_STATUSES } from '../types/jobs.js';

/**
 * Job Validation Schemas
 *
 * Used to read job records back from storage and to validate job API requests
 */

export const jobStatusSchema = z.enum(JOB_STATUSES);

export const jobKindSchema = z.enum(JOB_KINDS);

export const jobInputSchema = z.object({
  type: z.enum(['video', 'audio', 'image', 'text']),
  url: z.string().min(1),
  contentType: z.string().optional(),
});

export const jobErrorInfoSchema = z.object({
  kind: z.string(),
  message: z.string(),
});

/**
 * Job as persisted by the file-backed store
 */
export const storedJobSchema = z.object({
  id: z.string().min(1),
  kind: jobKindSchema,
  status: jobStatusSchema,
  inputs: z.array(jobInputSchema).default([]),
  remote_output_url: z.string().optional(),
  rehosted_url: z.string().optional(),
  error: jobErrorInfoSchema.optional(),
  attempts: z.number().int().nonnegative().default(0),
  item_id: z.string().optional(),
  stage: z.string().optional(),
  data: z.unknown().optional(),
  created_at: z.string(),
  last_checked: z.string().optional(),
});

export type StoredJob = z.infer<typeof storedJobSchema>;

/**
 * GET /api/jobs query string
 */
export const listJobsQuerySchema = z.object({
  status: jobStatusSchema.optional(),
  kind: jobKindSchema.optional(),
  itemId: z.string().optional(),
  limit: z
    .string()
    .regex(/^[1-9]\d*$/, 'limit must be a positive integer')
    .transform(Number)
    .optional(),
});

/**
 * Job id path parameter: the ids the rendering service hands out, or local audio ids
 */
export const jobIdParamSchema = z.object({
  id: z.string().regex(/^[A-Za-z0-9_-]{1,128}$/, 'Invalid job id'),
});
