/**
 * Template Type Definitions
 *
 * A template is a reusable, ordered guide ("first time renting in Beijing")
 * authored once and forked into many user checklists.
 *
 * Zod schemas double as the runtime validator for API input and for records
 * read back from storage.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

export const TemplateStepSchema = z.object({
  title: z.string().trim().min(1).max(500),
  description: z.string().nullable().default(null),
  /** 0-indexed position; unique and contiguous within a template */
  order: z.number().int().min(0),
});

/** One ordered unit of guidance */
export type TemplateStep = z.infer<typeof TemplateStepSchema>;

// ---------------------------------------------------------------------------
// Template record
// ---------------------------------------------------------------------------

/** Creator id used for templates shipped with the service */
export const SYSTEM_USER_ID = 'system';

export const TemplateSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  description: z.string(),
  /** Region the guide applies to, e.g. "CN" or "CN-BJ" */
  locationTag: z.string(),
  steps: z.array(TemplateStepSchema),
  /** Template this one was derived from (not used by forking) */
  parentId: z.string().nullable(),
  createdBy: z.string(),
  isOfficial: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type Template = z.infer<typeof TemplateSchema>;

// ---------------------------------------------------------------------------
// API input
// ---------------------------------------------------------------------------

export const CreateTemplateInputSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().trim().min(1).max(2000),
  locationTag: z.string().trim().min(1).max(50),
  steps: z.array(TemplateStepSchema).min(1),
  parentId: z.string().uuid().nullable().default(null),
});

export type CreateTemplateInput = z.infer<typeof CreateTemplateInputSchema>;

export const UpdateTemplateInputSchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    description: z.string().trim().min(1).max(2000),
    locationTag: z.string().trim().min(1).max(50),
    steps: z.array(TemplateStepSchema).min(1),
  })
  .partial();

export type UpdateTemplateInput = z.infer<typeof UpdateTemplateInputSchema>;
