/**
 * Checklist Type Definitions
 *
 * A UserChecklist is a point-in-time snapshot of a template's title and
 * steps plus the owner's per-step completion state. Progress entries are
 * index-aligned with steps: progress[i].stepIndex === i.
 */

import { z } from 'zod';
import { TemplateStepSchema } from '../templates/types.js';
import type { TemplateStep } from '../templates/types.js';

// ---------------------------------------------------------------------------
// Step progress
// ---------------------------------------------------------------------------

export const StepProgressSchema = z.object({
  stepIndex: z.number().int().min(0),
  completed: z.boolean(),
  /** ISO timestamp; set iff completed */
  completedAt: z.string().nullable(),
});

export type StepProgress = z.infer<typeof StepProgressSchema>;

// ---------------------------------------------------------------------------
// Checklist record
// ---------------------------------------------------------------------------

export interface UserChecklist {
  id: string;
  /** Owner, fixed at fork time */
  userId: string;
  sourceTemplateId: string;
  /** Copied from the template at fork time */
  title: string;
  /** Copied from the template at fork time, sorted by order */
  steps: TemplateStep[];
  progress: StepProgress[];
  createdAt: string;
  updatedAt: string;
}

export const StepListSchema = z.array(TemplateStepSchema);

// ---------------------------------------------------------------------------
// Derived views
// ---------------------------------------------------------------------------

/** Completion summary, always recomputed from progress (never stored) */
export interface ChecklistProgress {
  completedCount: number;
  totalCount: number;
  /** 0-100; 0 for a checklist without steps */
  percentage: number;
}

export interface ChecklistView {
  checklist: UserChecklist;
  progress: ChecklistProgress;
}
