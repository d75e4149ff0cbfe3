import type { ChecklistProgress, StepProgress } from './types.js';

/**
 * Derives completion counts from a checklist's progress entries.
 *
 * Never persisted: every response recomputes it so it cannot drift from the
 * stored entries. A checklist without steps is 0% complete.
 */
export function computeProgress(checklist: { progress: readonly StepProgress[] }): ChecklistProgress {
  const totalCount = checklist.progress.length;
  const completedCount = checklist.progress.filter((entry) => entry.completed).length;
  const percentage = totalCount === 0 ? 0 : (completedCount / totalCount) * 100;

  return { completedCount, totalCount, percentage };
}

/** Fresh, all-incomplete progress for a checklist with `stepCount` steps. */
export function initialProgress(stepCount: number): StepProgress[] {
  return Array.from({ length: stepCount }, (_, stepIndex) => ({
    stepIndex,
    completed: false,
    completedAt: null,
  }));
}
