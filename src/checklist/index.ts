// ============================================================================
// Checklist Module: Barrel Export
// ============================================================================
//
// Public API for forking templates into checklists and tracking progress.
// Storage implementations live in src/storage/ and are wired in src/index.ts.

export type {
  StepProgress,
  UserChecklist,
  ChecklistProgress,
  ChecklistView,
} from './types.js';

export type { TemplateStore, ChecklistStore } from './ports.js';

export { ChecklistProgressEngine } from './engine.js';
export type { EngineOptions } from './engine.js';

export { computeProgress, initialProgress } from './progress.js';

export {
  ChecklistError,
  NotFoundError,
  ForbiddenError,
  InvalidArgumentError,
  ConflictRetryableError,
  StorageUnavailableError,
} from './errors.js';
export type { ChecklistErrorCode } from './errors.js';
