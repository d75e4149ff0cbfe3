/**
 * Storage contracts consumed by the checklist engine and template service.
 *
 * Implementations: storage/redis-*.ts (production), storage/memory-store.ts
 * (local development and tests).
 */

import type { Template } from '../templates/types.js';
import type { UserChecklist } from './types.js';

export interface TemplateStore {
  /** Returns null when no template has this id. Steps come back in stable order. */
  getById(id: string): Promise<Template | null>;
  /** All templates, newest first. */
  list(): Promise<Template[]>;
  /** Insert or replace. */
  save(template: Template): Promise<void>;
  /** Fails with StorageUnavailableError when the backend cannot be reached. */
  ping(): Promise<void>;
}

export interface ChecklistStore {
  insert(checklist: UserChecklist): Promise<void>;
  getById(id: string): Promise<UserChecklist | null>;
  /**
   * Writes a single progress entry and bumps updatedAt, leaving every other
   * step untouched. Throws NotFoundError if the checklist no longer exists.
   * Stores that only support whole-record writes throw ConflictRetryableError
   * when the record changed underneath them.
   */
  updateStepProgress(
    id: string,
    stepIndex: number,
    completed: boolean,
    timestamp: string,
  ): Promise<void>;
  /** The user's checklists, newest first. */
  listByUser(userId: string): Promise<UserChecklist[]>;
  /** Returns false when nothing was deleted. */
  delete(id: string): Promise<boolean>;
}
