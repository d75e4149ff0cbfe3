/**
 * Checklist Progress Engine
 *
 * Owns the lifecycle of a user checklist forked from a template:
 *
 *   1. fork: snapshot a template's title and steps into a new checklist
 *   2. updateStep: toggle one step's completion (owner only)
 *   3. listByUser / getChecklist: read back with computed progress
 *   4. deleteChecklist: remove (owner only)
 *
 * The engine holds no state between calls. Every operation is a read from
 * and (at most) one write to the ChecklistStore, injected at construction
 * together with the TemplateStore.
 *
 * Concurrency:
 * - Step writes are per-step (ChecklistStore.updateStepProgress), so two
 *   callers toggling different steps of the same checklist never clobber
 *   each other.
 * - Stores that can only detect conflicts report ConflictRetryableError;
 *   the engine re-reads and retries up to maxConflictRetries times.
 *
 * Both step transitions are always allowed (complete -> incomplete included).
 */

import { randomUUID } from 'node:crypto';
import type { ChecklistStore, TemplateStore } from './ports.js';
import type { ChecklistView, UserChecklist } from './types.js';
import { computeProgress, initialProgress } from './progress.js';
import {
  ConflictRetryableError,
  ForbiddenError,
  InvalidArgumentError,
  NotFoundError,
} from './errors.js';

export interface EngineOptions {
  /** Clock used for createdAt/updatedAt/completedAt */
  now?: () => Date;
  /** Checklist id generator */
  generateId?: () => string;
  /** Extra attempts after a ConflictRetryableError (default 3) */
  maxConflictRetries?: number;
}

const DEFAULT_MAX_CONFLICT_RETRIES = 3;

function toView(checklist: UserChecklist): ChecklistView {
  return { checklist, progress: computeProgress(checklist) };
}

export class ChecklistProgressEngine {
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly maxConflictRetries: number;

  constructor(
    private readonly templates: TemplateStore,
    private readonly checklists: ChecklistStore,
    options: EngineOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.maxConflictRetries = options.maxConflictRetries ?? DEFAULT_MAX_CONFLICT_RETRIES;
  }

  /**
   * Fork a template into a new checklist owned by `userId`.
   *
   * Title and steps are deep-copied, so later template edits never reach
   * the checklist. Every step starts incomplete.
   *
   * @throws NotFoundError if the template does not exist
   */
  async fork(userId: string, templateId: string): Promise<ChecklistView> {
    const template = await this.templates.getById(templateId);
    if (!template) {
      throw new NotFoundError(`Template ${templateId} not found`);
    }

    const steps = [...template.steps]
      .sort((a, b) => a.order - b.order)
      .map((step) => ({ title: step.title, description: step.description, order: step.order }));

    const timestamp = this.now().toISOString();
    const checklist: UserChecklist = {
      id: this.generateId(),
      userId,
      sourceTemplateId: template.id,
      title: template.title,
      steps,
      progress: initialProgress(steps.length),
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.checklists.insert(checklist);
    console.log('[checklist] Forked template', {
      checklistId: checklist.id,
      templateId,
      steps: steps.length,
    });

    return toView(checklist);
  }

  /**
   * Fetch one checklist with its progress.
   *
   * @throws NotFoundError if the checklist does not exist
   * @throws ForbiddenError if `userId` is not the owner
   */
  async getChecklist(userId: string, checklistId: string): Promise<ChecklistView> {
    const checklist = await this.loadOwned(userId, checklistId);
    return toView(checklist);
  }

  /**
   * Set one step's completion flag.
   *
   * Idempotent: when the step is already in the requested state nothing is
   * written and completedAt keeps its original value.
   *
   * @throws NotFoundError if the checklist does not exist
   * @throws ForbiddenError if `userId` is not the owner
   * @throws InvalidArgumentError if stepIndex is not an index into steps
   * @throws ConflictRetryableError if the write kept conflicting after all retries
   */
  async updateStep(
    userId: string,
    checklistId: string,
    stepIndex: number,
    completed: boolean,
  ): Promise<ChecklistView> {
    for (let attempt = 0; ; attempt++) {
      const checklist = await this.loadOwned(userId, checklistId);

      if (!Number.isInteger(stepIndex) || stepIndex < 0 || stepIndex >= checklist.steps.length) {
        throw new InvalidArgumentError(
          `Step index ${stepIndex} is out of range for checklist ${checklistId} ` +
          `(${checklist.steps.length} steps)`,
        );
      }

      if (checklist.progress[stepIndex].completed === completed) {
        return toView(checklist);
      }

      try {
        await this.checklists.updateStepProgress(
          checklistId,
          stepIndex,
          completed,
          this.now().toISOString(),
        );
      } catch (err) {
        if (err instanceof ConflictRetryableError && attempt < this.maxConflictRetries) {
          console.warn('[checklist] Step write conflicted, retrying', {
            checklistId,
            stepIndex,
            attempt: attempt + 1,
          });
          continue;
        }
        throw err;
      }

      const updated = await this.checklists.getById(checklistId);
      if (!updated) {
        throw new NotFoundError(`Checklist ${checklistId} not found`);
      }
      return toView(updated);
    }
  }

  /** All of the user's checklists, newest first, each with progress. */
  async listByUser(userId: string): Promise<ChecklistView[]> {
    const checklists = await this.checklists.listByUser(userId);
    return checklists.map(toView);
  }

  /**
   * @throws NotFoundError if the checklist does not exist
   * @throws ForbiddenError if `userId` is not the owner
   */
  async deleteChecklist(userId: string, checklistId: string): Promise<void> {
    await this.loadOwned(userId, checklistId);

    const deleted = await this.checklists.delete(checklistId);
    if (!deleted) {
      throw new NotFoundError(`Checklist ${checklistId} not found`);
    }
    console.log('[checklist] Deleted checklist', { checklistId });
  }

  private async loadOwned(userId: string, checklistId: string): Promise<UserChecklist> {
    const checklist = await this.checklists.getById(checklistId);
    if (!checklist) {
      throw new NotFoundError(`Checklist ${checklistId} not found`);
    }
    if (checklist.userId !== userId) {
      throw new ForbiddenError(`Checklist ${checklistId} belongs to another user`);
    }
    return checklist;
  }
}
