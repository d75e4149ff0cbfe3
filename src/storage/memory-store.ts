/**
 * In-Memory Stores
 *
 * Process-local TemplateStore and ChecklistStore for local development
 * (STORAGE_DRIVER=memory) and tests. Every read and write goes through
 * structuredClone, so callers never share references with stored records,
 * the same isolation a real backend gives.
 *
 * Step writes touch a single progress entry, matching the per-field
 * semantics of the Redis store.
 */

import type { ChecklistStore, TemplateStore } from '../checklist/ports.js';
import type { UserChecklist } from '../checklist/types.js';
import { InvalidArgumentError, NotFoundError } from '../checklist/errors.js';
import type { Template } from '../templates/types.js';

function newestFirst(a: { createdAt: string }, b: { createdAt: string }): number {
  return b.createdAt.localeCompare(a.createdAt);
}

export class InMemoryTemplateStore implements TemplateStore {
  private readonly records = new Map<string, Template>();

  async getById(id: string): Promise<Template | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async list(): Promise<Template[]> {
    return [...this.records.values()].sort(newestFirst).map((record) => structuredClone(record));
  }

  async save(template: Template): Promise<void> {
    this.records.set(template.id, structuredClone(template));
  }

  async ping(): Promise<void> {
    // Always reachable
  }
}

export class InMemoryChecklistStore implements ChecklistStore {
  private readonly records = new Map<string, UserChecklist>();

  async insert(checklist: UserChecklist): Promise<void> {
    this.records.set(checklist.id, structuredClone(checklist));
  }

  async getById(id: string): Promise<UserChecklist | null> {
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async updateStepProgress(
    id: string,
    stepIndex: number,
    completed: boolean,
    timestamp: string,
  ): Promise<void> {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(`Checklist ${id} not found`);
    }
    if (!Number.isInteger(stepIndex) || stepIndex < 0 || stepIndex >= record.steps.length) {
      throw new InvalidArgumentError(`Step index ${stepIndex} is out of range for checklist ${id}`);
    }
    record.progress[stepIndex] = {
      stepIndex,
      completed,
      completedAt: completed ? timestamp : null,
    };
    record.updatedAt = timestamp;
  }

  async listByUser(userId: string): Promise<UserChecklist[]> {
    return [...this.records.values()]
      .filter((record) => record.userId === userId)
      .sort(newestFirst)
      .map((record) => structuredClone(record));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }
}
