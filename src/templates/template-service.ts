/**
 * Template Service
 *
 * Authoring side of guide templates: create, update, get, list.
 * Checklists forked earlier keep their own snapshot, so updates here never
 * reach existing checklists.
 *
 * Only the creator may update a template. Official templates are created by
 * the seeder under SYSTEM_USER_ID and cannot be edited through the API.
 */

import { randomUUID } from 'node:crypto';
import type { TemplateStore } from '../checklist/ports.js';
import { ForbiddenError, InvalidArgumentError, NotFoundError } from '../checklist/errors.js';
import type {
  CreateTemplateInput,
  Template,
  TemplateStep,
  UpdateTemplateInput,
} from './types.js';

export interface TemplateServiceOptions {
  now?: () => Date;
  generateId?: () => string;
}

/**
 * Step orders must be exactly 0..n-1 (any listing order).
 * Returns the steps sorted by order.
 */
export function normalizeSteps(steps: readonly TemplateStep[]): TemplateStep[] {
  const sorted = [...steps].sort((a, b) => a.order - b.order);
  sorted.forEach((step, index) => {
    if (step.order !== index) {
      throw new InvalidArgumentError(
        `Step orders must be unique and contiguous from 0; expected ${index}, found ${step.order}`,
      );
    }
  });
  return sorted.map((step) => ({ title: step.title, description: step.description, order: step.order }));
}

export class TemplateService {
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(
    private readonly store: TemplateStore,
    options: TemplateServiceOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * @throws InvalidArgumentError if step orders are not contiguous or the parent does not exist
   */
  async create(input: CreateTemplateInput, userId: string): Promise<Template> {
    const steps = normalizeSteps(input.steps);

    if (input.parentId !== null) {
      const parent = await this.store.getById(input.parentId);
      if (!parent) {
        throw new InvalidArgumentError(`Parent template ${input.parentId} does not exist`);
      }
    }

    const timestamp = this.now().toISOString();
    const template: Template = {
      id: this.generateId(),
      title: input.title,
      description: input.description,
      locationTag: input.locationTag,
      steps,
      parentId: input.parentId,
      createdBy: userId,
      isOfficial: false,
      createdAt: timestamp,
      updatedAt: timestamp,
    };

    await this.store.save(template);
    console.log('[templates] Created template', { templateId: template.id, steps: steps.length });
    return template;
  }

  /**
   * @throws NotFoundError if the template does not exist
   * @throws ForbiddenError if the template is official or `userId` did not create it
   */
  async update(templateId: string, input: UpdateTemplateInput, userId: string): Promise<Template> {
    const existing = await this.get(templateId);
    if (existing.isOfficial) {
      throw new ForbiddenError(`Template ${templateId} is official and cannot be edited`);
    }
    if (existing.createdBy !== userId) {
      throw new ForbiddenError(`Template ${templateId} belongs to another user`);
    }

    const updated: Template = {
      ...existing,
      title: input.title ?? existing.title,
      description: input.description ?? existing.description,
      locationTag: input.locationTag ?? existing.locationTag,
      steps: input.steps ? normalizeSteps(input.steps) : existing.steps,
      updatedAt: this.now().toISOString(),
    };

    await this.store.save(updated);
    console.log('[templates] Updated template', { templateId });
    return updated;
  }

  /** @throws NotFoundError if the template does not exist */
  async get(templateId: string): Promise<Template> {
    const template = await this.store.getById(templateId);
    if (!template) {
      throw new NotFoundError(`Template ${templateId} not found`);
    }
    return template;
  }

  /** Newest first. */
  async list(): Promise<Template[]> {
    return this.store.list();
  }
}
