/**
 * Official Template Seeding
 *
 * Loads the guide templates that ship with the service from
 * data/official-templates.json and saves any that are missing from the
 * store. Runs once at startup, before the server accepts requests; existing
 * records (including edits made after an earlier seed) are left alone.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { TemplateStore } from '../checklist/ports.js';
import { SYSTEM_USER_ID, TemplateStepSchema } from './types.js';
import { normalizeSteps } from './template-service.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const OFFICIAL_TEMPLATES_PATH = path.resolve(__dirname, '../../data/official-templates.json');

const SeedTemplateSchema = z.object({
  id: z.string().uuid(),
  title: z.string().min(1),
  description: z.string().min(1),
  locationTag: z.string().min(1),
  steps: z.array(TemplateStepSchema),
});

export type SeedTemplate = z.infer<typeof SeedTemplateSchema>;

export async function loadOfficialTemplates(filePath = OFFICIAL_TEMPLATES_PATH): Promise<SeedTemplate[]> {
  const raw = await readFile(filePath, 'utf-8');
  return z.array(SeedTemplateSchema).parse(JSON.parse(raw));
}

/**
 * Save every seed template the store does not have yet.
 * @returns number of templates written
 */
export async function seedOfficialTemplates(
  store: TemplateStore,
  seeds: readonly SeedTemplate[],
  now: () => Date = () => new Date(),
): Promise<number> {
  let written = 0;

  for (const seed of seeds) {
    const existing = await store.getById(seed.id);
    if (existing) continue;

    const timestamp = now().toISOString();
    await store.save({
      id: seed.id,
      title: seed.title,
      description: seed.description,
      locationTag: seed.locationTag,
      steps: normalizeSteps(seed.steps),
      parentId: null,
      createdBy: SYSTEM_USER_ID,
      isOfficial: true,
      createdAt: timestamp,
      updatedAt: timestamp,
    });
    written++;
  }

  return written;
}
