/**
 * Storage Bootstrap
 *
 * Picks the store implementations for the configured driver and prepares
 * them before the server accepts requests:
 *
 *   1. Ping the backend (fail fast when Redis is unreachable)
 *   2. Seed official templates that are missing
 */

import type { ChecklistStore, TemplateStore } from './checklist/ports.js';
import type { StorageDriver } from './config.js';
import { InMemoryChecklistStore, InMemoryTemplateStore } from './storage/memory-store.js';
import { RedisChecklistStore } from './storage/redis-checklist-store.js';
import { RedisTemplateStore } from './storage/redis-template-store.js';
import { closeRedis, getRedis } from './storage/redis.js';
import { loadOfficialTemplates, seedOfficialTemplates } from './templates/index.js';
import type { SeedTemplate } from './templates/index.js';

export interface Stores {
  templates: TemplateStore;
  checklists: ChecklistStore;
  /** Release connections held by the stores */
  close: () => Promise<void>;
}

export function createStores(driver: StorageDriver): Stores {
  if (driver === 'memory') {
    return {
      templates: new InMemoryTemplateStore(),
      checklists: new InMemoryChecklistStore(),
      close: async () => {},
    };
  }

  const redis = getRedis();
  return {
    templates: new RedisTemplateStore(redis),
    checklists: new RedisChecklistStore(redis),
    close: closeRedis,
  };
}

export interface PrepareOptions {
  seedTemplates: boolean;
  loadSeeds?: () => Promise<SeedTemplate[]>;
}

export async function prepareStorage(
  templates: TemplateStore,
  { seedTemplates, loadSeeds = () => loadOfficialTemplates() }: PrepareOptions,
): Promise<void> {
  await templates.ping();
  console.log('[startup] Storage reachable');

  if (!seedTemplates) {
    console.log('[startup] Template seeding disabled');
    return;
  }

  const seeds = await loadSeeds();
  const written = await seedOfficialTemplates(templates, seeds);
  console.log('[startup] Official templates seeded', { available: seeds.length, written });
}
