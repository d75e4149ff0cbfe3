/**
 * Barrel export for guide templates.
 */

export { TemplateService, normalizeSteps } from './template-service.js';
export type { TemplateServiceOptions } from './template-service.js';
export { loadOfficialTemplates, seedOfficialTemplates, OFFICIAL_TEMPLATES_PATH } from './seed.js';
export type { SeedTemplate } from './seed.js';
export {
  SYSTEM_USER_ID,
  TemplateSchema,
  TemplateStepSchema,
  CreateTemplateInputSchema,
  UpdateTemplateInputSchema,
} from './types.js';
export type { Template, TemplateStep, CreateTemplateInput, UpdateTemplateInput } from './types.js';
