/**
 * Express API Server
 *
 * HTTP layer over the checklist engine and template service. Routes:
 * - GET    /health                    Server status
 * - GET    /api/templates             All templates, newest first
 * - GET    /api/templates/:id         One template
 * - POST   /api/templates             Create a template (identity required)
 * - PUT    /api/templates/:id         Update own template (identity required)
 * - GET    /api/checklists            Caller's checklists with progress
 * - POST   /api/checklists            Fork a template { templateId }
 * - GET    /api/checklists/:id        One checklist with progress
 * - PUT    /api/checklists/:id/steps  Toggle a step { stepIndex, completed }
 * - DELETE /api/checklists/:id        Delete own checklist
 *
 * Request bodies are validated with zod; failures and typed engine errors
 * are mapped to statuses by errorHandler. Only ids are logged.
 */

import express from 'express';
import type { Request, Response } from 'express';
import { z } from 'zod';
import type { ChecklistProgressEngine } from '../checklist/engine.js';
import type { TemplateService } from '../templates/template-service.js';
import { CreateTemplateInputSchema, UpdateTemplateInputSchema } from '../templates/types.js';
import { healthHandler } from './health.js';
import { currentUserId, requireIdentity } from './identity.js';
import { errorHandler, sendData, sendMessage } from './respond.js';

export const ForkChecklistBodySchema = z.object({
  templateId: z.string().trim().min(1),
});

export const IdParamsSchema = z.object({
  id: z.string().min(1),
});

export const UpdateStepBodySchema = z.object({
  stepIndex: z.number().int(),
  completed: z.boolean(),
});

export interface AppDependencies {
  engine: ChecklistProgressEngine;
  templates: TemplateService;
  /** Header carrying the authenticated user id */
  identityHeader: string;
}

/**
 * Create the Express application with all routes configured.
 *
 * Collaborators are passed in so tests can build fresh app instances over
 * in-memory stores without shared state between test cases.
 */
export function createApp({ engine, templates, identityHeader }: AppDependencies) {
  const app = express();
  app.use(express.json({ limit: '256kb' }));

  const authenticated = requireIdentity(identityHeader);

  // Health check
  app.get('/health', healthHandler);

  // Templates (reads are public)
  app.get('/api/templates', async (_req: Request, res: Response) => {
    sendData(res, await templates.list());
  });

  app.get('/api/templates/:id', async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    sendData(res, await templates.get(id));
  });

  app.post('/api/templates', authenticated, async (req: Request, res: Response) => {
    const input = CreateTemplateInputSchema.parse(req.body);
    const template = await templates.create(input, currentUserId(res));
    sendData(res, template, 'Template created', 201);
  });

  app.put('/api/templates/:id', authenticated, async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const input = UpdateTemplateInputSchema.parse(req.body);
    const template = await templates.update(id, input, currentUserId(res));
    sendData(res, template, 'Template updated');
  });

  // Checklists (all owner-scoped)
  app.get('/api/checklists', authenticated, async (_req: Request, res: Response) => {
    sendData(res, await engine.listByUser(currentUserId(res)));
  });

  app.post('/api/checklists', authenticated, async (req: Request, res: Response) => {
    const { templateId } = ForkChecklistBodySchema.parse(req.body);
    const view = await engine.fork(currentUserId(res), templateId);
    sendData(res, view, 'Checklist created', 201);
  });

  app.get('/api/checklists/:id', authenticated, async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    sendData(res, await engine.getChecklist(currentUserId(res), id));
  });

  app.put('/api/checklists/:id/steps', authenticated, async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    const { stepIndex, completed } = UpdateStepBodySchema.parse(req.body);
    const view = await engine.updateStep(currentUserId(res), id, stepIndex, completed);
    sendData(res, view, 'Step updated');
  });

  app.delete('/api/checklists/:id', authenticated, async (req: Request, res: Response) => {
    const { id } = IdParamsSchema.parse(req.params);
    await engine.deleteChecklist(currentUserId(res), id);
    sendMessage(res, 'Checklist deleted');
  });

  // Unknown routes
  app.use((_req: Request, res: Response) => {
    sendMessage(res, 'Not found', 404);
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
