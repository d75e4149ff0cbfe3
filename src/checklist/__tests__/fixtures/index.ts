/**
 * Test Fixtures: Templates, checklists and a controllable clock
 *
 * All ids and content are made up for tests.
 */

import type { Template } from '../../../templates/types.js';
import type { UserChecklist } from '../../types.js';

export const OWNER_ID = 'user-alice';
export const OTHER_USER_ID = 'user-bob';

/** Four-step template, steps already in order */
export const movingTemplate: Template = {
  id: 'tpl-moving',
  title: 'First time moving to a new city',
  description: 'Everything to sort out in the first month.',
  locationTag: 'CN',
  steps: [
    { title: 'Find a place to live', description: 'Short-term rental first', order: 0 },
    { title: 'Register residence', description: null, order: 1 },
    { title: 'Open a local bank account', description: null, order: 2 },
    { title: 'Get a transit card', description: 'Works on buses and metro', order: 3 },
  ],
  parentId: null,
  createdBy: 'system',
  isOfficial: true,
  createdAt: '2026-01-01T00:00:00.000Z',
  updatedAt: '2026-01-01T00:00:00.000Z',
};

/** Template without steps */
export const emptyTemplate: Template = {
  ...movingTemplate,
  id: 'tpl-empty',
  title: 'Nothing to do yet',
  steps: [],
};

/** Steps stored out of order (orders 0..2 listed 2, 0, 1) */
export const shuffledTemplate: Template = {
  ...movingTemplate,
  id: 'tpl-shuffled',
  title: 'Shuffled steps',
  steps: [
    { title: 'Third', description: null, order: 2 },
    { title: 'First', description: null, order: 0 },
    { title: 'Second', description: null, order: 1 },
  ],
};

/** Checklist forked from movingTemplate with steps 0 and 2 completed */
export function halfDoneChecklist(overrides: Partial<UserChecklist> = {}): UserChecklist {
  return {
    id: 'chk-half',
    userId: OWNER_ID,
    sourceTemplateId: movingTemplate.id,
    title: movingTemplate.title,
    steps: movingTemplate.steps.map((step) => ({ ...step })),
    progress: [
      { stepIndex: 0, completed: true, completedAt: '2026-01-02T08:00:00.000Z' },
      { stepIndex: 1, completed: false, completedAt: null },
      { stepIndex: 2, completed: true, completedAt: '2026-01-03T08:00:00.000Z' },
      { stepIndex: 3, completed: false, completedAt: null },
    ],
    createdAt: '2026-01-01T12:00:00.000Z',
    updatedAt: '2026-01-03T08:00:00.000Z',
    ...overrides,
  };
}

/**
 * Clock that advances one second per call, starting at `start`.
 * Gives every timestamp in a test a distinct, predictable value.
 */
export function steppingClock(start = '2026-03-01T09:00:00.000Z'): () => Date {
  let current = Date.parse(start);
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

/** Id generator yielding prefix-1, prefix-2, ... */
export function sequentialIds(prefix = 'chk'): () => string {
  let next = 1;
  return () => `${prefix}-${next++}`;
}
