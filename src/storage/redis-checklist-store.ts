/**
 * Checklist Store: Redis-backed persistence for user checklists
 *
 * Layout:
 * - checklist:{id}             hash: userId, sourceTemplateId, title,
 *                              steps (JSON), createdAt, updatedAt
 * - checklist:{id}:progress    hash: one field per step index ("0", "1", ...)
 *                              holding {completed, completedAt} as JSON
 * - user:{userId}:checklists   sorted set of checklist ids, scored by createdAt (ms)
 *
 * Progress is normalized into one field per step so a step toggle writes
 * exactly one field. Two concurrent toggles on different steps of the same
 * checklist therefore both land; neither rewrites the other's entry.
 *
 * Atomicity:
 * - insert/delete run as a single MULTI block
 * - updateStepProgress runs as a Lua script (existence check + field write +
 *   updatedAt bump), so a failed update leaves the previous state intact
 */

import { z } from 'zod';
import type { Redis as IORedis } from 'ioredis';
import type { ChecklistStore } from '../checklist/ports.js';
import { StepListSchema } from '../checklist/types.js';
import type { StepProgress, UserChecklist } from '../checklist/types.js';
import { NotFoundError } from '../checklist/errors.js';
import { assertExecSucceeded, withStorage } from './redis-utils.js';

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

export function checklistKey(id: string): string {
  return `checklist:${id}`;
}

export function progressKey(id: string): string {
  return `checklist:${id}:progress`;
}

export function userIndexKey(userId: string): string {
  return `user:${userId}:checklists`;
}

// ---------------------------------------------------------------------------
// Stored shapes
// ---------------------------------------------------------------------------

const ChecklistHashSchema = z.object({
  userId: z.string(),
  sourceTemplateId: z.string(),
  title: z.string(),
  steps: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const StoredStepSchema = z.object({
  completed: z.boolean(),
  completedAt: z.string().nullable(),
});

/**
 * KEYS[1] checklist hash, KEYS[2] progress hash
 * ARGV[1] step index, ARGV[2] progress entry JSON, ARGV[3] updatedAt
 * Returns 0 when the checklist does not exist, 1 after writing.
 */
export const UPDATE_STEP_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return 0
end
redis.call('HSET', KEYS[2], ARGV[1], ARGV[2])
redis.call('HSET', KEYS[1], 'updatedAt', ARGV[3])
return 1
`;

function encodeStep(completed: boolean, completedAt: string | null): string {
  return JSON.stringify({ completed, completedAt });
}

function decodeProgress(stepCount: number, fields: Record<string, string>): StepProgress[] {
  return Array.from({ length: stepCount }, (_, stepIndex) => {
    const raw = fields[String(stepIndex)];
    if (!raw) {
      return { stepIndex, completed: false, completedAt: null };
    }
    const stored = StoredStepSchema.parse(JSON.parse(raw));
    return { stepIndex, completed: stored.completed, completedAt: stored.completedAt };
  });
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export class RedisChecklistStore implements ChecklistStore {
  constructor(private readonly redis: IORedis) {}

  async insert(checklist: UserChecklist): Promise<void> {
    await withStorage('checklist insert', async () => {
      const tx = this.redis.multi().hset(checklistKey(checklist.id), {
        userId: checklist.userId,
        sourceTemplateId: checklist.sourceTemplateId,
        title: checklist.title,
        steps: JSON.stringify(checklist.steps),
        createdAt: checklist.createdAt,
        updatedAt: checklist.updatedAt,
      });

      // HSET with no field/value pairs is a Redis error; empty checklists get no progress hash
      if (checklist.progress.length > 0) {
        const fields: Record<string, string> = {};
        for (const entry of checklist.progress) {
          fields[String(entry.stepIndex)] = encodeStep(entry.completed, entry.completedAt);
        }
        tx.hset(progressKey(checklist.id), fields);
      }

      tx.zadd(userIndexKey(checklist.userId), Date.parse(checklist.createdAt), checklist.id);
      assertExecSucceeded(await tx.exec());
    });
  }

  async getById(id: string): Promise<UserChecklist | null> {
    return withStorage('checklist read', async () => {
      const [hash, progressFields] = await Promise.all([
        this.redis.hgetall(checklistKey(id)),
        this.redis.hgetall(progressKey(id)),
      ]);
      if (Object.keys(hash).length === 0) return null;

      const record = ChecklistHashSchema.parse(hash);
      const steps = StepListSchema.parse(JSON.parse(record.steps));

      return {
        id,
        userId: record.userId,
        sourceTemplateId: record.sourceTemplateId,
        title: record.title,
        steps,
        progress: decodeProgress(steps.length, progressFields),
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
      };
    });
  }

  async updateStepProgress(
    id: string,
    stepIndex: number,
    completed: boolean,
    timestamp: string,
  ): Promise<void> {
    const written = await withStorage('step update', () =>
      this.redis.eval(
        UPDATE_STEP_SCRIPT,
        2,
        checklistKey(id),
        progressKey(id),
        String(stepIndex),
        encodeStep(completed, completed ? timestamp : null),
        timestamp,
      ),
    );

    if (written === 0) {
      throw new NotFoundError(`Checklist ${id} not found`);
    }
  }

  async listByUser(userId: string): Promise<UserChecklist[]> {
    const ids = await withStorage('checklist list', () =>
      this.redis.zrevrange(userIndexKey(userId), 0, -1),
    );
    const checklists = await Promise.all(ids.map((id) => this.getById(id)));
    return checklists.filter((checklist): checklist is UserChecklist => checklist !== null);
  }

  async delete(id: string): Promise<boolean> {
    return withStorage('checklist delete', async () => {
      const userId = await this.redis.hget(checklistKey(id), 'userId');
      if (userId === null) return false;

      const result = await this.redis
        .multi()
        .del(checklistKey(id), progressKey(id))
        .zrem(userIndexKey(userId), id)
        .exec();
      assertExecSucceeded(result);
      return true;
    });
  }
}
