/**
 * Template Store: Redis-backed persistence for guide templates
 *
 * Layout:
 * - template:{id}          JSON string of the full Template record
 * - templates:by-created   sorted set of template ids, scored by createdAt (ms)
 *
 * Templates are small (tens of steps) and written rarely, so each one is a
 * single JSON value replaced as a whole on save.
 */

import type { Redis as IORedis } from 'ioredis';
import type { TemplateStore } from '../checklist/ports.js';
import { TemplateSchema } from '../templates/types.js';
import type { Template } from '../templates/types.js';
import { assertExecSucceeded, withStorage } from './redis-utils.js';

const INDEX_KEY = 'templates:by-created';

function templateKey(id: string): string {
  return `template:${id}`;
}

function parseTemplate(raw: string): Template {
  return TemplateSchema.parse(JSON.parse(raw));
}

export class RedisTemplateStore implements TemplateStore {
  constructor(private readonly redis: IORedis) {}

  async getById(id: string): Promise<Template | null> {
    const raw = await withStorage('template read', () => this.redis.get(templateKey(id)));
    if (!raw) return null;
    return withStorage('template decode', async () => parseTemplate(raw));
  }

  async list(): Promise<Template[]> {
    return withStorage('template list', async () => {
      const ids = await this.redis.zrevrange(INDEX_KEY, 0, -1);
      if (ids.length === 0) return [];

      const values = await this.redis.mget(...ids.map(templateKey));
      const templates: Template[] = [];
      for (const raw of values) {
        // Index entry without a record: skip rather than fail the whole list
        if (raw) templates.push(parseTemplate(raw));
      }
      return templates;
    });
  }

  async save(template: Template): Promise<void> {
    await withStorage('template write', async () => {
      const result = await this.redis
        .multi()
        .set(templateKey(template.id), JSON.stringify(template))
        .zadd(INDEX_KEY, Date.parse(template.createdAt), template.id)
        .exec();
      assertExecSucceeded(result);
    });
  }

  async ping(): Promise<void> {
    await withStorage('ping', () => this.redis.ping());
  }
}
