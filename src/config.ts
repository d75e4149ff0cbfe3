/**
 * Shared Application Configuration
 *
 * Centralizes all environment variable access for the API process.
 *
 * Environment variables:
 * - APP_ENV: 'production' disables development defaults (default: development)
 * - PORT: HTTP server port (default 3000)
 * - STORAGE_DRIVER: 'redis' or 'memory' (default redis)
 * - REDIS_URL / REDIS_HOST / REDIS_PORT / REDIS_PASSWORD: Redis connection
 * - REDIS_MAX_RETRIES: per-command retry budget before a command fails (default 3)
 * - IDENTITY_HEADER: request header carrying the authenticated user id (default x-user-id)
 * - CHECKLIST_MAX_CONFLICT_RETRIES: retries for a conflicting step write (default 3)
 * - SEED_TEMPLATES: set to 'false' to skip seeding official templates at startup
 */

import 'dotenv/config';
import { z } from 'zod';

export const STORAGE_DRIVERS = ['redis', 'memory'] as const;

export type StorageDriver = typeof STORAGE_DRIVERS[number];

export interface AppConfig {
  isDev: boolean;
  storageDriver: StorageDriver;
  redis: {
    url: string | undefined;
    host: string;
    port: number;
    password: string | undefined;
    maxRetriesPerRequest: number;
  };
  server: {
    port: number;
  };
  identity: {
    header: string;
  };
  checklist: {
    maxConflictRetries: number;
  };
  templates: {
    seedOnStartup: boolean;
  };
}

function optionalEnv(key: string, fallback = ''): string {
  return process.env[key] ?? fallback;
}

const NonNegativeIntSchema = z.string().trim().regex(/^\d+$/).transform(Number);

/** Parses a numeric env value, failing fast on anything but a whole non-negative number. */
export function parseEnvInt(key: string, raw: string): number {
  const result = NonNegativeIntSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid value for ${key}: expected a non-negative integer, got "${raw}"`);
  }
  return result.data;
}

function intEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;
  return parseEnvInt(key, raw);
}

const StorageDriverSchema = z.enum(STORAGE_DRIVERS);

/** Parses STORAGE_DRIVER, failing fast on anything unknown. */
export function parseStorageDriver(raw: string): StorageDriver {
  const result = StorageDriverSchema.safeParse(raw.trim().toLowerCase());
  if (!result.success) {
    throw new Error(
      `Invalid STORAGE_DRIVER "${raw}". Expected one of: ${STORAGE_DRIVERS.join(', ')}`,
    );
  }
  return result.data;
}

const isDev = optionalEnv('APP_ENV', 'development') !== 'production';

export const appConfig: AppConfig = {
  isDev,
  storageDriver: parseStorageDriver(optionalEnv('STORAGE_DRIVER', 'redis')),
  redis: {
    url: process.env.REDIS_URL || undefined,
    host: optionalEnv('REDIS_HOST', 'localhost'),
    port: intEnv('REDIS_PORT', 6379),
    password: process.env.REDIS_PASSWORD || undefined,
    maxRetriesPerRequest: intEnv('REDIS_MAX_RETRIES', 3),
  },
  server: {
    port: intEnv('PORT', 3000),
  },
  identity: {
    header: optionalEnv('IDENTITY_HEADER', 'x-user-id').toLowerCase(),
  },
  checklist: {
    maxConflictRetries: intEnv('CHECKLIST_MAX_CONFLICT_RETRIES', 3),
  },
  templates: {
    seedOnStartup: process.env.SEED_TEMPLATES !== 'false',
  },
};
