/**
 * Health Check Endpoint Handler
 *
 * Returns server status, storage driver, version, and timestamp.
 * Used by load balancers, monitoring, and manual verification.
 */

import type { Request, Response } from 'express';
import { appConfig } from '../config.js';

export function healthHandler(_req: Request, res: Response): void {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    storage: appConfig.storageDriver,
    version: process.env.npm_package_version ?? 'dev',
  });
}
