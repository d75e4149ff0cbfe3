/**
 * Identity Context
 *
 * The service sits behind an authentication gateway that verifies the
 * caller and forwards the user id in a trusted header (IDENTITY_HEADER,
 * default x-user-id). This middleware only reads that header; it performs
 * no authentication of its own.
 */

import type { NextFunction, Request, Response } from 'express';
import { sendMessage } from './respond.js';

const MAX_USER_ID_LENGTH = 128;

/** Returns the trimmed user id, or null when missing, blank or oversized. */
export function resolveUserId(req: Request, header: string): string | null {
  const raw = req.get(header);
  if (!raw) return null;
  const userId = raw.trim();
  if (userId.length === 0 || userId.length > MAX_USER_ID_LENGTH) return null;
  return userId;
}

/** Rejects the request with 401 unless the identity header is present. */
export function requireIdentity(header: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const userId = resolveUserId(req, header);
    if (!userId) {
      sendMessage(res, 'Missing or invalid user identity', 401);
      return;
    }
    res.locals.userId = userId;
    next();
  };
}

/** Reads the id stored by requireIdentity. */
export function currentUserId(res: Response): string {
  const userId: unknown = res.locals.userId;
  if (typeof userId !== 'string') {
    throw new Error('currentUserId called on a route without requireIdentity');
  }
  return userId;
}
