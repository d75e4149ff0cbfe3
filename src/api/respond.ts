/**
 * JSON Response Envelope + Error Mapping
 *
 * Every response body has the shape { success, message, data?, timestamp }
 * (timestamp in epoch millis). Errors reuse the envelope with success: false.
 */

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ChecklistError } from '../checklist/errors.js';
import type { ChecklistErrorCode } from '../checklist/errors.js';

export interface ApiEnvelope<T> {
  success: boolean;
  message: string;
  data?: T;
  timestamp: number;
}

export const STATUS_BY_CODE: Record<ChecklistErrorCode, number> = {
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  INVALID_ARGUMENT: 400,
  CONFLICT_RETRYABLE: 409,
  STORAGE_UNAVAILABLE: 503,
};

export function sendData<T>(res: Response, data: T, message = 'OK', status = 200): void {
  const body: ApiEnvelope<T> = { success: true, message, data, timestamp: Date.now() };
  res.status(status).json(body);
}

export function sendMessage(res: Response, message: string, status = 200): void {
  const body: ApiEnvelope<never> = { success: status < 400, message, timestamp: Date.now() };
  res.status(status).json(body);
}

/** Formats zod issues as "path: message; path: message" */
export function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** body-parser marks malformed JSON with type 'entity.parse.failed' */
function isJsonParseError(err: unknown): boolean {
  return (
    err instanceof SyntaxError &&
    'type' in err &&
    err.type === 'entity.parse.failed'
  );
}

/**
 * 4xx status carried by body-parser rejections (http-errors), e.g. 413 for
 * an oversized body or 415 for an unsupported charset. Null otherwise.
 */
function clientErrorStatus(err: unknown): number | null {
  if (!(err instanceof Error) || !('status' in err)) return null;
  const { status } = err;
  if (typeof status === 'number' && status >= 400 && status < 500) return status;
  return null;
}

/**
 * Global error handler. Typed failures map to their status, body-parser
 * rejections keep their 4xx status, and anything else is logged and
 * returned as a generic 500.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ChecklistError) {
    const status = STATUS_BY_CODE[err.code];
    if (status >= 500) {
      console.error(`[api] ${err.name}:`, err.message);
    }
    sendMessage(res, err.message, status);
    return;
  }

  if (err instanceof ZodError) {
    sendMessage(res, `Invalid request: ${describeZodError(err)}`, 400);
    return;
  }

  if (isJsonParseError(err)) {
    sendMessage(res, 'Invalid JSON body', 400);
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null && err instanceof Error) {
    sendMessage(res, err.message, clientStatus);
    return;
  }

  const message = err instanceof Error ? err.message : String(err);
  console.error('[api] Unhandled error:', message);
  sendMessage(res, 'Internal server error', 500);
}
