import type { Response } from 'express';
import type { z } from 'zod';
import { toHttpError } from '../utils/errors.js';

export const sendError = (res: Response, error: unknown, fallbackMessage: string): void => {
  const { statusCode, body, retryAfterSeconds } = toHttpError(error, fallbackMessage);
  if (retryAfterSeconds !== null) {
    res.setHeader('Retry-After', String(retryAfterSeconds));
  }
  if (statusCode >= 500) {
    console.error(`[api] ${fallbackMessage}:`, body.details ?? body.error);
  }
  res.status(statusCode).json(body);
};

/**
 * Validates `value` against `schema`. On failure the 400 response is already
 * sent and `null` is returned.
 */
export const parseOrReject = <S extends z.ZodTypeAny>(schema: S, value: unknown, res: Response): z.output<S> | null => {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  res.status(400).json({
    error: 'Invalid request',
    issues: result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
  return null;
};
