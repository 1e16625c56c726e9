import type { Response } from 'express';
import { ZodError } from 'zod';

import { PublishError, RemoteApiError, type PublishErrorCode } from '../errors.js';
import { logger } from '../logger.js';

const STATUS_BY_CODE: Record<PublishErrorCode, number> = {
  VALIDATION: 400,
  NOT_FOUND: 404,
  NO_CREDENTIALS: 400,
  NO_CHANNEL: 400,
  HOSTING_ERROR: 502,
  REMOTE_API_ERROR: 502,
  TIMEOUT: 504,
  CONFLICT: 409,
  INVALID_STATE: 409,
};

export const httpStatusFor = (error: unknown): number => {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof RemoteApiError && error.tokenExpired) {
    return 401;
  }
  if (error instanceof PublishError) {
    return STATUS_BY_CODE[error.code];
  }
  return 500;
};

export const sendError = (res: Response, error: unknown): void => {
  const status = httpStatusFor(error);

  if (error instanceof ZodError) {
    res.status(status).json({
      error: 'VALIDATION',
      message: 'Invalid request',
      details: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
    return;
  }
  if (error instanceof PublishError) {
    if (status >= 500) {
      logger.warn({ code: error.code, message: error.message }, 'Request failed on an upstream dependency');
    }
    res.status(status).json({ error: error.code, message: error.message });
    return;
  }

  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Unhandled request error');
  res.status(500).json({ error: 'INTERNAL', message: 'Internal server error' });
};
