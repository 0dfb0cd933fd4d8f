import type { NextFunction, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { ZodError } from 'zod';
import { logger } from '../../lib/logger.js';
import { HandheldError, MissingTemplateError, NotFoundError } from '../../lib/errors.js';

function statusFor(error: HandheldError): number {
  if (error instanceof NotFoundError || error instanceof MissingTemplateError) {
    return StatusCodes.NOT_FOUND;
  }
  if (error.code === 'INTERNAL_ERROR' || error.code === 'CONFIGURATION_ERROR') {
    return StatusCodes.INTERNAL_SERVER_ERROR;
  }
  return StatusCodes.BAD_REQUEST;
}

/**
 * Errors raised by `express.json()` carry the HTTP status and a `type` such as
 * `entity.parse.failed` or `entity.too.large`.
 */
function isBodyParserError(error: unknown): error is Error & { status: number; type: string } {
  return (
    error instanceof Error &&
    'type' in error &&
    typeof error.type === 'string' &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export function errorHandler(error: unknown, req: Request, res: Response, _next: NextFunction) {
  let status: number = StatusCodes.INTERNAL_SERVER_ERROR;
  let code = 'INTERNAL_ERROR';
  let message = 'Internal server error';
  let details: unknown;

  if (error instanceof HandheldError) {
    status = statusFor(error);
    code = error.code;
    message = error.message;
    details = error.details;
  } else if (error instanceof ZodError) {
    status = StatusCodes.BAD_REQUEST;
    code = 'VALIDATION_ERROR';
    message = 'Invalid request payload';
    details = error.flatten();
  } else if (isBodyParserError(error)) {
    status = error.status;
    code = 'VALIDATION_ERROR';
    message = 'Invalid request body';
    details = { type: error.type };
  } else if (error instanceof Error) {
    message = error.message;
  }

  if (status >= 500) {
    logger.error({ error, requestId: req.id }, 'Unhandled error');
  } else {
    logger.warn({ error, requestId: req.id }, 'Handled error');
  }

  res.status(status).json({ success: false, error: message, code, details });
}
