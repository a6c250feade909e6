import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  DuplicateEmailError,
  IncorrectPasswordError,
  InvalidCredentialsError,
  InvalidResetTokenError,
  InvalidTokenError,
} from '../../../domain/auth/errors.js';
import {
  ForbiddenError,
  NotFoundError,
  UnauthorizedError,
} from '../../../application/errors.js';
import { logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface ErrorMapping {
  status: number;
  body: ErrorResponse;
}

function mapError(err: Error): ErrorMapping | null {
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: {
          issues: err.errors.map((e) => ({
            path: e.path.join('.'),
            message: e.message,
          })),
        },
      },
    };
  }

  // express.json() rejects unparseable bodies with a SyntaxError carrying the body
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, body: { code: 'INVALID_JSON', message: 'Malformed JSON body' } };
  }

  if (err instanceof DuplicateEmailError) {
    return { status: 409, body: { code: 'EMAIL_TAKEN', message: err.message } };
  }

  if (err instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: err.message } };
  }

  if (err instanceof IncorrectPasswordError) {
    return { status: 400, body: { code: 'INCORRECT_PASSWORD', message: err.message } };
  }

  // The reason stays server-side; clients only learn the token was refused
  if (err instanceof InvalidTokenError) {
    return { status: 401, body: { code: 'INVALID_TOKEN', message: err.message } };
  }

  if (err instanceof InvalidResetTokenError) {
    return { status: 400, body: { code: 'INVALID_RESET_TOKEN', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof ForbiddenError) {
    return { status: 403, body: { code: 'FORBIDDEN', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  return null;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  const mapped = mapError(err);

  if (mapped) {
    logger.debug('Request rejected', {
      code: mapped.body.code,
      reason:
        err instanceof InvalidTokenError || err instanceof InvalidResetTokenError
          ? err.reason
          : undefined,
    });
    res.status(mapped.status).json(mapped.body);
    return;
  }

  logger.error('Unhandled error', err);

  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
