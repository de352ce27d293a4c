import type { NextFunction, Response } from 'express';
import { ZodError } from 'zod';
import {
  AlreadyExistsError,
  InvalidCredentialsError,
  InvalidInputError,
  NotFoundError,
  UnauthenticatedError,
} from '../../../application/errors.js';
import type { SafeLogger } from '../../logger.js';
import type { AppRequest } from './requestContext.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

/**
 * express.json() rejects bad client bodies (unparseable JSON, unsupported
 * charset or Content-Encoding, size mismatch, aborted upload) with an
 * exposable 4xx error tagged with a `type`.
 */
function isBodyParseError(err: unknown): boolean {
  if (!(err instanceof Error) || !('type' in err) || typeof err.type !== 'string') {
    return false;
  }
  const status = 'status' in err ? err.status : undefined;
  return (
    'expose' in err &&
    err.expose === true &&
    typeof status === 'number' &&
    status >= 400 &&
    status < 500
  );
}

export function mapError(err: unknown): MappedError | null {
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

  if (isBodyParseError(err)) {
    return { status: 400, body: { code: 'INVALID_BODY', message: 'invalid body' } };
  }

  if (err instanceof InvalidInputError) {
    return { status: 400, body: { code: 'INVALID_INPUT', message: err.message } };
  }

  // Fixed message: never reveal whether the email exists
  if (err instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: 'invalid credentials' } };
  }

  if (err instanceof UnauthenticatedError) {
    return { status: 401, body: { code: 'UNAUTHENTICATED', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof AlreadyExistsError) {
    return { status: 409, body: { code: 'ALREADY_EXISTS', message: err.message } };
  }

  return null;
}

/**
 * Terminal error middleware. Known errors map to their status; anything
 * else is logged and answered with a generic 500.
 */
export function errorHandler(logger: SafeLogger) {
  return (err: unknown, req: AppRequest, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const mapped = mapError(err);
    if (mapped) {
      res.status(mapped.status).json(mapped.body);
      return;
    }

    logger.error(
      {
        requestId: req.requestId ?? '-',
        err: err instanceof Error ? { name: err.name, message: err.message, stack: err.stack } : String(err),
      },
      'Unhandled error'
    );

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
