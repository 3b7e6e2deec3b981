import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { SlotOccupiedError } from '../../../domain/parking/errors.js';
import {
  BillGenerationError,
  DuplicateUsernameError,
  ForbiddenError,
  InvalidCredentialsError,
  NotFoundError,
  ProtectedResourceError,
  UnauthorizedError,
} from '../../../application/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface Mapped {
  status: number;
  body: ErrorResponse;
}

function mapError(err: Error): Mapped | null {
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

  // Raised by express.json() for unparsable bodies
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, body: { code: 'INVALID_JSON', message: 'Malformed JSON body' } };
  }

  if (err instanceof InvalidCredentialsError) {
    return { status: 401, body: { code: 'INVALID_CREDENTIALS', message: err.message } };
  }

  if (err instanceof UnauthorizedError) {
    return { status: 401, body: { code: 'UNAUTHORIZED', message: err.message } };
  }

  if (err instanceof ForbiddenError) {
    return { status: 403, body: { code: 'FORBIDDEN', message: err.message } };
  }

  if (err instanceof ProtectedResourceError) {
    return { status: 403, body: { code: 'PROTECTED_RESOURCE', message: err.message } };
  }

  if (err instanceof NotFoundError) {
    return { status: 404, body: { code: 'NOT_FOUND', message: err.message } };
  }

  if (err instanceof SlotOccupiedError) {
    return {
      status: 409,
      body: {
        code: 'SLOT_OCCUPIED',
        message: err.message,
        details: { slot: err.slot, month: err.month, year: err.year },
      },
    };
  }

  if (err instanceof DuplicateUsernameError) {
    return {
      status: 409,
      body: { code: 'DUPLICATE_USERNAME', message: err.message, details: { username: err.username } },
    };
  }

  if (err instanceof BillGenerationError) {
    return { status: 500, body: { code: 'BILL_GENERATION_FAILED', message: err.message } };
  }

  return null;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const mapped = mapError(err);

    if (!mapped || mapped.status >= 500) {
      logger.error('Request failed', { method: req.method, path: req.path }, err);
    } else {
      logger.warn('Request rejected', {
        method: req.method,
        path: req.path,
        status: mapped.status,
        code: mapped.body.code,
      });
    }

    if (mapped) {
      res.status(mapped.status).json(mapped.body);
      return;
    }

    const response: ErrorResponse = {
      code: 'INTERNAL_ERROR',
      message: 'Internal server error',
    };
    res.status(500).json(response);
  };
}
