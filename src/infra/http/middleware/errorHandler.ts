import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  ConflictError,
  NotFoundError,
  UnauthorizedError,
  ValidationError,
  ValidationIssue,
} from '../../../application/errors.js';
import { httpLogger } from '../../../lib/logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

function validationResponse(issues: ValidationIssue[], message: string): ErrorResponse {
  return {
    code: 'VALIDATION_ERROR',
    message,
    details: { issues },
  };
}

/**
 * express.json() rejects unparsable bodies with a SyntaxError carrying `body`.
 */
function isJsonParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

const BODY_ERROR_CODES = new Map<string, string>([
  ['entity.too.large', 'PAYLOAD_TOO_LARGE'],
  ['charset.unsupported', 'UNSUPPORTED_MEDIA_TYPE'],
  ['encoding.unsupported', 'UNSUPPORTED_MEDIA_TYPE'],
]);

interface ClientHttpError {
  status: number;
  code: string;
  message: string;
}

/**
 * Other body-parser rejections are http-errors with a 4xx `status`,
 * `expose: true` and a `type` such as `entity.too.large`.
 */
function asClientHttpError(err: unknown): ClientHttpError | null {
  if (
    !(err instanceof Error) ||
    !('status' in err) ||
    typeof err.status !== 'number' ||
    err.status < 400 ||
    err.status > 499 ||
    !('expose' in err) ||
    err.expose !== true
  ) {
    return null;
  }
  const type = 'type' in err && typeof err.type === 'string' ? err.type : '';
  return {
    status: err.status,
    code: BODY_ERROR_CODES.get(type) ?? 'BAD_REQUEST',
    message: err.message,
  };
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
}

export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  if (err instanceof ZodError) {
    const issues = err.errors.map((e) => ({
      path: e.path.join('.'),
      message: e.message,
    }));
    httpLogger.debug({ path: req.originalUrl, issues }, 'Validation failed');
    res.status(400).json(validationResponse(issues, 'Validation failed'));
    return;
  }

  if (err instanceof ValidationError) {
    httpLogger.debug({ path: req.originalUrl, issues: err.issues }, 'Validation failed');
    res.status(400).json(validationResponse(err.issues, err.message));
    return;
  }

  if (isJsonParseError(err)) {
    const response: ErrorResponse = {
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON',
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof UnauthorizedError) {
    httpLogger.warn({ path: req.originalUrl, reason: err.message }, 'Unauthorized request');
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.status(401).json(response);
    return;
  }

  if (err instanceof NotFoundError) {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: err.message,
    };
    res.status(404).json(response);
    return;
  }

  if (err instanceof ConflictError) {
    httpLogger.info({ path: req.originalUrl, reason: err.message }, 'Conflict');
    const response: ErrorResponse = {
      code: 'CONFLICT',
      message: err.message,
    };
    res.status(409).json(response);
    return;
  }

  const clientError = asClientHttpError(err);
  if (clientError) {
    httpLogger.debug(
      { path: req.originalUrl, status: clientError.status, reason: clientError.message },
      'Rejected request body'
    );
    const response: ErrorResponse = {
      code: clientError.code,
      message: clientError.message,
    };
    res.status(clientError.status).json(response);
    return;
  }

  // Anything else is a bug or an infrastructure failure; keep details in the log
  httpLogger.error({ err, method: req.method, path: req.originalUrl }, 'Unhandled error');
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
