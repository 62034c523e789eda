import type { NextFunction, RequestHandler, Response } from 'express';
import type { AuthRequest } from './auth.js';

type AsyncRoute = (req: AuthRequest, res: Response, next: NextFunction) => Promise<unknown>;

/**
 * Express 4 ignores the promise a handler returns; route the rejection
 * to next() so errorHandler answers it.
 */
export function asyncHandler(fn: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
