import { Request, Response, NextFunction } from 'express';
import { TokenService } from '../../../application/auth/tokens.js';
import { UnauthorizedError } from '../../../application/errors.js';
import { authLogger } from '../../../lib/logger.js';

export interface AuthRequest extends Request {
  userId?: string;
}

const BEARER_PREFIX = 'Bearer ';

export function authMiddleware(tokens: TokenService) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      authLogger.debug({ path: req.originalUrl }, 'Request without bearer token');
      next(new UnauthorizedError('Missing or invalid authorization header'));
      return;
    }

    try {
      req.userId = tokens.verify(authHeader.substring(BEARER_PREFIX.length).trim());
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * The caller's id on a route behind authMiddleware.
 */
export function requireUserId(req: AuthRequest): string {
  if (!req.userId) {
    throw new UnauthorizedError();
  }
  return req.userId;
}
