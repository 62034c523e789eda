import jwt from 'jsonwebtoken';
import { UnauthorizedError } from '../errors.js';
import { authLogger } from '../../lib/logger.js';

export interface IssuedToken {
  token: string;
  expiresIn: number;
}

/**
 * Signs and checks HS256 bearer tokens. The user id travels in `sub`;
 * nothing is kept server-side.
 */
export class TokenService {
  constructor(
    private secret: string,
    private expiresInSeconds: number
  ) {}

  issue(userId: string): IssuedToken {
    const token = jwt.sign({}, this.secret, {
      algorithm: 'HS256',
      subject: userId,
      expiresIn: this.expiresInSeconds,
    });

    return { token, expiresIn: this.expiresInSeconds };
  }

  /**
   * Returns the user id carried by the token.
   * Expired, tampered and malformed tokens all throw UnauthorizedError.
   */
  verify(token: string): string {
    const payload = this.decode(token);

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      authLogger.debug('Token rejected: missing subject claim');
      throw new UnauthorizedError('Invalid token');
    }

    return payload.sub;
  }

  private decode(token: string) {
    try {
      return jwt.verify(token, this.secret, { algorithms: ['HS256'] });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        authLogger.debug({ expiredAt: error.expiredAt }, 'Token rejected: expired');
        throw new UnauthorizedError('Token expired');
      }
      authLogger.debug({ err: error }, 'Token rejected: invalid');
      throw new UnauthorizedError('Invalid token');
    }
  }
}
