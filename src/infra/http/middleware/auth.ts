import { Request, Response, NextFunction } from 'express';
import { User } from '../../../domain/auth/user.js';
import { AuthenticationError } from '../../../domain/auth/errors.js';
import { AuthGuard } from '../../../application/auth/guard.js';

export interface AuthRequest extends Request {
  user?: User;
}

const BEARER_PREFIX = /^Bearer\s+(\S+)$/i;

export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = BEARER_PREFIX.exec(header);
  return match ? match[1] : null;
}

/**
 * Resolves the bearer token to an active user and attaches it to the
 * request. Every failure is passed to the error handler as a 401.
 */
export function authMiddleware(guard: AuthGuard) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next(new AuthenticationError('Not authenticated'));
      return;
    }

    guard
      .resolve(token)
      .then((user) => {
        req.user = user;
        next();
      })
      .catch(next);
  };
}

/**
 * The user attached by {@link authMiddleware}.
 */
export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new AuthenticationError('Not authenticated');
  }
  return req.user;
}
