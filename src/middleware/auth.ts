import { Request, Response, NextFunction, RequestHandler } from 'express';
import { AuthenticationError } from './errorHandler';
import { AuthService } from '../services/authService';

export interface AuthRequest extends Request {
  username?: string;
}

/** Username attached by `requireAuth`; throws if the middleware did not run. */
export function currentUser(req: AuthRequest): string {
  if (!req.username) throw new AuthenticationError();
  return req.username;
}

/**
 * Verifies the Bearer JWT in the Authorization header and attaches
 * the token's subject as `username` on the request object.
 */
export function requireAuth(auth: AuthService): RequestHandler {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const header = req.headers.authorization;
    if (!header?.startsWith('Bearer ')) {
      next(new AuthenticationError('Missing or malformed Authorization header'));
      return;
    }

    const result = auth.authenticate(header.slice(7).trim());
    if (!result.ok) {
      const message = result.reason === 'unknown_subject' ? 'User not found' : undefined;
      next(new AuthenticationError(message));
      return;
    }

    req.username = result.username;
    next();
  };
}
