import type { Request, RequestHandler } from 'express';
import { AuthGate } from '../../../application/auth/authGate.js';
import { UnauthorizedError } from '../../../application/errors.js';
import type { User } from '../../../domain/auth/user.js';

declare global {
  namespace Express {
    interface Request {
      user?: User;
    }
  }
}

/**
 * Resolve the bearer token on every request through the gate and attach the
 * user. Failures reach errorHandler as UnauthorizedError (401 + challenge).
 */
export function requireAuth(gate: AuthGate): RequestHandler {
  return (req, _res, next) => {
    gate
      .authenticate(req.headers.authorization)
      .then((user) => {
        req.user = user;
        next();
      })
      .catch(next);
  };
}

export function currentUser(req: Request): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
