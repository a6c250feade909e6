import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AuthFacade, UserRecord } from '../../../application/auth/authFacade.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';
import { Role, roleSatisfies } from '../../../domain/auth/user.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  user?: UserRecord;
}

/**
 * Token from an `Authorization: Bearer <token>` header, or null.
 */
export function bearerToken(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return null;
  }
  const token = authHeader.substring(7).trim(); // Remove 'Bearer ' prefix
  return token.length > 0 ? token : null;
}

export function requireUser(req: AuthRequest): UserRecord {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

export function authMiddleware(auth: AuthFacade): RequestHandler {
  return asyncHandler(async (req: AuthRequest, _res, next) => {
    const token = bearerToken(req);
    if (!token) {
      throw new UnauthorizedError('Missing or invalid authorization header');
    }

    const user = await auth.verifyToken(token);
    if (!user) {
      throw new UnauthorizedError('Invalid or expired token');
    }

    req.user = user;
    next();
  });
}

/**
 * Must run after authMiddleware.
 */
export function requireRole(role: Role) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(new UnauthorizedError());
      return;
    }
    if (!roleSatisfies(req.user.role, role)) {
      next(new ForbiddenError('Insufficient role'));
      return;
    }
    next();
  };
}
