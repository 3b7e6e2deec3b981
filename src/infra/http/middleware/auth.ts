import type { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import type { Role } from '../../../domain/auth/user.js';
import type { UserRepository } from '../../../application/ports.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';

export interface CurrentUser {
  id: number;
  username: string;
  role: Role;
}

export interface AuthRequest extends Request {
  user?: CurrentUser;
}

const tokenClaimsSchema = z.object({
  userId: z.number().int(),
  username: z.string(),
  role: z.enum(['admin', 'operator']),
  tokenVersion: z.number().int(),
});

export type TokenClaims = z.infer<typeof tokenClaimsSchema>;

function readClaims(token: string, jwtSecret: string): TokenClaims | null {
  try {
    const parsed = tokenClaimsSchema.safeParse(jwt.verify(token, jwtSecret));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Requires a valid bearer token whose user still exists and has not logged
 * out since the token was issued. Attaches the user to `req.user`.
 */
export function requireLogin(userRepo: UserRepository, jwtSecret: string): RequestHandler {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError());
      return;
    }

    const claims = readClaims(authHeader.substring(7), jwtSecret);
    if (!claims) {
      next(new UnauthorizedError('Invalid or expired token'));
      return;
    }

    userRepo
      .findById(claims.userId)
      .then((user) => {
        if (!user || user.tokenVersion !== claims.tokenVersion) {
          next(new UnauthorizedError('Invalid or expired token'));
          return;
        }
        // Role comes from the store, not the token, so changes apply immediately
        req.user = { id: user.id, username: user.username, role: user.role };
        next();
      })
      .catch(next);
  };
}

/**
 * Must run after requireLogin.
 */
export function requireAdmin(req: AuthRequest, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new UnauthorizedError());
    return;
  }
  if (req.user.role !== 'admin') {
    next(new ForbiddenError());
    return;
  }
  next();
}

export function currentUser(req: AuthRequest): CurrentUser {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
