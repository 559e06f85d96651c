import type { Request } from 'express';
import type { TokenService } from '../../../application/auth/tokenService.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';
import type { User, UserRepository } from '../../../domain/auth/user.js';
import { asyncHandler } from './asyncHandler.js';

export interface AuthRequest extends Request {
  user?: User;
}

export interface AuthMiddlewareDeps {
  tokens: TokenService;
  users: UserRepository;
}

function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const parts = header.trim().split(/\s+/);
  if (parts.length !== 2 || parts[0].toLowerCase() !== 'bearer') {
    return null;
  }
  return parts[1];
}

/**
 * Resolve the caller from the bearer token. Missing or bad tokens and
 * tokens for users that no longer exist are all 401; a deactivated
 * account is 403.
 */
export function authMiddleware({ tokens, users }: AuthMiddlewareDeps) {
  return asyncHandler<AuthRequest>(async (req, _res, next) => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      throw new UnauthorizedError();
    }

    const claims = tokens.verify(token);
    if (!claims) {
      throw new UnauthorizedError();
    }

    const user = await users.findById(claims.userId);
    if (!user) {
      throw new UnauthorizedError();
    }

    if (!user.isActive) {
      throw new ForbiddenError('Inactive user');
    }

    req.user = user;
    next();
  });
}

/**
 * The user attached by authMiddleware.
 */
export function currentUser(req: AuthRequest): User {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}
