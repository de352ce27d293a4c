import type { NextFunction, Response } from 'express';
import type { TokenService } from '../../../application/auth/tokens.js';
import { UnauthenticatedError } from '../../../application/errors.js';
import type { AppRequest } from './requestContext.js';

const BEARER_PREFIX = 'Bearer ';

/**
 * Rejects the request unless it carries `Authorization: Bearer <jwt>` with a
 * valid, unexpired token. On success req.auth holds the token's identity.
 */
export function authMiddleware(tokens: TokenService) {
  return (req: AppRequest, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith(BEARER_PREFIX)) {
      next(new UnauthenticatedError('missing bearer token'));
      return;
    }

    try {
      req.auth = tokens.verify(authHeader.slice(BEARER_PREFIX.length));
    } catch (error) {
      next(error);
      return;
    }
    next();
  };
}
