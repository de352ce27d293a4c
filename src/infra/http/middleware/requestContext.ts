import type { Request } from 'express';
import type { AuthContext } from '../../../application/auth/tokens.js';
import { UnauthenticatedError } from '../../../application/errors.js';

/**
 * Request-scoped values set by middleware: requestId by requestId(),
 * auth by authMiddleware().
 */
export interface AppRequest extends Request {
  requestId?: string;
  auth?: AuthContext;
}

/**
 * Identity for routes mounted behind authMiddleware.
 */
export function requireAuth(req: AppRequest): AuthContext {
  if (!req.auth) {
    throw new UnauthenticatedError('missing bearer token');
  }
  return req.auth;
}
