import type { NextFunction, RequestHandler, Response } from 'express';
import type { AppRequest } from './requestContext.js';

/**
 * Wrap an async Express handler so it returns void (no-misused-promises)
 * and forwards rejections to next().
 */
export function asyncHandler(
  fn: (req: AppRequest, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
