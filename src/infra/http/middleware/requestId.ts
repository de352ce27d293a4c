import type { NextFunction, Response } from 'express';
import { newId } from '../../../domain/id.js';
import type { AppRequest } from './requestContext.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

/**
 * Reuses the caller's X-Request-Id or mints one, and echoes it back.
 */
export function requestId() {
  return (req: AppRequest, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const id = incoming && incoming.trim() !== '' ? incoming.trim() : newId();
    req.requestId = id;
    res.setHeader(REQUEST_ID_HEADER, id);
    next();
  };
}
