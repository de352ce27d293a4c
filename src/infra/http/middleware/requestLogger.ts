import type { NextFunction, Response } from 'express';
import type { SafeLogger } from '../../logger.js';
import type { AppRequest } from './requestContext.js';

/**
 * One log line per finished request.
 */
export function requestLogger(logger: SafeLogger) {
  return (req: AppRequest, res: Response, next: NextFunction): void => {
    const start = process.hrtime.bigint();

    res.on('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - start) / 1e6;
      const meta = {
        requestId: req.requestId ?? '-',
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Math.round(durationMs * 100) / 100,
        userId: req.auth?.userId ?? '-',
      };
      if (res.statusCode >= 500) {
        logger.error(meta, 'request failed');
      } else {
        logger.info(meta, 'request completed');
      }
    });

    next();
  };
}
