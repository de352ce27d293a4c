import { describe, it, expect, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import type { SafeLogger } from '../../logger.js';
import { requestId } from '../middleware/requestId.js';
import { requestLogger } from '../middleware/requestLogger.js';

function spyLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: (): SafeLogger => logger,
  };
  return logger;
}

describe('requestLogger', () => {
  it('logs one line with the request fields and no client address', async () => {
    const logger = spyLogger();
    const app = express();
    app.use(requestId());
    app.use(requestLogger(logger));
    app.get('/ping', (_req, res) => {
      res.json({ ok: true });
    });

    await request(app).get('/ping?x=1').set('X-Request-Id', 'req-7').expect(200);

    await vi.waitFor(() => expect(logger.info).toHaveBeenCalledTimes(1));
    expect(logger.info).toHaveBeenCalledWith(
      {
        requestId: 'req-7',
        method: 'GET',
        path: '/ping?x=1',
        status: 200,
        durationMs: expect.any(Number),
        userId: '-',
      },
      'request completed'
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs server errors at error level', async () => {
    const logger = spyLogger();
    const app = express();
    app.use(requestId());
    app.use(requestLogger(logger));
    app.get('/boom', (_req, res) => {
      res.status(503).end();
    });

    await request(app).get('/boom').set('X-Request-Id', 'req-8').expect(503);

    await vi.waitFor(() => expect(logger.error).toHaveBeenCalledTimes(1));
    expect(logger.error).toHaveBeenCalledWith(
      {
        requestId: 'req-8',
        method: 'GET',
        path: '/boom',
        status: 503,
        durationMs: expect.any(Number),
        userId: '-',
      },
      'request failed'
    );
    expect(logger.info).not.toHaveBeenCalled();
  });
});
