import { describe, it, expect } from 'vitest';
import { redactLogMeta } from '../logger.js';

describe('redactLogMeta', () => {
  it('redacts sensitive keys at any depth', () => {
    expect(
      redactLogMeta({
        requestId: 'req-1',
        email: 'alice@example.com',
        user: { id: 'user-1', passwordHash: 'hash' },
        headers: [{ Authorization: 'Bearer abc' }],
      })
    ).toEqual({
      requestId: 'req-1',
      email: '[REDACTED]',
      user: { id: 'user-1', passwordHash: '[REDACTED]' },
      headers: [{ Authorization: '[REDACTED]' }],
    });
  });

  it('keeps dates and primitives', () => {
    const at = new Date('2026-01-01T00:00:00.000Z');

    expect(redactLogMeta({ at, status: 200, ok: true })).toEqual({ at, status: 200, ok: true });
  });
});
