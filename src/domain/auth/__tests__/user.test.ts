import { describe, it, expect } from 'vitest';
import { normalizeEmail, toPublicUser } from '../user.js';

describe('normalizeEmail', () => {
  it('trims and lower-cases', () => {
    expect(normalizeEmail('  Alice@Example.COM \n')).toBe('alice@example.com');
  });

  it('leaves an empty string empty', () => {
    expect(normalizeEmail('   ')).toBe('');
  });
});

describe('toPublicUser', () => {
  it('drops the password hash', () => {
    const createdAt = new Date('2026-01-01T00:00:00.000Z');
    const publicUser = toPublicUser({
      id: 'user-1',
      email: 'alice@example.com',
      passwordHash: 'hash',
      createdAt,
    });

    expect(publicUser).toEqual({ id: 'user-1', email: 'alice@example.com', createdAt });
    expect(publicUser).not.toHaveProperty('passwordHash');
  });
});
