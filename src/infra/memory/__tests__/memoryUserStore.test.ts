import { describe, it, expect } from 'vitest';
import { MemoryUserStore } from '../memoryUserStore.js';
import { AlreadyExistsError, NotFoundError } from '../../../application/errors.js';

describe('MemoryUserStore', () => {
  const createdAt = new Date('2026-03-01T12:00:00.000Z');

  it('creates a user with a normalized email', async () => {
    const store = new MemoryUserStore(() => createdAt);

    const user = await store.create('  Bob@Example.com ', 'hash-1');

    expect(user.email).toBe('bob@example.com');
    expect(user.passwordHash).toBe('hash-1');
    expect(user.createdAt).toEqual(createdAt);
    expect(typeof user.id).toBe('string');
  });

  it('finds users by id and by email regardless of case', async () => {
    const store = new MemoryUserStore();
    const user = await store.create('bob@example.com', 'hash-1');

    await expect(store.getById(user.id)).resolves.toEqual(user);
    await expect(store.getByEmail('BOB@EXAMPLE.COM')).resolves.toEqual(user);
  });

  it('hands out copies whose createdAt can be changed without touching the store', async () => {
    const store = new MemoryUserStore(() => createdAt);
    const user = await store.create('bob@example.com', 'hash-1');
    user.createdAt.setTime(0);
    (await store.getById(user.id)).createdAt.setTime(0);
    (await store.getByEmail('bob@example.com')).createdAt.setTime(0);

    expect((await store.getById(user.id)).createdAt).toEqual(new Date('2026-03-01T12:00:00.000Z'));
    expect(createdAt.getTime()).toBe(Date.parse('2026-03-01T12:00:00.000Z'));
  });

  it('fails with NotFoundError for unknown users', async () => {
    const store = new MemoryUserStore();

    await expect(store.getById('missing')).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.getByEmail('nobody@example.com')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects a second user with the same normalized email', async () => {
    const store = new MemoryUserStore();
    await store.create('bob@example.com', 'hash-1');

    await expect(store.create(' BOB@example.com', 'hash-2')).rejects.toBeInstanceOf(AlreadyExistsError);
    await expect(store.getByEmail('bob@example.com')).resolves.toMatchObject({ passwordHash: 'hash-1' });
  });

  it('lets exactly one of many concurrent registrations for an email win', async () => {
    const store = new MemoryUserStore();

    const results = await Promise.allSettled(
      Array.from({ length: 25 }, (_, i) => store.create(i % 2 === 0 ? 'race@example.com' : 'RACE@example.com', `hash-${i}`))
    );

    const fulfilled = results.filter((r) => r.status === 'fulfilled');
    const rejected = results.filter(
      (r): r is PromiseRejectedResult => r.status === 'rejected'
    );
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(24);
    for (const r of rejected) {
      expect(r.reason).toBeInstanceOf(AlreadyExistsError);
    }
  });
});
