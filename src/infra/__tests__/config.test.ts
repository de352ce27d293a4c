import { describe, it, expect } from 'vitest';
import { DEV_JWT_SECRET, loadConfig } from '../config.js';

describe('loadConfig', () => {
  it('applies defaults and falls back to the development secret', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      nodeEnv: 'development',
      logLevel: 'info',
      port: 3000,
      jwtSecret: DEV_JWT_SECRET,
      usingDevSecret: true,
      tokenTtlSeconds: 86400,
      store: { backend: 'memory' },
      rateLimit: { perMinute: 60, loginPerMinute: 10 },
    });
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      JWT_SECRET: 'test-secret',
      TOKEN_TTL_SECONDS: '900',
      STORE_BACKEND: 'postgres',
      DATABASE_URL: 'postgres://localhost/kanban',
      LOGIN_RATE_LIMIT_PER_MINUTE: '5',
    });

    expect(config.port).toBe(8080);
    expect(config.jwtSecret).toBe('test-secret');
    expect(config.usingDevSecret).toBe(false);
    expect(config.tokenTtlSeconds).toBe(900);
    expect(config.store).toEqual({ backend: 'postgres', databaseUrl: 'postgres://localhost/kanban' });
    expect(config.rateLimit.loginPerMinute).toBe(5);
  });

  it('treats a blank JWT_SECRET as missing', () => {
    expect(loadConfig({ JWT_SECRET: '   ' }).usingDevSecret).toBe(true);
  });

  it('requires DATABASE_URL for the postgres backend', () => {
    expect(() => loadConfig({ STORE_BACKEND: 'postgres' })).toThrow(
      'Config validation failed:\n  DATABASE_URL: required when STORE_BACKEND=postgres'
    );
  });

  it('rejects an unknown backend', () => {
    expect(() => loadConfig({ STORE_BACKEND: 'sqlite' })).toThrow(/STORE_BACKEND/);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
