import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import type { ErrorResponse } from './errorHandler.js';

const WINDOW_MS = 60 * 1000;

export interface RateLimitOptions {
  perMinute: number;
  loginPerMinute: number;
}

export interface RateLimiters {
  api: RateLimitRequestHandler;
  login: RateLimitRequestHandler;
}

function tooManyRequests(message: string): ErrorResponse {
  return { code: 'RATE_LIMITED', message };
}

/**
 * Fresh limiters per app, each with its own in-memory store
 * (resets on restart).
 */
export function createRateLimiters(options: RateLimitOptions): RateLimiters {
  return {
    api: rateLimit({
      windowMs: WINDOW_MS,
      limit: options.perMinute,
      message: tooManyRequests('Too many requests, please try again later.'),
      standardHeaders: true,
      legacyHeaders: false,
    }),
    // Keyed by IP: there is no user yet at login time
    login: rateLimit({
      windowMs: WINDOW_MS,
      limit: options.loginPerMinute,
      message: tooManyRequests('Too many login attempts, please try again later.'),
      standardHeaders: true,
      legacyHeaders: false,
      keyGenerator: (req) => req.ip ?? req.socket.remoteAddress ?? 'unknown',
    }),
  };
}
