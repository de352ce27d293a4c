import jwt, { type JwtPayload } from 'jsonwebtoken';
import type { User } from '../../domain/auth/user.js';
import { Clock, systemClock } from '../../domain/id.js';
import { UnauthenticatedError } from '../errors.js';

export const TOKEN_ISSUER = 'kanban-api';

/**
 * Identity carried by a verified token.
 */
export interface AuthContext {
  userId: string;
  email: string;
}

export interface TokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  now?: Clock;
}

/**
 * Signs and verifies HS256 access tokens.
 * Claims: sub (user id), email, iss, iat, exp = iat + ttl.
 */
export class TokenService {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: Clock;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? systemClock;
  }

  issue(user: User): string {
    return jwt.sign({ email: user.email, iat: this.epochSeconds() }, this.secret, {
      algorithm: 'HS256',
      subject: user.id,
      issuer: TOKEN_ISSUER,
      expiresIn: this.ttlSeconds,
    });
  }

  /**
   * Throws UnauthenticatedError('invalid token') for a bad signature,
   * an expired token, a wrong issuer or missing claims.
   */
  verify(token: string): AuthContext {
    let decoded: string | JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, {
        algorithms: ['HS256'],
        issuer: TOKEN_ISSUER,
        clockTimestamp: this.epochSeconds(),
      });
    } catch {
      throw new UnauthenticatedError('invalid token');
    }

    if (typeof decoded === 'string') {
      throw new UnauthenticatedError('invalid token');
    }
    const { sub, email } = decoded;
    if (typeof sub !== 'string' || typeof email !== 'string') {
      throw new UnauthenticatedError('invalid token');
    }

    return { userId: sub, email };
  }

  private epochSeconds(): number {
    return Math.floor(this.now().getTime() / 1000);
  }
}
