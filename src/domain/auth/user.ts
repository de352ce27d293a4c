/**
 * User domain entity.
 * The password hash never leaves the server; use toPublicUser for responses.
 */
export interface User {
  readonly id: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
}

export interface PublicUser {
  id: string;
  email: string;
  createdAt: Date;
}

/**
 * Emails are compared case-insensitively and without surrounding whitespace.
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    email: user.email,
    createdAt: user.createdAt,
  };
}

export interface UserStore {
  /** Fails with AlreadyExistsError when the normalized email is taken. */
  create(email: string, passwordHash: string): Promise<User>;
  /** Fails with NotFoundError. */
  getByEmail(email: string): Promise<User>;
  /** Fails with NotFoundError. */
  getById(id: string): Promise<User>;
}
