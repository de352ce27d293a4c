import type { Queryable } from './pool.js';
import { normalizeEmail, User, UserStore } from '../../domain/auth/user.js';
import { Clock, newId, systemClock } from '../../domain/id.js';
import { AlreadyExistsError, NotFoundError } from '../../application/errors.js';

interface UserRow {
  id: string;
  email: string;
  password_hash: string;
  created_at: Date;
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
  };
}

export class PgUserRepo implements UserStore {
  constructor(
    private readonly db: Queryable,
    private readonly now: Clock = systemClock
  ) {}

  async create(email: string, passwordHash: string): Promise<User> {
    // The unique index on email makes check-and-insert a single statement.
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (id, email, password_hash, created_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (email) DO NOTHING
       RETURNING id, email, password_hash, created_at`,
      [newId(), normalizeEmail(email), passwordHash, this.now()]
    );

    const row = result.rows[0];
    if (!row) {
      throw new AlreadyExistsError('email already exists');
    }
    return toUser(row);
  }

  async getByEmail(email: string): Promise<User> {
    const result = await this.db.query<UserRow>(
      'SELECT id, email, password_hash, created_at FROM users WHERE email = $1',
      [normalizeEmail(email)]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('user not found');
    }
    return toUser(row);
  }

  async getById(id: string): Promise<User> {
    const result = await this.db.query<UserRow>(
      'SELECT id, email, password_hash, created_at FROM users WHERE id = $1',
      [id]
    );

    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError('user not found');
    }
    return toUser(row);
  }
}
