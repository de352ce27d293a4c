import { normalizeEmail, User, UserStore } from '../../domain/auth/user.js';
import { Clock, newId, systemClock } from '../../domain/id.js';
import { AlreadyExistsError, NotFoundError } from '../../application/errors.js';

function copyUser(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt.getTime()) };
}

/**
 * In-process user store.
 *
 * `users` (id -> user) and `idsByEmail` (normalized email -> id) are always
 * written together. None of the methods await between reading and writing,
 * so the uniqueness check and the insert in `create` cannot interleave with
 * another request.
 */
export class MemoryUserStore implements UserStore {
  private readonly users = new Map<string, User>();
  private readonly idsByEmail = new Map<string, string>();

  constructor(private readonly now: Clock = systemClock) {}

  async create(email: string, passwordHash: string): Promise<User> {
    const normalized = normalizeEmail(email);
    if (this.idsByEmail.has(normalized)) {
      throw new AlreadyExistsError('email already exists');
    }

    const user: User = {
      id: newId(),
      email: normalized,
      passwordHash,
      createdAt: new Date(this.now().getTime()),
    };
    this.users.set(user.id, user);
    this.idsByEmail.set(normalized, user.id);
    return copyUser(user);
  }

  async getByEmail(email: string): Promise<User> {
    const id = this.idsByEmail.get(normalizeEmail(email));
    const user = id === undefined ? undefined : this.users.get(id);
    if (!user) {
      throw new NotFoundError('user not found');
    }
    return copyUser(user);
  }

  async getById(id: string): Promise<User> {
    const user = this.users.get(id);
    if (!user) {
      throw new NotFoundError('user not found');
    }
    return copyUser(user);
  }
}
