import type { User, UserStore } from '../../domain/auth/user.js';

/**
 * Resolves the subject of a verified token to its user record.
 */
export class CurrentUserQuery {
  constructor(private userStore: UserStore) {}

  async execute(userId: string): Promise<User> {
    return this.userStore.getById(userId);
  }
}
