import type { PasswordHasher } from '../../domain/auth/password.js';
import { normalizeEmail, User, UserStore } from '../../domain/auth/user.js';
import { InvalidCredentialsError } from '../errors.js';
import type { AuthResult } from './register.js';
import type { TokenService } from './tokens.js';

export interface LoginCommand {
  email: string;
  password: string;
}

// Verified against when the email is unknown so both failures cost one hash check.
const UNKNOWN_USER_PASSWORD = 'unknown-user-placeholder';

export class LoginUseCase {
  private unknownUserHash?: Promise<string>;

  constructor(
    private userStore: UserStore,
    private passwordHasher: PasswordHasher,
    private tokens: TokenService
  ) {}

  async execute(command: LoginCommand): Promise<AuthResult> {
    let user: User;
    try {
      user = await this.userStore.getByEmail(normalizeEmail(command.email));
    } catch {
      // Unknown email and store failures look the same as a wrong password
      await this.passwordHasher.verify(command.password, await this.placeholderHash());
      throw new InvalidCredentialsError();
    }

    const isValid = await this.passwordHasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    return { user, token: this.tokens.issue(user) };
  }

  private placeholderHash(): Promise<string> {
    if (!this.unknownUserHash) {
      this.unknownUserHash = this.passwordHasher.hash(UNKNOWN_USER_PASSWORD);
    }
    return this.unknownUserHash;
  }
}
